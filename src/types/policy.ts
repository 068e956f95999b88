/**
 * Render policy types.
 *
 * @module
 */

import type { Escaper } from '../policy/escape.js';
import type { FillingValue, PlainFilling } from './filling.js';
import type { TokenSyntax } from './template.js';

/** Open/close pair, e.g. `['<!--', '-->']`. */
export type DelimiterPair = readonly [open: string, close: string];

/**
 * Options accepted by {@link createRenderPolicy}. Every option is optional;
 * omitted ones take their defaults.
 */
export interface RenderPolicyOptions {
  /** Escape string scalars with {@link escaper}. Default `true`. */
  escapeHtml?: boolean;
  /** Escaping strategy used when `escapeHtml` is on. Default: HTML entities. */
  escaper?: Escaper;
  /** Insert nested output verbatim, without re-indenting. Default `false`. */
  fixedIndent?: boolean;
  /** Wrap nested output in BEGIN/END comments. Default `false`. */
  showLabels?: boolean;
  /** Delimiters of label comments. Default `['<!--', '-->']`. */
  commentDelimiters?: DelimiterPair;
  /** Fallback fillings by token name, for every template. */
  defaults?: Readonly<Record<string, PlainFilling>>;
  /** Fallback fillings by template id, then token name. */
  templateDefaults?: Readonly<Record<string, Readonly<Record<string, PlainFilling>>>>;
  /** Fail on tokens with no filling and no default. Default `true`. */
  dieOnBadParams?: boolean;
  /** Fail on filling fields that match no token of their template. Default `false`. */
  rejectUnknownParams?: boolean;
  /** Reserved field naming a nested template. Default `'TEMPLATE'`. */
  nameLabel?: string;
  /** Token marker pair. Default `['<!--%', '%-->']`. */
  tokenDelimiters?: DelimiterPair;
  /** Sequence that escapes an opening marker. Default `''` (disabled). */
  tokenEscapeChar?: string;
  /** Maximum template nesting depth. Default `100`. */
  maxDepth?: number;
}

/**
 * Resolved, immutable render policy.
 */
export interface RenderPolicy {
  readonly escapeHtml: boolean;
  readonly escaper: Escaper;
  readonly fixedIndent: boolean;
  readonly showLabels: boolean;
  readonly commentDelimiters: DelimiterPair;
  readonly defaults: ReadonlyMap<string, FillingValue>;
  readonly templateDefaults: ReadonlyMap<string, ReadonlyMap<string, FillingValue>>;
  readonly dieOnBadParams: boolean;
  readonly rejectUnknownParams: boolean;
  readonly nameLabel: string;
  readonly syntax: TokenSyntax;
  readonly maxDepth: number;
  /** The options this policy was created from. */
  readonly options: Readonly<RenderPolicyOptions>;
}
