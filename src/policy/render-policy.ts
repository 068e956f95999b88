/**
 * Construction and validation of {@link RenderPolicy}.
 *
 * A policy is built once per caller configuration and shared read-only
 * across renders:
 *
 * ```typescript
 * const policy = createRenderPolicy({ showLabels: true, dieOnBadParams: false });
 * const lenient = withPolicy(policy, { fixedIndent: true });
 * ```
 *
 * @module
 */

import type { DelimiterPair, RenderPolicy, RenderPolicyOptions } from '../types/policy.js';
import type { FillingValue } from '../types/filling.js';
import { escapeHtml } from './escape.js';
import { fromPlainRecord, DEFAULT_NAME_LABEL } from '../filling/filling-value.js';
import { DEFAULT_TOKEN_SYNTAX } from '../scanner/token-scanner.js';
import { PolicyError } from '../errors/config-errors.js';
import { InvalidFillingShapeError } from '../errors/render-errors.js';

export const DEFAULT_COMMENT_DELIMITERS: DelimiterPair = Object.freeze(['<!--', '-->'] as const);

export const DEFAULT_MAX_DEPTH = 100;

function checkDelimiters(name: string, pair: unknown): DelimiterPair {
  if (!Array.isArray(pair) || pair.length !== 2) {
    throw new PolicyError(`${name} must be a pair of strings`);
  }
  const [open, close] = pair;
  if (typeof open !== 'string' || typeof close !== 'string' || open.length === 0 || close.length === 0) {
    throw new PolicyError(`${name} must be a pair of non-empty strings`);
  }
  return Object.freeze([open, close] as const);
}

function convertDefaults(
  label: string,
  record: Readonly<Record<string, unknown>>,
): ReadonlyMap<string, FillingValue> {
  try {
    return fromPlainRecord(record);
  } catch (err) {
    if (err instanceof InvalidFillingShapeError) {
      throw new PolicyError(`Invalid ${label}: ${err.detail}`);
    }
    throw err;
  }
}

/**
 * Builds a frozen policy from `options`, applying defaults.
 *
 * @throws {PolicyError} On empty delimiters, an empty name label, a
 *   non-positive `maxDepth` or defaults that are not plain fillings.
 */
export function createRenderPolicy(options: RenderPolicyOptions = {}): RenderPolicy {
  const commentDelimiters = checkDelimiters(
    'commentDelimiters',
    options.commentDelimiters ?? DEFAULT_COMMENT_DELIMITERS,
  );
  const [open, close] = checkDelimiters(
    'tokenDelimiters',
    options.tokenDelimiters ?? [DEFAULT_TOKEN_SYNTAX.open, DEFAULT_TOKEN_SYNTAX.close],
  );

  const escape = options.tokenEscapeChar ?? DEFAULT_TOKEN_SYNTAX.escape;
  if (typeof escape !== 'string') {
    throw new PolicyError('tokenEscapeChar must be a string');
  }

  const nameLabel = options.nameLabel ?? DEFAULT_NAME_LABEL;
  if (typeof nameLabel !== 'string' || nameLabel.length === 0) {
    throw new PolicyError('nameLabel must be a non-empty string');
  }

  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new PolicyError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }

  const templateDefaults = new Map<string, ReadonlyMap<string, FillingValue>>();
  for (const [templateId, record] of Object.entries(options.templateDefaults ?? {})) {
    templateDefaults.set(templateId, convertDefaults(`defaults for template "${templateId}"`, record));
  }

  return Object.freeze({
    escapeHtml: options.escapeHtml ?? true,
    escaper: options.escaper ?? escapeHtml,
    fixedIndent: options.fixedIndent ?? false,
    showLabels: options.showLabels ?? false,
    commentDelimiters,
    defaults: convertDefaults('defaults', options.defaults ?? {}),
    templateDefaults,
    dieOnBadParams: options.dieOnBadParams ?? true,
    rejectUnknownParams: options.rejectUnknownParams ?? false,
    nameLabel,
    syntax: Object.freeze({ open, close, escape }),
    maxDepth,
    options: Object.freeze({ ...options }),
  });
}

/** Policy with every option at its default. */
export const DEFAULT_RENDER_POLICY: RenderPolicy = createRenderPolicy();

/**
 * Derives a new policy from `policy` with `overrides` applied on top of the
 * options it was created from.
 */
export function withPolicy(policy: RenderPolicy, overrides: RenderPolicyOptions): RenderPolicy {
  return createRenderPolicy({ ...policy.options, ...overrides });
}
