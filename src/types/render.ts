/**
 * Render results and diagnostics.
 *
 * @module
 */

import type { RenderError } from '../errors/base.js';

/** A token that was replaced by empty text because nothing filled it. */
export interface MissingToken {
  readonly templateId: string;
  readonly token: string;
  readonly line: number;
  readonly column: number;
}

/** Output of a render together with what happened along the way. */
export interface RenderReport {
  readonly output: string;
  /** Tokens left empty in lenient mode, in render order. */
  readonly missing: readonly MissingToken[];
  /** Every template instance rendered, in the order rendering started. */
  readonly templates: readonly string[];
}

export type RenderResult =
  | { readonly ok: true; readonly output: string }
  | { readonly ok: false; readonly error: RenderError };
