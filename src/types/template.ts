/**
 * Scanned template structures.
 *
 * @module
 */

/** Marker pair and escape sequence recognised by the token scanner. */
export interface TokenSyntax {
  /** Opening marker, e.g. `<!--%`. */
  readonly open: string;
  /** Closing marker, e.g. `%-->`. */
  readonly close: string;
  /**
   * Sequence that, placed right before `open`, makes the marker literal.
   * Empty string disables escaping.
   */
  readonly escape: string;
}

/** One placeholder occurrence inside a template body. */
export interface Token {
  readonly name: string;
  /** Offset of the opening marker in the source. */
  readonly start: number;
  /** Offset just past the closing marker. */
  readonly end: number;
  /** 1-based line of the opening marker. */
  readonly line: number;
  /** 1-based column of the opening marker. */
  readonly column: number;
  /** Leading whitespace of the line the token sits on. */
  readonly indent: string;
}

export type Segment =
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'token'; readonly token: Token };

/** Result of scanning one template source. */
export interface ScannedTemplate {
  readonly source: string;
  readonly segments: readonly Segment[];
  readonly tokens: readonly Token[];
}

/** A scanned template owned by a sealed store. */
export interface TemplateBody extends ScannedTemplate {
  readonly id: string;
  /** Distinct token names, in order of first occurrence. */
  readonly tokenNames: readonly string[];
}
