/**
 * Token scanner for template bodies.
 *
 * Finds placeholder tokens such as `<!--% title %-->` in a single
 * left-to-right pass and splits the source into literal text and token
 * segments:
 *
 * ```
 * <p><!--% title %--></p>   →   text "<p>", token "title", text "</p>"
 * ```
 *
 * When the syntax has an escape sequence, an opening marker prefixed with
 * it is emitted literally and the escape sequence itself is dropped.
 *
 * @module
 */

import type { ScannedTemplate, Segment, Token, TokenSyntax } from '../types/template.js';
import { MalformedTokenError } from '../errors/render-errors.js';
import { PolicyError } from '../errors/config-errors.js';

/** Syntax used when none is configured. */
export const DEFAULT_TOKEN_SYNTAX: TokenSyntax = Object.freeze({
  open: '<!--%',
  close: '%-->',
  escape: '',
});

// ---------------------------------------------------------------------------
// Position helpers
// ---------------------------------------------------------------------------

interface Position {
  offset: number;
  line: number;
  column: number;
}

/**
 * Maps string offsets to 1-based line/column pairs.
 */
class LineIndex {
  private readonly starts: number[] = [0];

  constructor(private readonly source: string) {
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) this.starts.push(i + 1);
    }
  }

  locate(offset: number): Position {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) lo = mid;
      else hi = mid - 1;
    }
    const lineStart = this.starts[lo] ?? 0;
    return { offset, line: lo + 1, column: offset - lineStart + 1 };
  }

  /** Leading spaces and tabs of the line containing `offset`, up to `offset`. */
  indentAt(offset: number): string {
    const { line } = this.locate(offset);
    const lineStart = this.starts[line - 1] ?? 0;
    let end = lineStart;
    while (end < offset) {
      const ch = this.source[end];
      if (ch !== ' ' && ch !== '\t') break;
      end++;
    }
    return this.source.slice(lineStart, end);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Scans `source` for tokens delimited by `syntax`.
 *
 * @param templateId - Used in error messages only.
 * @throws {MalformedTokenError} When a token is never closed, another token
 *   opens before it closes, or its name is empty.
 */
export function scanTemplate(
  source: string,
  syntax: TokenSyntax = DEFAULT_TOKEN_SYNTAX,
  templateId = '<anonymous>',
): ScannedTemplate {
  const { open, close, escape } = syntax;
  if (open.length === 0 || close.length === 0) {
    throw new PolicyError('Token delimiters must be non-empty strings');
  }

  const index = new LineIndex(source);
  const segments: Segment[] = [];
  const tokens: Token[] = [];
  let text = '';
  let pos = 0;

  const flushText = (): void => {
    if (text.length > 0) {
      segments.push({ type: 'text', value: text });
      text = '';
    }
  };

  while (pos < source.length) {
    const openAt = source.indexOf(open, pos);
    if (openAt === -1) {
      text += source.slice(pos);
      break;
    }

    const escapeAt = openAt - escape.length;
    if (escape.length > 0 && escapeAt >= pos && source.startsWith(escape, escapeAt)) {
      text += source.slice(pos, escapeAt) + open;
      pos = openAt + open.length;
      continue;
    }

    text += source.slice(pos, openAt);

    const innerStart = openAt + open.length;
    const closeAt = source.indexOf(close, innerStart);
    if (closeAt === -1) {
      throw new MalformedTokenError(templateId, 'unterminated', index.locate(openAt));
    }
    const reopenAt = source.indexOf(open, innerStart);
    if (reopenAt !== -1 && reopenAt < closeAt) {
      throw new MalformedTokenError(templateId, 'nested', index.locate(openAt));
    }

    const name = source.slice(innerStart, closeAt).trim();
    const position = index.locate(openAt);
    if (name.length === 0) {
      throw new MalformedTokenError(templateId, 'empty', position);
    }

    const token: Token = Object.freeze({
      name,
      start: openAt,
      end: closeAt + close.length,
      line: position.line,
      column: position.column,
      indent: index.indentAt(openAt),
    });

    flushText();
    segments.push({ type: 'token', token });
    tokens.push(token);
    pos = token.end;
  }

  flushText();

  return { source, segments, tokens };
}

/**
 * Distinct token names of a scanned template, in order of first occurrence.
 */
export function listTokenNames(scanned: Pick<ScannedTemplate, 'tokens'>): string[] {
  const seen = new Set<string>();
  for (const token of scanned.tokens) {
    seen.add(token.name);
  }
  return [...seen];
}

/** Structural equality of two token syntaxes. */
export function sameSyntax(a: TokenSyntax, b: TokenSyntax): boolean {
  return a.open === b.open && a.close === b.close && a.escape === b.escape;
}
