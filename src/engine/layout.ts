/**
 * Whitespace and label handling for nested blocks.
 *
 * @module
 */

import type { DelimiterPair } from '../types/policy.js';

/**
 * Prefixes every line of `text` after the first with `indent`. An empty last
 * line (after a trailing newline) is left alone.
 */
export function reindent(text: string, indent: string): string {
  if (indent.length === 0 || !text.includes('\n')) {
    return text;
  }
  const lines = text.split('\n');
  const last = lines.length - 1;
  return lines
    .map((line, i) => {
      if (i === 0) return line;
      if (i === last && line.length === 0) return line;
      return indent + line;
    })
    .join('\n');
}

/**
 * Concatenates rendered blocks of a sequence. Every block after the first is
 * preceded by `indent`; with `fixedIndent` blocks are joined verbatim.
 */
export function joinBlocks(blocks: readonly string[], indent: string, fixedIndent: boolean): string {
  if (fixedIndent) {
    return blocks.join('');
  }
  return blocks.map((block, i) => (i === 0 ? block : indent + block)).join('');
}

/**
 * Text of the BEGIN or END label for a nested block.
 */
export function labelText(
  edge: 'BEGIN' | 'END',
  templateId: string,
  position: string,
  [open, close]: DelimiterPair,
): string {
  return `${open} ${edge} ${templateId} (${position}) ${close}`;
}

/**
 * Brackets an already indented block with BEGIN/END labels.
 *
 * `content` is the block exactly as it would be substituted without labels.
 * It follows the BEGIN label's line break and `lead`; the END label sits on a
 * line of its own, also after `lead`. Pass the token's indent as `lead` when
 * the token starts its line, and `''` when it follows other text.
 */
export function wrapWithLabels(
  content: string,
  templateId: string,
  position: string,
  delimiters: DelimiterPair,
  lead = '',
): string {
  const begin = labelText('BEGIN', templateId, position, delimiters);
  const end = labelText('END', templateId, position, delimiters);
  if (content.endsWith('\n')) {
    return `${begin}\n${lead}${content}${lead}${end}\n`;
  }
  return `${begin}\n${lead}${content}\n${lead}${end}`;
}
