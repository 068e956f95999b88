/**
 * Escaping strategies for string scalars.
 *
 * @module
 */

/** Turns raw text into text safe for the output format. */
export type Escaper = (text: string) => string;

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

const HTML_SPECIAL = /[&<>"']/g;

/**
 * Replaces `& < > " '` with their HTML entities.
 */
export const escapeHtml: Escaper = (text) => {
  // Fast path - nothing to escape
  if (!/[&<>"']/.test(text)) {
    return text;
  }
  return text.replace(HTML_SPECIAL, (ch) => HTML_ENTITIES[ch] ?? ch);
};

/** Leaves text unchanged. */
export const noEscape: Escaper = (text) => text;
