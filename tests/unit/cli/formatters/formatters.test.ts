import { describe, it, expect } from 'vitest';
import { createFormatter, JsonFormatter, PrettyFormatter } from '../../../../src/cli/formatters/index.js';

describe('createFormatter', () => {
  it('creates the formatter for a format', () => {
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
    expect(createFormatter('pretty')).toBeInstanceOf(PrettyFormatter);
  });
});

describe('JsonFormatter', () => {
  it('prints compact JSON by default', () => {
    expect(new JsonFormatter().format({ type: 'render', data: '<p></p>' })).toBe('{"success":true,"output":"<p></p>"}');
  });

  it('marks errors as failures', () => {
    expect(new JsonFormatter().format({ type: 'error', data: 'nope' })).toBe('{"success":false,"error":"nope"}');
  });

  it('indents when pretty', () => {
    expect(new JsonFormatter(true).format({ type: 'message', data: 'hi', meta: { n: 1 } })).toBe(
      '{\n  "success": true,\n  "message": "hi",\n  "meta": {\n    "n": 1\n  }\n}',
    );
  });
});

describe('PrettyFormatter', () => {
  const plain = new PrettyFormatter(false);

  it('prints rendered output as is', () => {
    expect(plain.format({ type: 'render', data: '<p>x</p>\n' })).toBe('<p>x</p>\n');
  });

  it('reports an empty template list', () => {
    expect(plain.format({ type: 'templates', data: [] })).toBe('No templates found.');
  });

  it('marks templates without tokens', () => {
    expect(plain.format({ type: 'templates', data: [{ id: 'footer', tokens: [] }] })).toBe(
      'Found 1 template(s):\n\nfooter\n  (no tokens)',
    );
  });

  it('prefixes errors', () => {
    expect(plain.format({ type: 'error', data: 'bad' })).toBe('Error: bad');
  });

  it('colors when asked to', () => {
    expect(new PrettyFormatter(true).format({ type: 'error', data: 'bad' })).toBe('\x1b[31mError: bad\x1b[0m');
  });
});
