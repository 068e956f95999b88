import { describe, it, expect } from 'vitest';
import {
  createRenderPolicy,
  withPolicy,
  DEFAULT_RENDER_POLICY,
  DEFAULT_COMMENT_DELIMITERS,
  DEFAULT_MAX_DEPTH,
} from '../../../src/policy/render-policy.js';
import { escapeHtml, noEscape } from '../../../src/policy/escape.js';
import { scalar } from '../../../src/filling/filling-value.js';
import { PolicyError } from '../../../src/errors/config-errors.js';

describe('createRenderPolicy', () => {
  it('applies defaults', () => {
    const policy = createRenderPolicy();

    expect(policy.escapeHtml).toBe(true);
    expect(policy.escaper).toBe(escapeHtml);
    expect(policy.fixedIndent).toBe(false);
    expect(policy.showLabels).toBe(false);
    expect(policy.commentDelimiters).toEqual(['<!--', '-->']);
    expect(policy.dieOnBadParams).toBe(true);
    expect(policy.rejectUnknownParams).toBe(false);
    expect(policy.nameLabel).toBe('TEMPLATE');
    expect(policy.syntax).toEqual({ open: '<!--%', close: '%-->', escape: '' });
    expect(policy.maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(policy.defaults.size).toBe(0);
    expect(policy.templateDefaults.size).toBe(0);
  });

  it('derives the token syntax from delimiters and escape', () => {
    const policy = createRenderPolicy({ tokenDelimiters: ['{{', '}}'], tokenEscapeChar: '\\' });
    expect(policy.syntax).toEqual({ open: '{{', close: '}}', escape: '\\' });
  });

  it('converts defaults into fillings', () => {
    const policy = createRenderPolicy({
      defaults: { year: 2024 },
      templateDefaults: { footer: { year: 1999 } },
    });

    expect(policy.defaults.get('year')).toEqual(scalar(2024));
    expect(policy.templateDefaults.get('footer')?.get('year')).toEqual(scalar(1999));
  });

  it('is frozen', () => {
    const policy = createRenderPolicy({ escaper: noEscape });

    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.syntax)).toBe(true);
    expect(Object.isFrozen(policy.commentDelimiters)).toBe(true);
  });

  describe('validation', () => {
    it('rejects empty token delimiters', () => {
      expect(() => createRenderPolicy({ tokenDelimiters: ['', '}}'] })).toThrow(
        new PolicyError('tokenDelimiters must be a pair of non-empty strings'),
      );
    });

    it('rejects empty comment delimiters', () => {
      expect(() => createRenderPolicy({ commentDelimiters: ['<!--', ''] })).toThrow(PolicyError);
    });

    it('rejects an empty name label', () => {
      expect(() => createRenderPolicy({ nameLabel: '' })).toThrow('nameLabel must be a non-empty string');
    });

    it('rejects a non-positive or fractional maxDepth', () => {
      expect(() => createRenderPolicy({ maxDepth: 0 })).toThrow('maxDepth must be a positive integer, got 0');
      expect(() => createRenderPolicy({ maxDepth: 1.5 })).toThrow(PolicyError);
    });

    it('rejects defaults that are not plain fillings', () => {
      expect(() => createRenderPolicy({ templateDefaults: { page: { when: Number.POSITIVE_INFINITY } } })).toThrow(
        'Invalid defaults for template "page": when: number must be finite, got Infinity',
      );
    });
  });
});

describe('withPolicy', () => {
  it('overrides options of an existing policy', () => {
    const base = createRenderPolicy({ showLabels: true, defaults: { a: 'x' } });
    const derived = withPolicy(base, { fixedIndent: true });

    expect(derived.showLabels).toBe(true);
    expect(derived.fixedIndent).toBe(true);
    expect(derived.defaults.get('a')).toEqual(scalar('x'));
    expect(base.fixedIndent).toBe(false);
  });
});

describe('DEFAULT_RENDER_POLICY', () => {
  it('uses the default comment delimiters', () => {
    expect(DEFAULT_RENDER_POLICY.commentDelimiters).toEqual(DEFAULT_COMMENT_DELIMITERS);
  });
});
