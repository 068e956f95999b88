/**
 * Recursive composition engine.
 *
 * Renders a template by walking its segments in source order. Literal text
 * is copied; each token is resolved against the filling and replaced by:
 *
 * - **scalar**: its text, escaped when it is a string and `escapeHtml` is on
 * - **object**: the rendered output of the template it names, re-indented
 *   to the token's line indentation, then optionally wrapped in labels
 * - **sequence**: one block per element, concatenated in order, each block
 *   after the first preceded by the token's indentation
 *
 * ```typescript
 * const store = createTemplateStore({
 *   list: '<ul>\n  <!--% items %-->\n</ul>',
 *   item: '<li><!--% label %--></li>\n',
 * });
 *
 * render(store, 'list', fromPlain({
 *   items: [
 *     { TEMPLATE: 'item', label: 'one' },
 *     { TEMPLATE: 'item', label: 'two' },
 *   ],
 * }));
 * // <ul>
 * //   <li>one</li>
 * //   <li>two</li>
 * //
 * // </ul>
 * ```
 *
 * @module
 */

import type { FillingValue, ObjectFilling, ScalarFilling, SequenceFilling } from '../types/filling.js';
import type { RenderPolicy } from '../types/policy.js';
import type { RenderReport, RenderResult } from '../types/render.js';
import type { TemplateBody, Token } from '../types/template.js';
import type { TemplateStore } from '../store/template-store.js';
import { RenderContext } from './render-context.js';
import { joinBlocks, reindent, wrapWithLabels } from './layout.js';
import { DEFAULT_RENDER_POLICY } from '../policy/render-policy.js';
import { sameSyntax } from '../scanner/token-scanner.js';
import { RenderError } from '../errors/base.js';
import {
  InvalidFillingShapeError,
  MissingParameterError,
  NestingDepthError,
  UnknownParameterError,
  UnknownTemplateError,
} from '../errors/render-errors.js';
import { SyntaxMismatchError } from '../errors/config-errors.js';
import { templateNameOf } from '../filling/filling-value.js';

// ---------------------------------------------------------------------------
// Value rendering
// ---------------------------------------------------------------------------

function renderScalar(policy: RenderPolicy, filling: ScalarFilling): string {
  const { value } = filling;
  if (value === null) return '';
  if (typeof value === 'string') {
    return policy.escapeHtml ? policy.escaper(value) : value;
  }
  return String(value);
}

function lookup(policy: RenderPolicy, body: TemplateBody, token: Token, filling: ObjectFilling): FillingValue | undefined {
  return (
    filling.fields.get(token.name) ??
    policy.templateDefaults.get(body.id)?.get(token.name) ??
    policy.defaults.get(token.name)
  );
}

/**
 * Template id an object filling names through the name label.
 */
function nestedTemplateId(
  ctx: RenderContext,
  filling: ObjectFilling,
  location: { templateId?: string; token?: string },
): string {
  const { nameLabel } = ctx.policy;
  let templateId: string | undefined;
  try {
    templateId = templateNameOf(filling, nameLabel);
  } catch (err) {
    if (err instanceof InvalidFillingShapeError) {
      throw new InvalidFillingShapeError(err.detail, location, ctx.templateStack);
    }
    throw err;
  }
  if (templateId === undefined) {
    throw new InvalidFillingShapeError(
      `object has no "${nameLabel}" field naming a template`,
      location,
      ctx.templateStack,
    );
  }
  return templateId;
}

/** One rendered block of a sequence, with the template it came from. */
interface Block {
  text: string;
  templateId: string | undefined;
}

/**
 * Renders every element of a sequence into `blocks`. Nested sequences are
 * flattened, so positions count leaf blocks.
 */
function collectBlocks(
  ctx: RenderContext,
  parent: TemplateBody,
  token: Token,
  filling: SequenceFilling,
  blocks: Block[],
): void {
  for (const item of filling.items) {
    switch (item.kind) {
      case 'scalar':
        blocks.push({ text: renderScalar(ctx.policy, item), templateId: undefined });
        break;
      case 'object': {
        const templateId = nestedTemplateId(ctx, item, { templateId: parent.id, token: token.name });
        blocks.push({ text: renderTemplate(ctx, templateId, item), templateId });
        break;
      }
      case 'sequence':
        collectBlocks(ctx, parent, token, item, blocks);
        break;
    }
  }
}

/** True when only indentation precedes the token on its line. */
function startsLine(token: Token): boolean {
  return token.column - 1 === token.indent.length;
}

function renderToken(ctx: RenderContext, body: TemplateBody, token: Token, filling: ObjectFilling): string {
  const { policy } = ctx;
  const value = lookup(policy, body, token, filling);

  if (value === undefined) {
    if (policy.dieOnBadParams) {
      throw new MissingParameterError(body.id, token.name, token.line, token.column, ctx.templateStack);
    }
    ctx.recordMissing({ templateId: body.id, token: token.name, line: token.line, column: token.column });
    return '';
  }

  const place = (text: string): string => (policy.fixedIndent ? text : reindent(text, token.indent));
  const lead = (atLineStart: boolean): string => (policy.fixedIndent || !atLineStart ? '' : token.indent);

  switch (value.kind) {
    case 'scalar':
      return renderScalar(policy, value);

    case 'object': {
      const templateId = nestedTemplateId(ctx, value, { templateId: body.id, token: token.name });
      const block = place(renderTemplate(ctx, templateId, value));
      if (!policy.showLabels) {
        return block;
      }
      return wrapWithLabels(block, templateId, token.name, policy.commentDelimiters, lead(startsLine(token)));
    }

    case 'sequence': {
      const blocks: Block[] = [];
      collectBlocks(ctx, body, token, value, blocks);

      const placed: string[] = [];
      let atLineStart = startsLine(token);
      blocks.forEach((block, i) => {
        let text = place(block.text);
        if (policy.showLabels && block.templateId !== undefined) {
          const position = `${token.name}[${i}]`;
          text = wrapWithLabels(text, block.templateId, position, policy.commentDelimiters, lead(atLineStart));
          // the next block's BEGIN label must not share the END label's line
          if (i < blocks.length - 1 && !text.endsWith('\n')) {
            text += '\n';
          }
        }
        placed.push(text);
        atLineStart = text.endsWith('\n');
      });
      return joinBlocks(placed, token.indent, policy.fixedIndent);
    }
  }
}

/**
 * Renders one template instance with `filling` as its fields.
 */
function renderTemplate(ctx: RenderContext, templateId: string, filling: ObjectFilling): string {
  const { policy } = ctx;
  const body = ctx.store.get(templateId);
  if (body === undefined) {
    throw new UnknownTemplateError(templateId, ctx.templateStack);
  }
  if (ctx.depth >= policy.maxDepth) {
    throw new NestingDepthError(policy.maxDepth, [...ctx.templateStack, templateId]);
  }

  ctx.enter(templateId);
  try {
    if (policy.rejectUnknownParams) {
      for (const field of filling.fields.keys()) {
        if (field !== policy.nameLabel && !body.tokenNames.includes(field)) {
          throw new UnknownParameterError(templateId, field, ctx.templateStack);
        }
      }
    }

    let output = '';
    for (const segment of body.segments) {
      output += segment.type === 'text' ? segment.value : renderToken(ctx, body, segment.token, filling);
    }
    return output;
  } finally {
    ctx.leave();
  }
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

function createContext(store: TemplateStore, policy: RenderPolicy): RenderContext {
  if (!sameSyntax(store.syntax, policy.syntax)) {
    throw new SyntaxMismatchError();
  }
  return new RenderContext(store, policy);
}

function requireObject(filling: FillingValue): ObjectFilling {
  if (filling.kind !== 'object') {
    throw new InvalidFillingShapeError(`root filling must be an object, got ${filling.kind}`);
  }
  return filling;
}

/**
 * Renders `templateId` with the fields of `filling`.
 *
 * @throws {RenderError} Any render failure; no partial output is returned.
 * @throws {SyntaxMismatchError} If the policy's token syntax is not the one
 *   the store was sealed with.
 */
export function render(
  store: TemplateStore,
  templateId: string,
  filling: FillingValue,
  policy: RenderPolicy = DEFAULT_RENDER_POLICY,
): string {
  return renderWithReport(store, templateId, filling, policy).output;
}

/**
 * Like {@link render}, but also reports tokens left empty in lenient mode
 * and the templates rendered.
 */
export function renderWithReport(
  store: TemplateStore,
  templateId: string,
  filling: FillingValue,
  policy: RenderPolicy = DEFAULT_RENDER_POLICY,
): RenderReport {
  const ctx = createContext(store, policy);
  const output = renderTemplate(ctx, templateId, requireObject(filling));
  return { output, missing: ctx.missing, templates: ctx.templates };
}

/**
 * Like {@link render}, but returns render failures as a value instead of
 * throwing them. Errors that are not {@link RenderError}s still throw.
 */
export function tryRender(
  store: TemplateStore,
  templateId: string,
  filling: FillingValue,
  policy: RenderPolicy = DEFAULT_RENDER_POLICY,
): RenderResult {
  try {
    return { ok: true, output: render(store, templateId, filling, policy) };
  } catch (err) {
    if (err instanceof RenderError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Renders a filling that names its own template through the name label. A
 * sequence at the root renders each element and concatenates the results.
 */
export function renderTree(
  store: TemplateStore,
  filling: FillingValue,
  policy: RenderPolicy = DEFAULT_RENDER_POLICY,
): string {
  return renderTreeWithReport(store, filling, policy).output;
}

/**
 * Like {@link renderTree}, with the diagnostics of {@link renderWithReport}.
 */
export function renderTreeWithReport(
  store: TemplateStore,
  filling: FillingValue,
  policy: RenderPolicy = DEFAULT_RENDER_POLICY,
): RenderReport {
  const ctx = createContext(store, policy);

  const renderRoot = (value: FillingValue): string => {
    switch (value.kind) {
      case 'scalar':
        throw new InvalidFillingShapeError('root filling must be an object or a sequence, got scalar');
      case 'sequence':
        return value.items.map(renderRoot).join('');
      case 'object':
        return renderTemplate(ctx, nestedTemplateId(ctx, value, {}), value);
    }
  };

  const output = renderRoot(filling);
  return { output, missing: ctx.missing, templates: ctx.templates };
}
