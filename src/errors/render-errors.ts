/**
 * Errors that abort a render.
 *
 * @module
 */

import { RenderError } from './base.js';

/**
 * A template id was not found in the store.
 */
export class UnknownTemplateError extends RenderError {
  override readonly kind = 'UnknownTemplate' as const;
  readonly templateId: string;

  constructor(templateId: string, templateStack: readonly string[] = []) {
    super(`Unknown template "${templateId}"`, templateStack);
    this.name = 'UnknownTemplateError';
    this.templateId = templateId;
  }
}

/**
 * A token had no filling value and no default while `dieOnBadParams` was on.
 */
export class MissingParameterError extends RenderError {
  override readonly kind = 'MissingParameter' as const;
  readonly templateId: string;
  readonly token: string;
  readonly line: number;
  readonly column: number;

  constructor(
    templateId: string,
    token: string,
    line: number,
    column: number,
    templateStack: readonly string[] = [],
  ) {
    super(
      `Missing parameter "${token}" for template "${templateId}" at line ${line}, column ${column}`,
      templateStack,
    );
    this.name = 'MissingParameterError';
    this.templateId = templateId;
    this.token = token;
    this.line = line;
    this.column = column;
  }
}

/** Why the scanner rejected a token. */
export type MalformedTokenReason = 'unterminated' | 'nested' | 'empty';

const REASON_TEXT: Readonly<Record<MalformedTokenReason, string>> = {
  unterminated: 'token is never closed',
  nested: 'another token opens before this one is closed',
  empty: 'token name is empty',
};

/**
 * The scanner found a token it cannot interpret.
 */
export class MalformedTokenError extends RenderError {
  override readonly kind = 'MalformedToken' as const;
  readonly templateId: string;
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly reason: MalformedTokenReason;

  constructor(
    templateId: string,
    reason: MalformedTokenReason,
    position: { offset: number; line: number; column: number },
    templateStack: readonly string[] = [],
  ) {
    super(
      `Malformed token in template "${templateId}" at line ${position.line}, column ${position.column}: ${REASON_TEXT[reason]}`,
      templateStack,
    );
    this.name = 'MalformedTokenError';
    this.templateId = templateId;
    this.reason = reason;
    this.offset = position.offset;
    this.line = position.line;
    this.column = position.column;
  }
}

/**
 * A filling value has a shape the engine cannot render, such as an object
 * without a template name.
 */
export class InvalidFillingShapeError extends RenderError {
  override readonly kind = 'InvalidFillingShape' as const;
  readonly templateId: string | undefined;
  readonly token: string | undefined;
  readonly detail: string;

  constructor(
    detail: string,
    location: { templateId?: string | undefined; token?: string | undefined } = {},
    templateStack: readonly string[] = [],
  ) {
    const where =
      location.templateId !== undefined && location.token !== undefined
        ? ` for token "${location.token}" in template "${location.templateId}"`
        : '';
    super(`Invalid filling${where}: ${detail}`, templateStack);
    this.name = 'InvalidFillingShapeError';
    this.templateId = location.templateId;
    this.token = location.token;
    this.detail = detail;
  }
}

/**
 * A filling field does not match any token of its template while
 * `rejectUnknownParams` was on.
 */
export class UnknownParameterError extends RenderError {
  override readonly kind = 'UnknownParameter' as const;
  readonly templateId: string;
  readonly parameter: string;

  constructor(templateId: string, parameter: string, templateStack: readonly string[] = []) {
    super(`Parameter "${parameter}" is not a token of template "${templateId}"`, templateStack);
    this.name = 'UnknownParameterError';
    this.templateId = templateId;
    this.parameter = parameter;
  }
}

/**
 * Template nesting exceeded the policy's `maxDepth`.
 */
export class NestingDepthError extends RenderError {
  override readonly kind = 'NestingTooDeep' as const;
  readonly maxDepth: number;

  constructor(maxDepth: number, templateStack: readonly string[] = []) {
    super(`Template nesting exceeds the maximum depth of ${maxDepth}`, templateStack);
    this.name = 'NestingDepthError';
    this.maxDepth = maxDepth;
  }
}

/** Type guard for any render-time error. */
export function isRenderError(err: unknown): err is RenderError {
  return err instanceof RenderError;
}
