/**
 * Root of the error hierarchy.
 *
 * Every error thrown by nestplate extends {@link NestError}, so callers can
 * catch everything coming out of the library with a single check:
 *
 * ```typescript
 * try {
 *   nest.render('page', filling);
 * } catch (err) {
 *   if (err instanceof NestError) {
 *     // rendering, policy, store or loader failure
 *   }
 * }
 * ```
 *
 * @module
 */

/**
 * Base class for all nestplate errors.
 */
export class NestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NestError';
  }
}

/**
 * Discriminant carried by every {@link RenderError}.
 */
export type RenderErrorKind =
  | 'UnknownTemplate'
  | 'MissingParameter'
  | 'MalformedToken'
  | 'InvalidFillingShape'
  | 'UnknownParameter'
  | 'NestingTooDeep';

/**
 * Base class for errors that abort a render.
 *
 * `templateStack` lists the template ids that were being rendered when the
 * error occurred, outermost first. It is empty for errors raised outside a
 * render (e.g. a malformed token found while sealing a registry).
 */
export abstract class RenderError extends NestError {
  abstract readonly kind: RenderErrorKind;
  readonly templateStack: readonly string[];

  constructor(message: string, templateStack: readonly string[] = []) {
    super(templateStack.length > 1 ? `${message} (in ${templateStack.join(' > ')})` : message);
    this.name = 'RenderError';
    this.templateStack = templateStack;
  }
}
