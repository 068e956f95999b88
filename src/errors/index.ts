export { NestError, RenderError } from './base.js';
export type { RenderErrorKind } from './base.js';
export {
  UnknownTemplateError,
  MissingParameterError,
  MalformedTokenError,
  InvalidFillingShapeError,
  UnknownParameterError,
  NestingDepthError,
  isRenderError,
} from './render-errors.js';
export type { MalformedTokenReason } from './render-errors.js';
export {
  PolicyError,
  StoreError,
  DuplicateTemplateError,
  SyntaxMismatchError,
  TemplateLoadError,
  FillingLoadError,
} from './config-errors.js';
