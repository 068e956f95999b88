export type { TokenSyntax, Token, Segment, ScannedTemplate, TemplateBody } from './template.js';
export type {
  ScalarValue,
  ScalarFilling,
  ObjectFilling,
  SequenceFilling,
  FillingValue,
  PlainFilling,
  PlainFillingObject,
} from './filling.js';
export type { DelimiterPair, RenderPolicyOptions, RenderPolicy } from './policy.js';
export type { MissingToken, RenderReport, RenderResult } from './render.js';
