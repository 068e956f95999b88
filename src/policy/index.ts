export {
  createRenderPolicy,
  withPolicy,
  DEFAULT_RENDER_POLICY,
  DEFAULT_COMMENT_DELIMITERS,
  DEFAULT_MAX_DEPTH,
} from './render-policy.js';
export { escapeHtml, noEscape } from './escape.js';
export type { Escaper } from './escape.js';
