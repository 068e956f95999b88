export { render, renderWithReport, tryRender, renderTree, renderTreeWithReport } from './composition-engine.js';
export { TemplateNest } from './template-nest.js';
export { RenderContext } from './render-context.js';
export { reindent, joinBlocks, wrapWithLabels, labelText } from './layout.js';
