/**
 * The list command.
 * Lists templates of the template directory with their tokens.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import type { TemplateSummary } from '../types.js';
import { createRenderPolicy } from '../../policy/render-policy.js';
import { loadWorkspace, type TemplateSourceOptions } from '../services/template-workspace.js';
import { printData } from '../utils/output.js';

/** Options of the list command */
export interface ListCommandOptions extends GlobalOptions, TemplateSourceOptions {
  escapeChar?: string | undefined;
}

/**
 * Action of the list command.
 */
export async function listCommand(options: ListCommandOptions, config: CliConfig): Promise<void> {
  const policy = createRenderPolicy({
    ...config.render,
    ...(options.escapeChar !== undefined && { tokenEscapeChar: options.escapeChar })
  });
  const registry = await loadWorkspace(options, config);
  const store = registry.seal(policy.syntax);

  const templates: TemplateSummary[] = store.ids().map((id) => ({
    id,
    tokens: [...(store.get(id)?.tokenNames ?? [])]
  }));

  printData({ type: 'templates', data: templates, meta: { count: templates.length } });
}
