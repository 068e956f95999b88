/**
 * The render command.
 * Renders a template (or a filling that names its template) to stdout or a file.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import type { FillingValue } from '../../types/filling.js';
import type { RenderReport } from '../../types/render.js';
import { createRenderPolicy } from '../../policy/render-policy.js';
import { renderTreeWithReport, renderWithReport } from '../../engine/composition-engine.js';
import { loadFillingFromFile } from '../../loader/filling-loader.js';
import { object } from '../../filling/filling-value.js';
import {
  buildPolicyOptions,
  loadWorkspace,
  type RenderFlags,
  type TemplateSourceOptions
} from '../services/template-workspace.js';
import { FileNotFoundError, InvalidArgumentsError } from '../utils/errors.js';
import { fileExists, writeTextFile } from '../utils/files.js';
import { print, printData, printError, printRaw, success, warning } from '../utils/output.js';

/** Options of the render command */
export interface RenderCommandOptions extends GlobalOptions, TemplateSourceOptions, RenderFlags {
  input?: string | undefined;
  output?: string | undefined;
}

async function readFilling(input: string | undefined): Promise<FillingValue> {
  if (input === undefined) {
    return object();
  }
  if (!fileExists(input)) {
    throw new FileNotFoundError(input);
  }
  return loadFillingFromFile(input);
}

/**
 * Action of the render command.
 */
export async function renderCommand(
  template: string | undefined,
  options: RenderCommandOptions,
  config: CliConfig
): Promise<void> {
  if (template === undefined && options.input === undefined) {
    throw new InvalidArgumentsError('Give a template id or an input file whose root names its template');
  }

  const policy = createRenderPolicy(buildPolicyOptions(config, options));
  const registry = await loadWorkspace(options, config);
  const store = registry.seal(policy.syntax);
  const filling = await readFilling(options.input);

  const report: RenderReport =
    template === undefined
      ? renderTreeWithReport(store, filling, policy)
      : renderWithReport(store, template, filling, policy);

  if (!options.quiet) {
    for (const missing of report.missing) {
      printError(
        warning(`Missing "${missing.token}" in ${missing.templateId} at ${missing.line}:${missing.column}`)
      );
    }
  }

  if (options.output !== undefined) {
    const written = writeTextFile(options.output, report.output);
    if (options.format === 'json') {
      printData({ type: 'message', data: `Rendered to ${written}`, meta: { templates: report.templates } });
    } else {
      print(success(`Rendered ${report.templates.length} template instance(s) to ${written}`));
    }
    return;
  }

  if (options.format === 'json') {
    printData({
      type: 'render',
      data: report.output,
      meta: { missing: report.missing, templates: report.templates }
    });
  } else {
    printRaw(report.output);
  }
}
