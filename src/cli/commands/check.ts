/**
 * The check command.
 * Scans every template and reports malformed tokens.
 */

import type { CheckResult, CliConfig, GlobalOptions, ValidationIssue } from '../types.js';
import { createRenderPolicy } from '../../policy/render-policy.js';
import { scanTemplate } from '../../scanner/token-scanner.js';
import { MalformedTokenError } from '../../errors/render-errors.js';
import { loadWorkspace, type TemplateSourceOptions } from '../services/template-workspace.js';
import { ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';

/** Options of the check command */
export interface CheckCommandOptions extends GlobalOptions, TemplateSourceOptions {
  escapeChar?: string | undefined;
}

/**
 * Action of the check command.
 */
export async function checkCommand(options: CheckCommandOptions, config: CliConfig): Promise<void> {
  const policy = createRenderPolicy({
    ...config.render,
    ...(options.escapeChar !== undefined && { tokenEscapeChar: options.escapeChar })
  });
  const registry = await loadWorkspace(options, config);

  const errors: ValidationIssue[] = [];
  for (const [id, source] of registry.entries()) {
    try {
      scanTemplate(source, policy.syntax, id);
    } catch (err) {
      if (!(err instanceof MalformedTokenError)) {
        throw err;
      }
      errors.push({ path: `${id}:${err.line}:${err.column}`, message: err.message, severity: 'error' });
    }
  }

  const result: CheckResult = {
    valid: errors.length === 0,
    templateCount: registry.size,
    errors
  };

  printData({ type: 'check', data: result });

  if (!result.valid) {
    throw new ValidationError(`Check failed with ${errors.length} error(s)`);
  }
}
