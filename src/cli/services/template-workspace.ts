/**
 * Shared setup for commands that work on a template directory.
 */

import { resolve } from 'node:path';
import type { CliConfig } from '../types.js';
import type { RenderPolicyOptions } from '../../types/policy.js';
import type { TemplateRegistry } from '../../store/template-store.js';
import { loadTemplateDirectory } from '../../loader/template-loader.js';

/** Where to find templates; flags override the configuration */
export interface TemplateSourceOptions {
  templates?: string | undefined;
  extension?: string | undefined;
}

/** Render flags taken from the command line */
export interface RenderFlags {
  escape?: boolean | undefined;
  fixedIndent?: boolean | undefined;
  showLabels?: boolean | undefined;
  lenient?: boolean | undefined;
  rejectUnknown?: boolean | undefined;
  escapeChar?: string | undefined;
  nameLabel?: string | undefined;
}

/** Absolute template directory and extension */
export function resolveTemplateSource(
  options: TemplateSourceOptions,
  config: CliConfig
): { directory: string; extension: string } {
  return {
    directory: resolve(options.templates ?? config.templates.directory),
    extension: options.extension ?? config.templates.extension
  };
}

/** Loads every template of the resolved directory */
export async function loadWorkspace(
  options: TemplateSourceOptions,
  config: CliConfig
): Promise<TemplateRegistry> {
  const { directory, extension } = resolveTemplateSource(options, config);
  return loadTemplateDirectory(directory, { extension });
}

/**
 * Merges configured render settings with command line flags.
 * Flags that were not given leave the configured value in place.
 */
export function buildPolicyOptions(config: CliConfig, flags: RenderFlags): RenderPolicyOptions {
  const policy: RenderPolicyOptions = { ...config.render };

  if (flags.escape === false) policy.escapeHtml = false;
  if (flags.fixedIndent === true) policy.fixedIndent = true;
  if (flags.showLabels === true) policy.showLabels = true;
  if (flags.lenient === true) policy.dieOnBadParams = false;
  if (flags.rejectUnknown === true) policy.rejectUnknownParams = true;
  if (flags.escapeChar !== undefined) policy.tokenEscapeChar = flags.escapeChar;
  if (flags.nameLabel !== undefined) policy.nameLabel = flags.nameLabel;

  return policy;
}
