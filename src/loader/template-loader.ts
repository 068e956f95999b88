/**
 * Loads template files from disk into a {@link TemplateRegistry}.
 *
 * Template ids are file paths relative to the template directory, with `/`
 * separators and without the extension:
 *
 * ```
 * templates/page.html           → "page"
 * templates/parts/nav-item.html → "parts/nav-item"
 * ```
 *
 * @module
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { TemplateRegistry } from '../store/template-store.js';
import { TemplateLoadError } from '../errors/config-errors.js';

export const DEFAULT_TEMPLATE_EXTENSION = 'html';

export interface DirectoryLoadOptions {
  /** File extension without the dot. Default `'html'`. */
  extension?: string;
  /** Registry to add to; a new one is created when omitted. */
  registry?: TemplateRegistry;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function collectFiles(root: string, relative: string, suffix: string, out: string[]): Promise<void> {
  const entries = await readdir(join(root, relative), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const child = relative.length > 0 ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      await collectFiles(root, child, suffix, out);
    } else if (entry.isFile() && entry.name.endsWith(suffix)) {
      out.push(child);
    }
  }
}

/**
 * Reads one template file and registers it under `id`.
 *
 * @throws {TemplateLoadError} If the file cannot be read.
 */
export async function loadTemplateFile(
  registry: TemplateRegistry,
  id: string,
  filePath: string,
): Promise<TemplateRegistry> {
  let body: string;
  try {
    body = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new TemplateLoadError(`Failed to read template: ${describe(err)}`, filePath);
  }
  return registry.register(id, body);
}

/**
 * Registers every `*.<extension>` file under `directory`, recursively, in
 * path order.
 *
 * @throws {TemplateLoadError} If the directory does not exist or a file
 *   cannot be read.
 */
export async function loadTemplateDirectory(
  directory: string,
  options: DirectoryLoadOptions = {},
): Promise<TemplateRegistry> {
  const extension = options.extension ?? DEFAULT_TEMPLATE_EXTENSION;
  const registry = options.registry ?? new TemplateRegistry();
  const suffix = `.${extension}`;

  try {
    const info = await stat(directory);
    if (!info.isDirectory()) {
      throw new TemplateLoadError('Expected a template directory', directory);
    }
  } catch (err) {
    if (err instanceof TemplateLoadError) throw err;
    throw new TemplateLoadError(`Template directory not found: ${describe(err)}`, directory);
  }

  const files: string[] = [];
  try {
    await collectFiles(directory, '', suffix, files);
  } catch (err) {
    throw new TemplateLoadError(`Failed to list templates: ${describe(err)}`, directory);
  }

  for (const file of files) {
    await loadTemplateFile(registry, file.slice(0, -suffix.length), join(directory, file));
  }

  return registry;
}
