/**
 * Reads filling trees from YAML or JSON documents.
 *
 * YAML is a superset of JSON, so both go through the same parser:
 *
 * ```yaml
 * TEMPLATE: page
 * title: Orders
 * rows:
 *   - { TEMPLATE: row, id: 1 }
 *   - { TEMPLATE: row, id: 2 }
 * ```
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { FillingValue } from '../types/filling.js';
import { fromPlain } from '../filling/filling-value.js';
import { FillingLoadError } from '../errors/config-errors.js';
import { InvalidFillingShapeError } from '../errors/render-errors.js';

/**
 * Parses a YAML (or JSON) document into a filling.
 *
 * @throws {FillingLoadError} On a syntax error, an empty document or a value
 *   that is not a plain filling.
 */
export function loadFillingFromYAML(content: string): FillingValue {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new FillingLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new FillingLoadError('Filling document is empty');
  }

  try {
    return fromPlain(parsed);
  } catch (err) {
    if (err instanceof InvalidFillingShapeError) {
      throw new FillingLoadError(err.detail);
    }
    throw err;
  }
}

/**
 * Reads and parses a filling file.
 *
 * @throws {FillingLoadError} On read, syntax or conversion errors.
 */
export async function loadFillingFromFile(filePath: string): Promise<FillingValue> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new FillingLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return loadFillingFromYAML(content);
  } catch (err) {
    if (err instanceof FillingLoadError) {
      throw new FillingLoadError(err.message, filePath);
    }
    throw err;
  }
}
