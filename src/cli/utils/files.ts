/**
 * File helpers for CLI output.
 */

import { writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { resolve, dirname } from 'node:path';

/**
 * Writes text to a file, creating missing parent directories.
 * @returns Absolute path of the written file
 */
export function writeTextFile(filePath: string, content: string): string {
  const absolutePath = resolve(filePath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  writeFileSync(absolutePath, content, 'utf-8');
  return absolutePath;
}

/**
 * Checks whether a file exists.
 */
export function fileExists(filePath: string): boolean {
  return existsSync(resolve(filePath));
}
