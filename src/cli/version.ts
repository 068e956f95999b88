/**
 * CLI version, read from package.json.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

function loadVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // src/cli and dist/cli both sit two levels below the package root
    const packagePath = resolve(__dirname, '../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      const { version } = packageJson;
      if (typeof version === 'string') return version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const version = loadVersion();
