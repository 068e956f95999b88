/**
 * Terminal output for the `nestplate` commands.
 *
 * Rendered documents go to stdout untouched; status lines and diagnostics
 * respect `--quiet` and the color settings.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';

interface OutputSettings {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

let settings: OutputSettings = { quiet: false, noColor: false, format: 'pretty' };

/** Updates the settings shared by every command. */
export function setOutputOptions(options: Partial<OutputSettings>): void {
  settings = { ...settings, ...options };
}

// NO_COLOR wins over FORCE_COLOR; without either, color follows the TTY.
function colorEnabled(): boolean {
  if (settings.noColor || process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
}

const GREEN = 32;
const YELLOW = 33;

function paint(text: string, code: number): string {
  return colorEnabled() ? `\x1b[${code}m${text}\x1b[0m` : text;
}

/** `✓ message` */
export function success(message: string): string {
  return `${paint('✓', GREEN)} ${message}`;
}

/** `⚠ message`, all of it yellow */
export function warning(message: string): string {
  return `${paint('⚠', YELLOW)} ${paint(message, YELLOW)}`;
}

/** Prints a line to stdout unless quiet. */
export function print(message: string): void {
  if (!settings.quiet) {
    console.log(message);
  }
}

/** Writes text to stdout as is, without a trailing newline. */
export function printRaw(text: string): void {
  process.stdout.write(text);
}

/** Prints a line to stderr, quiet or not. */
export function printError(message: string): void {
  console.error(message);
}

/**
 * Formats `data` with the selected formatter. Errors go to stderr and are
 * printed even when quiet.
 */
export function printData(data: FormattableData): void {
  const isError = data.type === 'error';
  if (settings.quiet && !isError) {
    return;
  }

  const output = createFormatter(settings.format, colorEnabled()).format(data);
  if (isError) {
    printError(output);
  } else {
    print(output);
  }
}
