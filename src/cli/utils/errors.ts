/**
 * CLI error classes.
 */

import { ExitCode, type ValidationIssue } from '../types.js';
import { NestError, RenderError } from '../../errors/base.js';
import { MalformedTokenError } from '../../errors/render-errors.js';
import { TemplateLoadError, FillingLoadError } from '../../errors/config-errors.js';

/** Base CLI error */
export class CliError extends Error {
  public readonly exitCode: ExitCode;
  public override readonly cause: Error | undefined;

  constructor(message: string, exitCode: ExitCode = ExitCode.GeneralError, cause?: Error) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

/** Invalid command line arguments */
export class InvalidArgumentsError extends CliError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.InvalidArguments, cause);
    this.name = 'InvalidArgumentsError';
  }
}

/** File not found */
export class FileNotFoundError extends CliError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`File not found: ${filePath}`, ExitCode.FileNotFound, cause);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** Template check failed */
export class ValidationError extends CliError {
  public readonly errors: ValidationIssue[];

  constructor(message: string, errors: ValidationIssue[] = [], cause?: Error) {
    super(message, ExitCode.ValidationError, cause);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export type { ValidationIssue };

/** Exit code for an error */
export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof MalformedTokenError) {
    return ExitCode.ValidationError;
  }
  if (error instanceof RenderError) {
    return ExitCode.RenderFailed;
  }
  if (error instanceof TemplateLoadError || error instanceof FillingLoadError) {
    return ExitCode.FileNotFound;
  }
  if (error instanceof NestError) {
    return ExitCode.InvalidArguments;
  }
  return ExitCode.GeneralError;
}

/** Formats an error for output */
export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    let message = error.message;
    if (error instanceof ValidationError && error.errors.length > 0) {
      message +=
        '\n' +
        error.errors.map((e) => `  ${e.severity === 'error' ? '✗' : '⚠'} ${e.path}: ${e.message}`).join('\n');
    }
    return message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
