/**
 * Errors raised while configuring the engine or loading its inputs.
 *
 * @module
 */

import { NestError } from './base.js';

/** Invalid render policy options. */
export class PolicyError extends NestError {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyError';
  }
}

/** Misuse of a template registry or store. */
export class StoreError extends NestError {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

/** A template id was registered twice. */
export class DuplicateTemplateError extends StoreError {
  readonly templateId: string;

  constructor(templateId: string) {
    super(`Template "${templateId}" is already registered`);
    this.name = 'DuplicateTemplateError';
    this.templateId = templateId;
  }
}

/**
 * The policy's token syntax differs from the syntax the store was scanned
 * with.
 */
export class SyntaxMismatchError extends StoreError {
  constructor() {
    super('Render policy token syntax does not match the syntax the template store was sealed with');
    this.name = 'SyntaxMismatchError';
  }
}

/** Reading template files failed. */
export class TemplateLoadError extends NestError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'TemplateLoadError';
  }
}

/** Reading or converting a filling document failed. */
export class FillingLoadError extends NestError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'FillingLoadError';
  }
}
