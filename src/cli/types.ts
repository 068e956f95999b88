/**
 * CLI types.
 */

import type { DelimiterPair } from '../types/policy.js';
import type { PlainFilling } from '../types/filling.js';

/** Supported output formats */
export type OutputFormat = 'json' | 'pretty';

/** CLI exit codes */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
  RenderFailed: 7
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Global CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}

/** Render settings accepted in the configuration file */
export interface RenderConfig {
  escapeHtml?: boolean;
  fixedIndent?: boolean;
  showLabels?: boolean;
  dieOnBadParams?: boolean;
  rejectUnknownParams?: boolean;
  nameLabel?: string;
  tokenEscapeChar?: string;
  commentDelimiters?: DelimiterPair;
  tokenDelimiters?: DelimiterPair;
  defaults?: Record<string, PlainFilling>;
  templateDefaults?: Record<string, Record<string, PlainFilling>>;
  maxDepth?: number;
}

/** CLI configuration (from the configuration file) */
export interface CliConfig {
  templates: {
    directory: string;
    extension: string;
  };
  render: RenderConfig;
  output: {
    format: OutputFormat;
    colors: boolean;
  };
}

/** Default CLI configuration */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  templates: {
    directory: 'templates',
    extension: 'html'
  },
  render: {},
  output: {
    format: 'pretty',
    colors: true
  }
};

/** A problem found in one template */
export interface ValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}

/** One template as shown by `list` */
export interface TemplateSummary {
  id: string;
  tokens: string[];
}

/** Result of `check` */
export interface CheckResult {
  valid: boolean;
  templateCount: number;
  errors: ValidationIssue[];
}

type Meta = Record<string, unknown>;

/** Data handed to an output formatter */
export type FormattableData =
  | { type: 'templates'; data: TemplateSummary[]; meta?: Meta }
  | { type: 'check'; data: CheckResult; meta?: Meta }
  | { type: 'render'; data: string; meta?: Meta }
  | { type: 'message'; data: string; meta?: Meta }
  | { type: 'error'; data: string; meta?: Meta };
