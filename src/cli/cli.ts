/**
 * Main CLI setup with CAC.
 */

import { cac } from 'cac';
import { version } from './version.js';
import type { CliConfig, GlobalOptions, OutputFormat } from './types.js';
import { loadConfig } from './utils/config.js';
import { setOutputOptions, printError, print } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { renderCommand, type RenderCommandOptions } from './commands/render.js';
import { listCommand, type ListCommandOptions } from './commands/list.js';
import { checkCommand, type CheckCommandOptions } from './commands/check.js';

/** CLI instance */
const cli = cac('nestplate');

/**
 * Promise of the running async action.
 * CAC does not await async action handlers, so run() does.
 */
let _actionPromise: Promise<void> | undefined;

/** Wraps an async action handler so run() can await its promise. */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args);
  };
}

type RawOptions = Record<string, unknown>;

/** Reads an option that takes a value; CAC hands numeric values over as numbers */
function stringOption(options: RawOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new InvalidArgumentsError(`Option "${key}" expects a value`);
}

function booleanOption(options: RawOptions, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'pretty';
}

/** Processes the global options */
function processGlobalOptions(options: RawOptions): { global: GlobalOptions; config: CliConfig } {
  const configPath = stringOption(options, 'config');
  const config = loadConfig(configPath);

  const requested = stringOption(options, 'format');
  if (requested !== undefined && !isOutputFormat(requested)) {
    throw new InvalidArgumentsError(`Unknown output format "${requested}", expected json or pretty`);
  }
  const format = requested ?? config.output.format;
  const quiet = booleanOption(options, 'quiet') ?? false;
  // `--no-color` arrives as `color: false`
  const noColor = booleanOption(options, 'color') === false || !config.output.colors;

  setOutputOptions({ format, quiet, noColor });

  return {
    global: { format, quiet, noColor, config: configPath },
    config
  };
}

/** Template source options shared by every template command */
function templateSourceOptions(options: RawOptions): { templates: string | undefined; extension: string | undefined } {
  return {
    templates: stringOption(options, 'templates'),
    extension: stringOption(options, 'extension')
  };
}

/** Runs a command action and turns its failure into an exit code */
async function execute(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

/** Registers the global options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty', {
      default: undefined
    })
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file');
}

/** Registers the version command */
function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    print(`nestplate v${version}`);
  });
}

/** Registers the render command */
function registerRenderCommand(): void {
  cli
    .command('render [template]', 'Render a template with a filling')
    .option('-d, --templates <dir>', 'Template directory')
    .option('-x, --extension <ext>', 'Template file extension')
    .option('-i, --input <file>', 'Filling file (YAML or JSON)')
    .option('-o, --output <file>', 'Write the result to a file')
    .option('--no-escape', 'Do not HTML-escape string values')
    .option('--fixed-indent', 'Do not re-indent nested templates')
    .option('--show-labels', 'Wrap nested templates in BEGIN/END comments')
    .option('--lenient', 'Render missing tokens as empty text')
    .option('--reject-unknown', 'Fail on filling fields that are not tokens')
    .option('--escape-char <char>', 'Character that escapes a token opener')
    .option('--name-label <label>', 'Field that names the template of a filling')
    .action(tracked(async (template: string | undefined, options: RawOptions) => {
      await execute(async () => {
        const { global, config } = processGlobalOptions(options);
        const renderOptions: RenderCommandOptions = {
          ...global,
          ...templateSourceOptions(options),
          input: stringOption(options, 'input'),
          output: stringOption(options, 'output'),
          escape: booleanOption(options, 'escape'),
          fixedIndent: booleanOption(options, 'fixedIndent'),
          showLabels: booleanOption(options, 'showLabels'),
          lenient: booleanOption(options, 'lenient'),
          rejectUnknown: booleanOption(options, 'rejectUnknown'),
          escapeChar: stringOption(options, 'escapeChar'),
          nameLabel: stringOption(options, 'nameLabel')
        };
        await renderCommand(template, renderOptions, config);
      });
    }));
}

/** Registers the list command */
function registerListCommand(): void {
  cli
    .command('list', 'List templates and their tokens')
    .option('-d, --templates <dir>', 'Template directory')
    .option('-x, --extension <ext>', 'Template file extension')
    .option('--escape-char <char>', 'Character that escapes a token opener')
    .action(tracked(async (options: RawOptions) => {
      await execute(async () => {
        const { global, config } = processGlobalOptions(options);
        const listOptions: ListCommandOptions = {
          ...global,
          ...templateSourceOptions(options),
          escapeChar: stringOption(options, 'escapeChar')
        };
        await listCommand(listOptions, config);
      });
    }));
}

/** Registers the check command */
function registerCheckCommand(): void {
  cli
    .command('check', 'Check templates for malformed tokens')
    .option('-d, --templates <dir>', 'Template directory')
    .option('-x, --extension <ext>', 'Template file extension')
    .option('--escape-char <char>', 'Character that escapes a token opener')
    .action(tracked(async (options: RawOptions) => {
      await execute(async () => {
        const { global, config } = processGlobalOptions(options);
        const checkOptions: CheckCommandOptions = {
          ...global,
          ...templateSourceOptions(options),
          escapeChar: stringOption(options, 'escapeChar')
        };
        await checkCommand(checkOptions, config);
      });
    }));
}

/** Initializes and runs the CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerRenderCommand();
  registerListCommand();
  registerCheckCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

export { cli };
