import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { listCommand, type ListCommandOptions } from '../../../../src/cli/commands/list.js';
import { DEFAULT_CLI_CONFIG, type CliConfig } from '../../../../src/cli/types.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';
import { TemplateLoadError } from '../../../../src/errors/config-errors.js';

const templatesDir = resolve(__dirname, '../../../fixtures/templates');

function createOptions(overrides: Partial<ListCommandOptions> = {}): ListCommandOptions {
  return {
    format: 'pretty',
    quiet: false,
    noColor: true,
    config: undefined,
    templates: templatesDir,
    ...overrides,
  };
}

function spyOnLog() {
  return vi.spyOn(console, 'log').mockImplementation(() => {});
}

describe('listCommand', () => {
  let consoleLogSpy: ReturnType<typeof spyOnLog>;

  beforeEach(() => {
    setOutputOptions({ format: 'pretty', quiet: false, noColor: true });
    consoleLogSpy = spyOnLog();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('lists templates with their tokens', async () => {
    await listCommand(createOptions(), DEFAULT_CLI_CONFIG);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      [
        'Found 3 template(s):',
        '',
        'page',
        '  Tokens: title, content',
        'para',
        '  Tokens: text',
        'parts/nav-item',
        '  Tokens: label',
      ].join('\n'),
    );
  });

  it('takes the directory from the configuration', async () => {
    const config: CliConfig = { ...DEFAULT_CLI_CONFIG, templates: { directory: templatesDir, extension: 'html' } };
    await listCommand(createOptions({ templates: undefined }), config);

    expect(String(consoleLogSpy.mock.calls[0]?.[0])).toMatch(/^Found 3 template\(s\):/);
  });

  it('prints JSON', async () => {
    setOutputOptions({ format: 'json' });
    await listCommand(createOptions({ format: 'json' }), DEFAULT_CLI_CONFIG);

    const parsed: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(parsed).toEqual({
      success: true,
      data: [
        { id: 'page', tokens: ['title', 'content'] },
        { id: 'para', tokens: ['text'] },
        { id: 'parts/nav-item', tokens: ['label'] },
      ],
      meta: { count: 3 },
    });
  });

  it('fails for a missing directory', async () => {
    await expect(
      listCommand(createOptions({ templates: resolve(templatesDir, 'nope') }), DEFAULT_CLI_CONFIG),
    ).rejects.toThrow(TemplateLoadError);
  });
});
