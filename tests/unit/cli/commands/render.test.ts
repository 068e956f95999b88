import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { renderCommand, type RenderCommandOptions } from '../../../../src/cli/commands/render.js';
import { DEFAULT_CLI_CONFIG, type CliConfig } from '../../../../src/cli/types.js';
import { FileNotFoundError, InvalidArgumentsError } from '../../../../src/cli/utils/errors.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';
import { MissingParameterError } from '../../../../src/errors/render-errors.js';

const fixturesDir = resolve(__dirname, '../../../fixtures');
const fillingsDir = resolve(fixturesDir, 'fillings');

const config: CliConfig = {
  ...DEFAULT_CLI_CONFIG,
  templates: { directory: resolve(fixturesDir, 'templates'), extension: 'html' },
};

function createOptions(overrides: Partial<RenderCommandOptions> = {}): RenderCommandOptions {
  return {
    format: 'pretty',
    quiet: false,
    noColor: true,
    config: undefined,
    ...overrides,
  };
}

function captureOutput() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  return {
    log,
    error,
    write,
    written: (): string => write.mock.calls.map((call) => String(call[0])).join(''),
    restore: (): void => {
      log.mockRestore();
      error.mockRestore();
      write.mockRestore();
    },
  };
}

describe('renderCommand', () => {
  let io: ReturnType<typeof captureOutput>;

  beforeEach(() => {
    setOutputOptions({ format: 'pretty', quiet: false, noColor: true });
    io = captureOutput();
  });

  afterEach(() => {
    io.restore();
  });

  describe('pretty output', () => {
    it('renders a named template with an input file', async () => {
      await renderCommand('parts/nav-item', createOptions({ input: resolve(fillingsDir, 'nav.json') }), config);
      expect(io.written()).toBe('<li>Home &amp; &lt;away&gt;</li>\n');
    });

    it('renders the template named by the input', async () => {
      await renderCommand(undefined, createOptions({ input: resolve(fillingsDir, 'page.yaml') }), config);

      expect(io.written()).toBe(
        '<html>\n  <head><title>Fish &amp; Chips</title></head>\n  <body>\n    <p>First</p>\n    <p>Second</p>\n\n  </body>\n</html>\n',
      );
    });

    it('turns escaping off with --no-escape', async () => {
      await renderCommand(
        'parts/nav-item',
        createOptions({ input: resolve(fillingsDir, 'nav.json'), escape: false }),
        config,
      );
      expect(io.written()).toBe('<li>Home & <away></li>\n');
    });

    it('uses render settings from the configuration', async () => {
      await renderCommand(
        'parts/nav-item',
        createOptions({ input: resolve(fillingsDir, 'nav.json') }),
        { ...config, render: { escapeHtml: false } },
      );
      expect(io.written()).toBe('<li>Home & <away></li>\n');
    });

    it('renders a template without input from defaults', async () => {
      await renderCommand('para', createOptions(), { ...config, render: { defaults: { text: 'from config' } } });
      expect(io.written()).toBe('<p>from config</p>\n');
    });
  });

  describe('missing values', () => {
    it('fails in strict mode', async () => {
      await expect(
        renderCommand(undefined, createOptions({ input: resolve(fillingsDir, 'missing.yaml') }), config),
      ).rejects.toThrow(MissingParameterError);
      expect(io.write).not.toHaveBeenCalled();
    });

    it('warns in lenient mode', async () => {
      await renderCommand(
        undefined,
        createOptions({ input: resolve(fillingsDir, 'missing.yaml'), lenient: true }),
        config,
      );

      expect(io.written()).toBe('<p></p>\n');
      expect(io.error).toHaveBeenCalledWith('⚠ Missing "text" in para at 1:4');
    });

    it('keeps quiet about missing values with --quiet', async () => {
      await renderCommand(
        undefined,
        createOptions({ input: resolve(fillingsDir, 'missing.yaml'), lenient: true, quiet: true }),
        config,
      );
      expect(io.error).not.toHaveBeenCalled();
    });
  });

  describe('arguments', () => {
    it('needs a template or an input', async () => {
      await expect(renderCommand(undefined, createOptions(), config)).rejects.toThrow(InvalidArgumentsError);
    });

    it('fails for a missing input file', async () => {
      await expect(
        renderCommand('para', createOptions({ input: resolve(fillingsDir, 'nope.yaml') }), config),
      ).rejects.toThrow(FileNotFoundError);
    });
  });

  describe('json output', () => {
    it('prints the output with diagnostics', async () => {
      setOutputOptions({ format: 'json' });
      await renderCommand(
        'para',
        createOptions({ format: 'json', input: resolve(fillingsDir, 'missing.yaml'), lenient: true }),
        config,
      );

      const parsed: unknown = JSON.parse(String(io.log.mock.calls[0]?.[0]));
      expect(parsed).toEqual({
        success: true,
        output: '<p></p>\n',
        meta: {
          missing: [{ templateId: 'para', token: 'text', line: 1, column: 4 }],
          templates: ['para'],
        },
      });
    });
  });

  describe('output file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'nestplate-render-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes the result to a file', async () => {
      const target = join(dir, 'out', 'nav.html');
      await renderCommand(
        'parts/nav-item',
        createOptions({ input: resolve(fillingsDir, 'nav.json'), output: target }),
        config,
      );

      expect(await readFile(target, 'utf-8')).toBe('<li>Home &amp; &lt;away&gt;</li>\n');
      expect(io.log).toHaveBeenCalledWith(`✓ Rendered 1 template instance(s) to ${target}`);
      expect(io.write).not.toHaveBeenCalled();
    });
  });
});
