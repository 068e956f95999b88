import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { resetConfigCache } from '../../../src/cli/utils/config.js';

const fixturesDir = resolve(__dirname, '../../fixtures');

function captureProcess() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`exit ${String(code)}`);
  });
  return { log, error, write, exit };
}

/** A fresh CLI instance per run; commands register on module load. */
async function runCli(...args: string[]): Promise<void> {
  vi.resetModules();
  const { run } = await import('../../../src/cli/cli.js');
  await run(['node', 'nestplate', ...args]);
}

describe('nestplate CLI', () => {
  let io: ReturnType<typeof captureProcess>;

  beforeEach(() => {
    resetConfigCache();
    io = captureProcess();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the version', async () => {
    await runCli('version');
    expect(io.log).toHaveBeenCalledWith('nestplate v0.1.0');
  });

  it('renders a template to stdout', async () => {
    await runCli(
      'render',
      'parts/nav-item',
      '-d',
      resolve(fixturesDir, 'templates'),
      '-i',
      resolve(fixturesDir, 'fillings', 'nav.json'),
      '--no-color',
    );

    expect(io.write).toHaveBeenCalledWith('<li>Home &amp; &lt;away&gt;</li>\n');
    expect(io.exit).not.toHaveBeenCalled();
  });

  it('lists templates as JSON', async () => {
    await runCli('list', '--templates', resolve(fixturesDir, 'templates'), '-f', 'json');

    const parsed: unknown = JSON.parse(String(io.log.mock.calls[0]?.[0]));
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

  it('exits with the validation code when a check fails', async () => {
    await expect(runCli('check', '-d', resolve(fixturesDir, 'broken'), '--no-color')).rejects.toThrow();

    expect(io.exit.mock.calls[0]).toEqual([3]);
    expect(io.error).toHaveBeenCalledWith('Check failed with 1 error(s)');
  });

  it('exits with the render code when a value is missing', async () => {
    await expect(runCli('render', 'para', '-d', resolve(fixturesDir, 'templates'))).rejects.toThrow();

    expect(io.exit.mock.calls[0]).toEqual([7]);
    expect(io.error).toHaveBeenCalledWith('Missing parameter "text" for template "para" at line 1, column 4');
  });

  it('rejects an unknown output format', async () => {
    await expect(runCli('list', '-f', 'xml')).rejects.toThrow();

    expect(io.exit.mock.calls[0]).toEqual([2]);
    expect(io.error).toHaveBeenCalledWith('Unknown output format "xml", expected json or pretty');
  });
});
