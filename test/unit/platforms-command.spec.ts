import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Command } from 'commander';
import { registerPlatformsCommand } from '../../src/commands/platforms';
import { renderJson, renderPlatformsTable } from '../../src/lib/render';
import { SUPPORTED_PLATFORMS } from '../../src/lib/platforms';
import { CliConfigError } from '../../src/lib/errors';
import type { CliContext, FcloudConfig } from '../../src/lib/types';

const mockError = vi.fn();

vi.mock('../../src/lib/console', () => ({
  Console: {
    info: vi.fn(),
    error: (...args: unknown[]) => mockError(...args),
  },
}));

vi.mock('../../src/lib/render', () => ({
  renderJson: vi.fn(),
  renderPlatformsTable: vi.fn(),
}));

describe('platforms command', () => {
  let config: FcloudConfig;
  let loadError: Error | undefined;

  const ctx: CliContext = {
    get config() {
      if (loadError) throw loadError;
      return config;
    },
  };

  async function run(...args: string[]) {
    const program = new Command();
    program.exitOverride();
    registerPlatformsCommand(program, ctx);
    await program.parseAsync(['node', 'test', 'platforms', ...args]);
  }

  beforeEach(() => {
    config = { projectDir: '.', output: 'table', padding: 3, quiet: false, yes: false };
    loadError = undefined;
    vi.clearAllMocks();
  });

  it('renders a table with the configured padding', async () => {
    await run();

    expect(renderPlatformsTable).toHaveBeenCalledWith(SUPPORTED_PLATFORMS, 3);
    expect(renderJson).not.toHaveBeenCalled();
  });

  it('renders JSON when asked with --json', async () => {
    await run('--json');

    expect(renderJson).toHaveBeenCalledWith(SUPPORTED_PLATFORMS);
    expect(renderPlatformsTable).not.toHaveBeenCalled();
  });

  it('renders JSON when the config selects it', async () => {
    config = { ...config, output: 'json' };

    await run();

    expect(renderJson).toHaveBeenCalledWith(SUPPORTED_PLATFORMS);
  });

  it('reports a broken CLI config', async () => {
    loadError = new CliConfigError('Failed to read config file /tmp/fcloud.yaml', '/tmp/fcloud.yaml');

    await run();

    expect(mockError).toHaveBeenCalledWith('Failed to read config file /tmp/fcloud.yaml');
    expect(process.exitCode).toBe(1);
  });
});
