import { Command } from 'commander';
import { Console } from './lib/console';
import { loadConfig } from './lib/config';
import { exitCodeFor, handleError } from './lib/errors';
import { registerInitCommand } from './commands/init';
import { registerPlatformsCommand } from './commands/platforms';
import type { CliContext, CliOptions, FcloudConfig } from './lib/types';

export async function createCli(argv = process.argv) {
  const program = new Command();

  program
    .name('fcloud')
    .description('Prepare Flutter projects for a cloud backend')
    .configureOutput({
      outputError: (str, write) => write(Console.color('red', str)),
    })
    .option('-c, --config <path>', 'Path to fcloud.yaml configuration file')
    .option('-d, --project-dir <path>', 'Flutter project root', process.env.FCLOUD_PROJECT_DIR)
    .option('-o, --output <format>', 'Output format: table or json')
    .option('--padding <size>', 'Spaces between table columns', process.env.FCLOUD_PADDING)
    .option('-q, --quiet', 'Suppress non-error output', false)
    .option('-y, --yes', 'Assume yes for prompts', false);

  let cachedConfig: FcloudConfig | undefined;

  const ctx: CliContext = {
    get config() {
      if (!cachedConfig) {
        cachedConfig = loadConfig(program.opts<CliOptions>());
      }
      return cachedConfig;
    },
  };

  registerInitCommand(program, ctx);
  registerPlatformsCommand(program, ctx);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    handleError(error, program.opts<CliOptions>());
    process.exitCode = exitCodeFor(error);
  }
}

// Always run CLI when this module is executed
void createCli();
