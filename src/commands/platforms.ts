import type { Command } from 'commander';
import type { CliContext, CliOptions } from '../lib/types';
import { exitCodeFor, handleError } from '../lib/errors';
import { applyOutputOverride } from '../lib/options';
import { renderJson, renderPlatformsTable } from '../lib/render';
import { SUPPORTED_PLATFORMS } from '../lib/platforms';

export function registerPlatformsCommand(program: Command, ctx: CliContext) {
  program
    .command('platforms')
    .description('List supported platforms and where firebase.json configures them')
    .option('--json', 'Print the platform list as JSON')
    .action((options: { json?: boolean }) => {
      try {
        const config = applyOutputOverride(ctx.config, options.json ? 'json' : undefined);
        if (config.output === 'json') {
          renderJson(SUPPORTED_PLATFORMS);
        } else {
          renderPlatformsTable(SUPPORTED_PLATFORMS, config.padding);
        }
      } catch (error) {
        handleError(error, program.opts<CliOptions>());
        process.exitCode = exitCodeFor(error);
      }
    });
}
