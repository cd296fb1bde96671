import type { Command } from 'commander';
import type { CliContext, CliOptions } from '../lib/types';
import { Console, type Spinner } from '../lib/console';
import { exitCodeFor, handleError } from '../lib/errors';
import { promptConfirm } from '../lib/prompts';
import { terminalWidth } from '../lib/terminal';
import { describeOutcome } from '../lib/render';
import { FIREBASE_JSON, ensureConfigured, firebaseJsonPath } from '../lib/firebase-json';
import { APPLE_PLATFORMS, kFlutter } from '../lib/platforms';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';

export const PUBSPEC_YAML = 'pubspec.yaml';

const MAX_BOX_WIDTH = 80;

export function registerInitCommand(program: Command, ctx: CliContext) {
  program
    .command('init [project-dir]')
    .description(`Add the ${kFlutter} section to ${FIREBASE_JSON} in a Flutter project`)
    .action(async (projectDirArg: string | undefined) => {
      let spinner: Spinner | undefined;
      try {
        const config = ctx.config;
        const projectDir = path.resolve(projectDirArg ?? config.projectDir);

        if (!fs.existsSync(path.join(projectDir, PUBSPEC_YAML)) && !config.yes) {
          const proceed = await promptConfirm(
            `No ${PUBSPEC_YAML} found in ${projectDir}. Configure it anyway?`,
            false,
          );
          if (!proceed) {
            if (!config.quiet) Console.warn('Nothing changed');
            return;
          }
        }

        if (!config.quiet) {
          spinner = Console.spinner(`Configuring ${FIREBASE_JSON}...`);
        }

        const filePath = firebaseJsonPath(projectDir);
        const outcome = ensureConfigured(projectDir);
        const message = describeOutcome(outcome, path.relative(process.cwd(), filePath));

        if (outcome === 'unchanged') {
          spinner?.info(chalk.yellow(message));
          return;
        }

        spinner?.succeed(chalk.green(message));
        if (!config.quiet) {
          const summary = [
            `${chalk.bold('File:')}      ${filePath}`,
            `${chalk.bold('Platforms:')} ${APPLE_PLATFORMS.join(', ')}`,
          ].join('\n');
          Console.info(
            Console.box(summary, '✨ Project configured', Math.min(terminalWidth(), MAX_BOX_WIDTH)),
          );
        }
      } catch (error) {
        spinner?.fail(chalk.red(`✗ Failed to configure ${FIREBASE_JSON}`));
        handleError(error, program.opts<CliOptions>());
        process.exitCode = exitCodeFor(error);
      }
    });
}
