import chalk from 'chalk';
import { Console } from './console';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode = 1,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CliError';
  }
}

/** The CLI's own configuration file (fcloud.yaml) could not be read. */
export class CliConfigError extends CliError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, 1, options);
    this.name = 'CliConfigError';
  }
}

/** An existing firebase.json is not a JSON object. */
export class ConfigParseError extends CliError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, 3, options);
    this.name = 'ConfigParseError';
  }
}

export type IOOperation = 'read' | 'write';

export class ConfigIOError extends CliError {
  constructor(
    public readonly operation: IOOperation,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to ${operation} ${filePath}`, 2, options);
    this.name = 'ConfigIOError';
  }
}

export class PromptCancelledError extends CliError {
  constructor() {
    super('Prompt cancelled', 130);
    this.name = 'PromptCancelledError';
  }
}

export function handleError(error: unknown, opts: { quiet?: boolean } = {}): void {
  if (opts.quiet) {
    return;
  }

  if (error instanceof CliError) {
    Console.error(error.message);
    const cause = describeCause(error.cause);
    if (cause) {
      Console.error(chalk.gray(`Cause: ${cause}`));
    }
    return;
  }

  if (error instanceof Error) {
    Console.error(error.message);
    return;
  }

  Console.error('Unknown error occurred');
}

export function exitCodeFor(error: unknown): number {
  return error instanceof CliError ? error.exitCode : 1;
}

function describeCause(cause: unknown): string | undefined {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string' && cause.length > 0) return cause;
  return undefined;
}
