import * as colorette from 'colorette';
import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import boxen from 'boxen';
import figures from 'figures';

export type Spinner = Ora;

export type ColorName = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'magenta' | 'gray' | 'bold' | 'dim';

export const Console = {
  color(color: ColorName, text: string) {
    return colorette[color](text);
  },

  info(message: string) {
    console.log(message);
  },

  warn(message: string) {
    console.log(chalk.yellow(`${figures.warning} ${message}`));
  },

  error(message: string) {
    console.error(chalk.red(`${figures.cross} ${message}`));
  },

  /**
   * Start a spinner. The caller owns the handle and must stop it.
   */
  spinner(text: string): Spinner {
    return ora({
      text: chalk.blue(text),
      spinner: 'dots',
    }).start();
  },

  box(text: string, title?: string, width?: number): string {
    return boxen(text, {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'blue',
      title,
      titleAlignment: 'center',
      width,
    });
  },

  json(data: unknown, indent = 2): string {
    return JSON.stringify(data, null, indent);
  },
};
