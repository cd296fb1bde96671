import chalk from 'chalk';
import { Console } from './console';
import { listAsPaddedTable, type TableRow } from './table';
import {
  ProjectConfiguration,
  getProjectConfigurationProperty,
  kFlutter,
  kPlatforms,
  type PlatformDescriptor,
} from './platforms';
import { FIREBASE_JSON, type ConfigureOutcome } from './firebase-json';

export function renderJson(value: unknown) {
  Console.info(Console.json(value));
}

export function platformRows(platforms: readonly PlatformDescriptor[]): TableRow[] {
  const namespaces = Object.values(ProjectConfiguration)
    .map(getProjectConfigurationProperty)
    .join(', ');

  const header: TableRow = [
    chalk.bold.cyan('Platform'),
    chalk.bold.cyan('Key'),
    chalk.bold.yellow(FIREBASE_JSON),
  ];

  return [
    header,
    ...platforms.map((platform): TableRow => [
      chalk.white(platform.name),
      chalk.green(platform.key),
      platform.appleConfig
        ? chalk.magenta(`${kFlutter}.${kPlatforms}.${platform.key} (${namespaces})`)
        : chalk.gray('-'),
    ]),
  ];
}

export function renderPlatformsTable(platforms: readonly PlatformDescriptor[], padding: number) {
  Console.info(chalk.cyan('\n📱 Supported Platforms'));
  Console.info(chalk.gray('═'.repeat(60)));
  Console.info(listAsPaddedTable(platformRows(platforms), padding));
}

export function describeOutcome(outcome: ConfigureOutcome, filePath: string): string {
  switch (outcome) {
    case 'created':
      return `Created ${filePath}`;
    case 'merged':
      return `Added ${kFlutter} configuration to ${filePath}`;
    case 'unchanged':
      return `${filePath} already has ${kFlutter} configuration, left unchanged`;
  }
}
