import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { load } from 'js-yaml';
import { CliConfigError } from './errors';
import type { CliOptions, FcloudConfig, OutputFormat } from './types';

export const CONFIG_FILE_NAME = 'fcloud.yaml';

const DEFAULT_PROJECT_DIR = '.';
const DEFAULT_OUTPUT: OutputFormat = 'table';
const DEFAULT_PADDING = 1;

interface CliYamlConfig {
  projectDir?: string;
  output?: unknown;
  padding?: unknown;
}

type LoadedYamlConfig = CliYamlConfig & { configPath: string };

export function loadConfig(options: CliOptions): FcloudConfig {
  const yamlConfig = options.config ? readConfigFile(options.config) : discoverConfig();
  const env = process.env;

  const projectDir =
    options.projectDir ?? env.FCLOUD_PROJECT_DIR ?? yamlConfig?.projectDir ?? DEFAULT_PROJECT_DIR;

  const output = parseOutput(options.output ?? env.FCLOUD_OUTPUT ?? yamlConfig?.output);

  const padding = parsePadding(options.padding ?? env.FCLOUD_PADDING ?? yamlConfig?.padding);

  return {
    configPath: yamlConfig?.configPath,
    projectDir,
    output,
    padding,
    quiet: Boolean(options.quiet ?? false),
    yes: Boolean(options.yes ?? false),
  };
}

function readConfigFile(filePath: string): LoadedYamlConfig {
  const absolute = path.resolve(filePath);
  return { configPath: absolute, ...parseYamlFile(absolute) };
}

function discoverConfig(): LoadedYamlConfig | undefined {
  const envPath = process.env.FCLOUD_CONFIG;
  if (envPath && fs.existsSync(envPath)) {
    return readConfigFile(envPath);
  }

  const searchDirs = [process.cwd(), ...discoverParents(process.cwd())];
  for (const dir of searchDirs) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return readConfigFile(candidate);
    }
  }

  const userConfig = path.join(os.homedir(), '.config', 'fcloud', CONFIG_FILE_NAME);
  if (fs.existsSync(userConfig)) {
    return readConfigFile(userConfig);
  }

  return undefined;
}

function discoverParents(dir: string) {
  const parents: string[] = [];
  let current = path.resolve(dir);
  let parent = path.dirname(current);
  while (parent !== current) {
    parents.push(parent);
    current = parent;
    parent = path.dirname(current);
  }
  return parents;
}

function parseYamlFile(filePath: string): CliYamlConfig {
  let content: unknown;
  try {
    content = load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CliConfigError(`Failed to read config file ${filePath}`, filePath, { cause: error });
  }

  // Only the `cli` section belongs to us; anything else in the file is ignored.
  const cli = isRecord(content) ? content.cli : undefined;
  if (!isRecord(cli)) return {};

  const output = isRecord(cli.output) ? cli.output : {};
  return {
    projectDir: typeof cli['project-dir'] === 'string' ? cli['project-dir'] : undefined,
    output: output.style,
    padding: output.padding,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseOutput(value: unknown): OutputFormat {
  return value === 'json' || value === 'table' ? value : DEFAULT_OUTPUT;
}

function parsePadding(value: unknown): number {
  if (value === undefined || value === null || value === '') return DEFAULT_PADDING;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : DEFAULT_PADDING;
}
