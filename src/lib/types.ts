export type OutputFormat = 'json' | 'table';

export interface CliOptions {
  config?: string;
  projectDir?: string;
  output?: OutputFormat;
  padding?: string;
  quiet?: boolean;
  yes?: boolean;
}

export interface FcloudConfig {
  configPath?: string;
  projectDir: string;
  output: OutputFormat;
  padding: number;
  quiet: boolean;
  yes: boolean;
}

export interface CliContext {
  get config(): FcloudConfig;
}
