import type { FcloudConfig, OutputFormat } from './types';

export function applyOutputOverride(config: FcloudConfig, override?: OutputFormat): FcloudConfig {
  if (!override) return config;
  return {
    ...config,
    output: override,
  };
}
