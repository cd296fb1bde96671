import { describe, it, expect } from 'vitest';
import { applyOutputOverride } from '../../src/lib/options';
import type { FcloudConfig } from '../../src/lib/types';

const config: FcloudConfig = {
  projectDir: '.',
  output: 'table',
  padding: 1,
  quiet: false,
  yes: false,
};

describe('applyOutputOverride', () => {
  it('returns original config when no override', () => {
    const result = applyOutputOverride(config, undefined);
    expect(result).toBe(config);
  });

  it('overrides output format without mutating the input', () => {
    const result = applyOutputOverride(config, 'json');
    expect(result.output).toBe('json');
    expect(config.output).toBe('table');
  });
});
