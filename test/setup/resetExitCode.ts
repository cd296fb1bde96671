import { afterEach, beforeAll } from 'vitest';

// Commands report failures through process.exitCode, which outlives a test.
const resetExitCode = () => {
  process.exitCode = 0;
};

beforeAll(resetExitCode);
afterEach(resetExitCode);
