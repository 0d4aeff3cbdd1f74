import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      timeoutMs: 30000,
      threads: 10,
      iterations: 10,
      progressEvery: 10,
      maxDurationMs: undefined,
      verbose: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      VOLLEY_TIMEOUT_MS: '2500',
      VOLLEY_THREADS: '4',
      VOLLEY_ITERATIONS: '50',
      VOLLEY_PROGRESS_EVERY: '25',
      VOLLEY_MAX_DURATION_MS: '60000',
      VOLLEY_VERBOSE: 'true',
    });

    expect(config).toEqual({
      timeoutMs: 2500,
      threads: 4,
      iterations: 50,
      progressEvery: 25,
      maxDurationMs: 60000,
      verbose: true,
    });
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ VOLLEY_THREADS: '' }).threads).toBe(10);
  });

  it('rejects non-integer values', () => {
    expect(() => loadConfig({ VOLLEY_THREADS: 'many' })).toThrow('VOLLEY_THREADS must be an integer (got "many")');
  });
});
