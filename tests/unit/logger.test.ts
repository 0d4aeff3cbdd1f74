import { describe, it, expect, afterEach, vi } from 'vitest';
import { createConsoleLogger } from '../../src/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createConsoleLogger', () => {
  it('hides debug and info unless verbose', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger();

    logger.debug('call failed');
    logger.info('starting');
    logger.warn('budget exhausted');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toContain('budget exhausted');
  });

  it('renders context as key=value pairs and skips undefined values', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ verbose: true });

    logger.info('Starting concurrent execution', { runId: 'exec_1', threadCount: 4, url: undefined });

    const line = String(stderr.mock.calls[0][0]);
    expect(line).toContain('Starting concurrent execution');
    expect(line).toContain('runId=exec_1 threadCount=4');
    expect(line).not.toContain('url=');
  });

  it('never writes to stdout', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    createConsoleLogger({ verbose: true }).error('boom', { code: 'X' });

    expect(stdout).not.toHaveBeenCalled();
  });
});
