import { describe, it, expect, afterEach, vi } from 'vitest';
import { main } from '../../src/cli.js';

const argv = (...args: string[]) => ['node', 'volley', ...args];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('main', () => {
  it('exits with 2 on a non-integer VOLLEY_* setting', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await main(argv('run', 'https://api.example.test/health'), { VOLLEY_THREADS: 'abc' });

    expect(code).toBe(2);
    expect(stderr).toHaveBeenCalledWith('Error: VOLLEY_THREADS must be an integer (got "abc")');
  });

  it('exits with 2 and lists validation errors before any call', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const fetchSpy = vi.spyOn(globalThis, 'fetch');

    const code = await main(argv('run', 'https://api.example.test/users/{id}', '-c', '0', '-o', 'json'), {});

    expect(code).toBe(2);
    expect(stderr).toHaveBeenLastCalledWith('Error: Thread count must be at least 1');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('reports a bad descriptor after valid parameters', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await main(argv('run', 'https://api.example.test/users/{id}', '-o', 'json'), {});

    expect(code).toBe(2);
    expect(stderr).toHaveBeenLastCalledWith('Error: Missing path parameters: id');
  });
});
