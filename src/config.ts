import { config } from 'dotenv';

config();

export interface VolleyConfig {
  timeoutMs: number;
  threads: number;
  iterations: number;
  progressEvery: number;
  maxDurationMs?: number;
  verbose: boolean;
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: string): number {
  const raw = env[name] || fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer (got "${raw}")`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): VolleyConfig {
  return {
    timeoutMs: readInt(env, 'VOLLEY_TIMEOUT_MS', '30000'),
    threads: readInt(env, 'VOLLEY_THREADS', '10'),
    iterations: readInt(env, 'VOLLEY_ITERATIONS', '10'),
    progressEvery: readInt(env, 'VOLLEY_PROGRESS_EVERY', '10'),
    maxDurationMs: env.VOLLEY_MAX_DURATION_MS ? readInt(env, 'VOLLEY_MAX_DURATION_MS', '0') : undefined,
    verbose: env.VOLLEY_VERBOSE === 'true',
  };
}
