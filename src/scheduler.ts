import { CallOutcome } from './types.js';

export interface WorkerPoolOptions {
  threadCount: number;
  iterations: number;
  signal: AbortSignal;
  /** One call. Per-call failures come back as outcomes, never as rejections. */
  task: (callIndex: number, signal: AbortSignal) => Promise<CallOutcome>;
  onOutcome: (outcome: CallOutcome, worker: number) => void;
}

export interface WorkerPoolSummary {
  dispatched: number;
  stoppedEarly: boolean;
}

/**
 * Runs `threadCount` workers, each doing `iterations` sequential calls.
 * The number of workers bounds the calls in flight; there is no shared queue.
 */
export async function runWorkerPool(options: WorkerPoolOptions): Promise<WorkerPoolSummary> {
  const { threadCount, iterations, task, onOutcome } = options;

  // Stops siblings when one worker hits something that is not a per-call failure.
  const pool = new AbortController();
  const stopPool = () => pool.abort();
  if (options.signal.aborted) {
    pool.abort();
  } else {
    options.signal.addEventListener('abort', stopPool, { once: true });
  }

  let nextCallIndex = 0;

  const worker = async (id: number): Promise<void> => {
    for (let i = 0; i < iterations; i++) {
      if (pool.signal.aborted) return;

      const callIndex = nextCallIndex++;
      const outcome = await task(callIndex, pool.signal);
      onOutcome(outcome, id);
    }
  };

  try {
    const workers = Array.from({ length: threadCount }, (_, id) =>
      worker(id).catch((error: unknown) => {
        pool.abort();
        throw error;
      }),
    );

    const settled = await Promise.allSettled(workers);
    const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (rejected) {
      throw rejected.reason;
    }

    return {
      dispatched: nextCallIndex,
      stoppedEarly: nextCallIndex < threadCount * iterations,
    };
  } finally {
    options.signal.removeEventListener('abort', stopPool);
  }
}
