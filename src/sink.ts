import { CallOutcome } from './types.js';

/**
 * Append-only outcome store with one shard per worker.
 * Running counters feed progress; the full list is only read after `seal()`.
 */
export class ResultSink {
  private shards: CallOutcome[][];
  private sealed = false;
  private successes = 0;
  private failures = 0;
  private responseTimeTotal = 0;

  constructor(shardCount: number) {
    this.shards = Array.from({ length: shardCount }, () => []);
  }

  append(shard: number, outcome: CallOutcome): void {
    if (this.sealed) {
      throw new Error(`Cannot append call #${outcome.callIndex}: result sink is sealed`);
    }
    const target = this.shards[shard];
    if (!target) {
      throw new RangeError(`Unknown shard ${shard} (have ${this.shards.length})`);
    }
    target.push(outcome);

    if (outcome.kind === 'success') {
      this.successes++;
      this.responseTimeTotal += outcome.responseTime;
    } else {
      this.failures++;
    }
  }

  get size(): number {
    return this.successes + this.failures;
  }

  get successCount(): number {
    return this.successes;
  }

  get failureCount(): number {
    return this.failures;
  }

  get averageResponseTime(): number | undefined {
    return this.successes > 0 ? this.responseTimeTotal / this.successes : undefined;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  seal(): CallOutcome[] {
    if (this.sealed) {
      throw new Error('Result sink already sealed');
    }
    this.sealed = true;
    return this.shards.flat().sort((a, b) => a.callIndex - b.callIndex);
  }
}
