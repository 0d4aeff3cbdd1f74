import {
  AggregateResult,
  CallOutcome,
  CallSuccess,
  ErrorKind,
  ExecutionError,
  ExecutionParameters,
  RequestDescriptor,
  ResponseTimeStats,
  RunStatus,
  ThroughputStats,
} from './types.js';

export interface AggregateInput {
  runId: string;
  status: RunStatus;
  descriptor: RequestDescriptor;
  parameters: ExecutionParameters;
  outcomes: readonly CallOutcome[];
  startTime: Date;
  endTime: Date;
}

/**
 * Nearest-rank percentile over an ascending list: index floor(p × n), clamped.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(Math.max(Math.floor(p * sorted.length), 0), sorted.length - 1);
  return sorted[index];
}

export function calculateResponseTimeStats(responseTimes: readonly number[]): ResponseTimeStats {
  if (responseTimes.length === 0) {
    return { min: 0, max: 0, average: 0, median: 0, p95: 0, p99: 0 };
  }

  const sorted = [...responseTimes].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    average: sum / sorted.length,
    median: percentile(sorted, 0.5),
    p95: percentile(sorted, 0.95),
    p99: percentile(sorted, 0.99),
  };
}

export function calculateThroughputStats(
  totalRequests: number,
  successes: readonly CallSuccess[],
  elapsedMs: number,
): ThroughputStats {
  const totalBytes = successes.reduce((sum, s) => sum + s.bodySize, 0);
  const seconds = elapsedMs / 1000;

  return {
    requestsPerSecond: seconds > 0 ? totalRequests / seconds : 0,
    bytesPerSecond: seconds > 0 ? totalBytes / seconds : 0,
    totalBytes,
    averageResponseSize: successes.length > 0 ? Math.floor(totalBytes / successes.length) : 0,
  };
}

/** Count map that rejects writes once built. */
class Distribution<K> extends Map<K, number> {
  private locked = false;

  static count<T, K>(items: readonly T[], key: (item: T) => K): Distribution<K> {
    const counts = new Distribution<K>();
    for (const item of items) {
      const k = key(item);
      counts.set(k, (counts.get(k) ?? 0) + 1);
    }
    counts.locked = true;
    return counts;
  }

  set(key: K, value: number): this {
    this.assertWritable();
    return super.set(key, value);
  }

  delete(key: K): boolean {
    this.assertWritable();
    return super.delete(key);
  }

  clear(): void {
    this.assertWritable();
    super.clear();
  }

  private assertWritable(): void {
    if (this.locked) {
      throw new TypeError('Distribution is read-only');
    }
  }
}

export function aggregate(input: AggregateInput): AggregateResult {
  const successes: CallSuccess[] = [];
  const failures: ExecutionError[] = [];
  for (const outcome of input.outcomes) {
    if (outcome.kind === 'success') {
      successes.push(outcome);
    } else {
      failures.push(outcome.error);
    }
  }

  const totalRequests = successes.length + failures.length;
  const elapsedMs = Math.max(0, input.endTime.getTime() - input.startTime.getTime());

  return Object.freeze({
    runId: input.runId,
    status: input.status,
    descriptor: input.descriptor,
    parameters: input.parameters,
    threadCount: input.parameters.threadCount,
    totalRequests,
    successfulRequests: successes.length,
    failedRequests: failures.length,
    successes: Object.freeze(successes),
    failures: Object.freeze(failures),
    startTime: input.startTime,
    endTime: input.endTime,
    elapsedMs,
    successRate: totalRequests > 0 ? (successes.length / totalRequests) * 100 : 0,
    failureRate: totalRequests > 0 ? (failures.length / totalRequests) * 100 : 0,
    responseTimeStats: calculateResponseTimeStats(successes.map(s => s.responseTime)),
    throughputStats: calculateThroughputStats(totalRequests, successes, elapsedMs),
    statusCodeDistribution: Distribution.count(successes, s => s.statusCode),
    errorDistribution: Distribution.count(failures, f => f.message),
    errorKindDistribution: Distribution.count<ExecutionError, ErrorKind>(failures, f => f.errorKind),
  });
}

export function summarize(result: AggregateResult): string {
  const successRate = result.successRate.toFixed(1);
  const avgTime = Math.round(result.responseTimeStats.average);
  const rps = result.throughputStats.requestsPerSecond.toFixed(1);
  return `Total: ${result.totalRequests} | Success: ${successRate}% | Avg Time: ${avgTime}ms | RPS: ${rps}`;
}
