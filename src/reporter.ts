import chalk from 'chalk';
import { AggregateResult, ExecutionProgress } from './types.js';

export type ReportFormat = 'pretty' | 'json' | 'csv';

export const REPORT_FORMATS: readonly ReportFormat[] = ['pretty', 'json', 'csv'];

export interface ReporterOptions {
  format: ReportFormat;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatLatency(ms: number): string {
  return Math.round(ms).toString();
}

export function formatProgress(progress: ExecutionProgress): string {
  const percent = progress.totalRequests > 0
    ? Math.round((progress.completedRequests / progress.totalRequests) * 100)
    : 0;
  return `Progress: ${progress.completedRequests}/${progress.totalRequests} (${percent}%)`;
}

export function printResults(result: AggregateResult, options: ReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      console.log(formatJson(result));
      break;
    case 'csv':
      console.log(formatCsv(result));
      break;
    default:
      printPretty(result);
  }
}

function printPretty(result: AggregateResult): void {
  const stats = result.responseTimeStats;
  const throughput = result.throughputStats;
  const { descriptor } = result;

  console.log('');
  console.log(chalk.bold('Load Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Request:')}       ${descriptor.method} ${descriptor.url}`);
  console.log(`${chalk.cyan('Threads:')}       ${result.threadCount} × ${result.parameters.iterations} iterations`);
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(result.elapsedMs)}`);
  if (result.status === 'cancelled') {
    console.log(`${chalk.cyan('Status:')}        ${chalk.yellow('cancelled (partial result)')}`);
  }
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${result.totalRequests}`);
  console.log(`  Succeeded:    ${chalk.green(result.successfulRequests)} (${result.successRate.toFixed(1)}%)`);
  console.log(`  Failed:       ${chalk.red(result.failedRequests)} (${result.failureRate.toFixed(1)}%)`);
  console.log('');

  if (result.successfulRequests > 0) {
    console.log(chalk.bold('Latency (ms):'));
    console.log(`  Min:          ${formatLatency(stats.min)}`);
    console.log(`  Max:          ${formatLatency(stats.max)}`);
    console.log(`  Avg:          ${formatLatency(stats.average)}`);
    console.log(`  Median:       ${formatLatency(stats.median)}`);
    console.log(`  p95:          ${formatLatency(stats.p95)}`);
    console.log(`  p99:          ${formatLatency(stats.p99)}`);
    console.log('');

    console.log(chalk.bold('Status codes:'));
    for (const [code, count] of result.statusCodeDistribution) {
      const colour = code >= 500 ? chalk.red : code >= 400 ? chalk.yellow : chalk.green;
      console.log(`  ${colour(code)}:          ${count}`);
    }
    console.log('');
  }

  if (result.errorDistribution.size > 0) {
    console.log(chalk.bold('Errors:'));
    for (const [message, count] of result.errorDistribution) {
      console.log(`  ${chalk.red(message)}:  ${count}`);
    }
    for (const [kind, count] of result.errorKindDistribution) {
      console.log(`  ${chalk.gray(kind)}:  ${count}`);
    }
    console.log('');
  }

  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(throughput.requestsPerSecond.toFixed(1))} req/s`);
  console.log(`${chalk.cyan('Transfer:')}     ${throughput.totalBytes} bytes (${throughput.bytesPerSecond.toFixed(1)} B/s)`);
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}

export function formatJson(result: AggregateResult): string {
  const stats = result.responseTimeStats;
  const output = {
    run_id: result.runId,
    status: result.status,
    request: {
      method: result.descriptor.method,
      url: result.descriptor.url,
    },
    threads: result.threadCount,
    iterations: result.parameters.iterations,
    start_time: result.startTime.toISOString(),
    end_time: result.endTime.toISOString(),
    duration_ms: Math.round(result.elapsedMs),
    requests: {
      total: result.totalRequests,
      succeeded: result.successfulRequests,
      failed: result.failedRequests,
      success_rate: result.successRate,
    },
    latency_ms: {
      min: Math.round(stats.min),
      max: Math.round(stats.max),
      avg: Math.round(stats.average),
      median: Math.round(stats.median),
      p95: Math.round(stats.p95),
      p99: Math.round(stats.p99),
    },
    status_codes: Object.fromEntries(result.statusCodeDistribution),
    errors: Object.fromEntries(result.errorDistribution),
    error_kinds: Object.fromEntries(result.errorKindDistribution),
    throughput: {
      rps: result.throughputStats.requestsPerSecond,
      bytes_per_second: result.throughputStats.bytesPerSecond,
      total_bytes: result.throughputStats.totalBytes,
      avg_response_size: result.throughputStats.averageResponseSize,
    },
  };

  return JSON.stringify(output, null, 2);
}

export function formatCsv(result: AggregateResult): string {
  const stats = result.responseTimeStats;
  const header = 'status,duration_ms,threads,iterations,total,succeeded,failed,success_rate,min_ms,max_ms,avg_ms,median_ms,p95_ms,p99_ms,throughput_rps';
  const row = [
    result.status,
    Math.round(result.elapsedMs),
    result.threadCount,
    result.parameters.iterations,
    result.totalRequests,
    result.successfulRequests,
    result.failedRequests,
    result.successRate.toFixed(2),
    Math.round(stats.min),
    Math.round(stats.max),
    Math.round(stats.average),
    Math.round(stats.median),
    Math.round(stats.p95),
    Math.round(stats.p99),
    result.throughputStats.requestsPerSecond.toFixed(2),
  ].join(',');

  return `${header}\n${row}`;
}
