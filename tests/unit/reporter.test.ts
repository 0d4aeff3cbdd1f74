import { describe, it, expect, afterEach, vi } from 'vitest';
import { aggregate } from '../../src/metrics.js';
import { formatCsv, formatJson, formatProgress, printResults } from '../../src/reporter.js';
import { failure, success, testDescriptor } from '../helpers/fake-transport.js';

const result = aggregate({
  runId: 'exec_test',
  status: 'completed',
  descriptor: testDescriptor(),
  parameters: { threadCount: 2, iterations: 2 },
  outcomes: [
    success(0, 100, { bodySize: 100 }),
    success(1, 200, { statusCode: 500, statusText: 'Internal Server Error', bodySize: 300 }),
    failure(2, 'Request timed out after 50ms', 'TIMEOUT'),
    failure(3, 'Request timed out after 50ms', 'TIMEOUT'),
  ],
  startTime: new Date('2024-01-01T00:00:00.000Z'),
  endTime: new Date('2024-01-01T00:00:02.000Z'),
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatProgress', () => {
  it('rounds the percentage', () => {
    expect(
      formatProgress({
        runId: 'exec_test',
        totalRequests: 9,
        completedRequests: 3,
        successfulRequests: 3,
        failedRequests: 0,
      }),
    ).toBe('Progress: 3/9 (33%)');
  });
});

describe('formatJson', () => {
  it('renders the aggregate with rounded latencies', () => {
    expect(JSON.parse(formatJson(result))).toEqual({
      run_id: 'exec_test',
      status: 'completed',
      request: { method: 'GET', url: 'https://api.example.test/v1/items' },
      threads: 2,
      iterations: 2,
      start_time: '2024-01-01T00:00:00.000Z',
      end_time: '2024-01-01T00:00:02.000Z',
      duration_ms: 2000,
      requests: { total: 4, succeeded: 2, failed: 2, success_rate: 50 },
      latency_ms: { min: 100, max: 200, avg: 150, median: 200, p95: 200, p99: 200 },
      status_codes: { '200': 1, '500': 1 },
      errors: { 'Request timed out after 50ms': 2 },
      error_kinds: { TIMEOUT: 2 },
      throughput: { rps: 2, bytes_per_second: 200, total_bytes: 400, avg_response_size: 200 },
    });
  });
});

describe('formatCsv', () => {
  it('writes a header and one row', () => {
    expect(formatCsv(result).split('\n')).toEqual([
      'status,duration_ms,threads,iterations,total,succeeded,failed,success_rate,min_ms,max_ms,avg_ms,median_ms,p95_ms,p99_ms,throughput_rps',
      'completed,2000,2,2,4,2,2,50.00,100,200,150,200,200,200,2.00',
    ]);
  });
});

describe('printResults', () => {
  it('prints JSON to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResults(result, { format: 'json' });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(formatJson(result));
  });

  it('prints the request counts in pretty mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResults(result);
    const lines = log.mock.calls.map(args => String(args[0]));
    expect(lines).toContain('  Total:        4');
    expect(lines).toContain('  Min:          100');
    expect(lines).toContain('  p99:          200');
  });
});
