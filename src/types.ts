export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'];

export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
  readonly timeoutMs: number;
  readonly followRedirects: boolean;
  readonly queryParameters: Readonly<Record<string, string>>;
  readonly pathParameters: Readonly<Record<string, string>>;
}

export interface ExecutionParameters {
  readonly threadCount: number;
  readonly iterations: number;
}

export type ErrorKind =
  | 'NETWORK'
  | 'TIMEOUT'
  | 'VALIDATION'
  | 'AUTHENTICATION'
  | 'SERVER_ERROR'
  | 'UNKNOWN';

export interface ExecutionError {
  message: string;
  /** Name or code of the underlying failure, e.g. `ECONNREFUSED`. */
  cause?: string;
  callIndex: number;
  timestamp: Date;
  errorKind: ErrorKind;
}

export interface CallSuccess {
  kind: 'success';
  callIndex: number;
  statusCode: number;
  statusText: string;
  headers: Record<string, string[]>;
  body: string;
  bodySize: number;
  /** Milliseconds from dispatch until the body was fully read. */
  responseTime: number;
  timestamp: Date;
}

export interface CallFailure {
  kind: 'failure';
  callIndex: number;
  error: ExecutionError;
}

export type CallOutcome = CallSuccess | CallFailure;

export interface ResponseTimeStats {
  min: number;
  max: number;
  average: number;
  median: number;
  p95: number;
  p99: number;
}

export interface ThroughputStats {
  requestsPerSecond: number;
  bytesPerSecond: number;
  totalBytes: number;
  averageResponseSize: number;
}

export type RunStatus = 'completed' | 'cancelled';

export interface AggregateResult {
  readonly runId: string;
  readonly status: RunStatus;
  readonly descriptor: RequestDescriptor;
  readonly parameters: ExecutionParameters;
  readonly threadCount: number;
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly successes: readonly CallSuccess[];
  readonly failures: readonly ExecutionError[];
  readonly startTime: Date;
  readonly endTime: Date;
  readonly elapsedMs: number;
  readonly successRate: number;
  readonly failureRate: number;
  readonly responseTimeStats: ResponseTimeStats;
  readonly throughputStats: ThroughputStats;
  readonly statusCodeDistribution: ReadonlyMap<number, number>;
  readonly errorDistribution: ReadonlyMap<string, number>;
  readonly errorKindDistribution: ReadonlyMap<ErrorKind, number>;
}

export interface ExecutionProgress {
  runId: string;
  totalRequests: number;
  completedRequests: number;
  successfulRequests: number;
  failedRequests: number;
  averageResponseTime?: number;
}

export type RunState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  followRedirects: boolean;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Record<string, string[]>;
  body: string;
  /** Byte length of the raw body, when the transport knows it. */
  size?: number;
}

export interface HttpTransport {
  send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse>;
}
