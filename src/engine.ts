export { ExecutionCoordinator, DEFAULT_PROGRESS_EVERY } from './coordinator.js';
export type { CoordinatorOptions, ExecutionHandle, RunCallbacks, RunOutcome } from './coordinator.js';
export { CallExecutor } from './executor.js';
export { ResultSink } from './sink.js';
export { runWorkerPool } from './scheduler.js';
export type { WorkerPoolOptions, WorkerPoolSummary } from './scheduler.js';
export { aggregate, calculateResponseTimeStats, calculateThroughputStats, percentile, summarize } from './metrics.js';
export type { AggregateInput } from './metrics.js';
export { FetchTransport } from './transport.js';
export type { FetchTransportOptions } from './transport.js';
export {
  VolleyError,
  ValidationError,
  FatalSchedulingError,
  TransportError,
  classifyError,
} from './errors.js';
export {
  createDescriptor,
  withGlobalHeaders,
  buildUrl,
  toTransportRequest,
  validateDescriptor,
  validateParameters,
  MAX_THREAD_COUNT,
  MAX_ITERATIONS,
} from './request.js';
export type { DescriptorInput } from './request.js';
export { toLoadTestPlan, validateLoadTestPlan } from './plan.js';
export type { LoadTestPlan, LoadTestThreadGroup, LoadTestSampler, PlanSource } from './plan.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger, LogContext } from './logger.js';
export type * from './types.js';
export { HTTP_METHODS } from './types.js';
