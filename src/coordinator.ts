import { randomUUID } from 'crypto';
import { FatalSchedulingError, ValidationError, errorMessage } from './errors.js';
import { CallExecutor } from './executor.js';
import { Logger, silentLogger } from './logger.js';
import { aggregate } from './metrics.js';
import { validateDescriptor, validateParameters } from './request.js';
import { runWorkerPool } from './scheduler.js';
import { ResultSink } from './sink.js';
import {
  AggregateResult,
  CallOutcome,
  ExecutionParameters,
  ExecutionProgress,
  HttpTransport,
  RequestDescriptor,
  RunState,
} from './types.js';

export const DEFAULT_PROGRESS_EVERY = 10;

export type RunOutcome =
  | { status: 'completed'; result: AggregateResult }
  | { status: 'cancelled'; result: AggregateResult }
  | { status: 'failed'; error: FatalSchedulingError };

export interface RunCallbacks {
  onProgress?: (progress: ExecutionProgress) => void;
  onComplete?: (result: AggregateResult) => void;
  onCancelled?: (result: AggregateResult) => void;
  onError?: (error: FatalSchedulingError) => void;
  /** Cancels the run once this many milliseconds have passed. */
  maxDurationMs?: number;
  /** External cancellation, in addition to `ExecutionHandle.cancel()`. */
  signal?: AbortSignal;
}

type CallbackName = 'onProgress' | 'onComplete' | 'onCancelled' | 'onError';

export interface ExecutionHandle {
  readonly runId: string;
  readonly state: RunState;
  /** Resolves when the run ends. Never rejects. */
  readonly done: Promise<RunOutcome>;
  /** Idempotent. Returns false when the run had already finished or was cancelled. */
  cancel(): boolean;
}

export interface CoordinatorOptions {
  transport: HttpTransport;
  logger?: Logger;
  progressEvery?: number;
  createSink?: (shardCount: number) => ResultSink;
}

class Execution implements ExecutionHandle {
  readonly runId: string;
  readonly done: Promise<RunOutcome>;
  private current: RunState = 'idle';
  private controller = new AbortController();
  private lastProgress = 0;

  constructor(
    private coordinator: { executor: CallExecutor; logger: Logger; progressEvery: number; createSink: (n: number) => ResultSink },
    private descriptor: RequestDescriptor,
    private parameters: ExecutionParameters,
    private callbacks: RunCallbacks,
  ) {
    this.runId = `exec_${randomUUID()}`;
    this.done = this.execute();
  }

  get state(): RunState {
    return this.current;
  }

  cancel(): boolean {
    if (this.current !== 'running' || this.controller.signal.aborted) {
      return false;
    }
    this.coordinator.logger.info('Cancelling concurrent execution', { runId: this.runId });
    this.controller.abort();
    return true;
  }

  private async execute(): Promise<RunOutcome> {
    const { logger } = this.coordinator;
    const { threadCount, iterations } = this.parameters;
    const totalRequests = threadCount * iterations;

    this.current = 'running';
    const startTime = new Date();
    const detach = this.attachCancellationSources();

    logger.info('Starting concurrent execution', {
      runId: this.runId,
      method: this.descriptor.method,
      url: this.descriptor.url,
      threadCount,
      iterations,
      totalRequests,
    });

    let outcomes: CallOutcome[];
    try {
      outcomes = await this.runPool(totalRequests);
    } catch (error) {
      detach();
      this.controller.abort();
      const fatal = new FatalSchedulingError(`Concurrent execution failed: ${errorMessage(error)}`, error);
      this.current = 'failed';
      logger.error('Concurrent execution failed', { runId: this.runId, error: errorMessage(error) });
      this.notify('onError', () => this.callbacks.onError?.(fatal));
      return { status: 'failed', error: fatal };
    }
    detach();

    const status = this.controller.signal.aborted ? 'cancelled' : 'completed';
    const result = aggregate({
      runId: this.runId,
      status,
      descriptor: this.descriptor,
      parameters: this.parameters,
      outcomes,
      startTime,
      endTime: new Date(),
    });
    this.current = status;

    if (status === 'cancelled') {
      logger.warn('Concurrent execution cancelled', {
        runId: this.runId,
        completedRequests: result.totalRequests,
        totalRequests,
      });
      this.notify('onCancelled', () => this.callbacks.onCancelled?.(result));
      return { status, result };
    }

    logger.info('Concurrent execution completed', {
      runId: this.runId,
      totalRequests: result.totalRequests,
      successfulRequests: result.successfulRequests,
      failedRequests: result.failedRequests,
    });
    this.notify('onComplete', () => this.callbacks.onComplete?.(result));
    return { status, result };
  }

  private async runPool(totalRequests: number): Promise<CallOutcome[]> {
    const { logger, executor, createSink } = this.coordinator;
    const sink = createSink(this.parameters.threadCount);

    await runWorkerPool({
      threadCount: this.parameters.threadCount,
      iterations: this.parameters.iterations,
      signal: this.controller.signal,
      task: (callIndex, signal) => executor.execute(this.descriptor, callIndex, signal),
      onOutcome: (outcome, worker) => {
        sink.append(worker, outcome);
        if (outcome.kind === 'failure') {
          logger.debug('Call failed', {
            runId: this.runId,
            callIndex: outcome.callIndex,
            errorKind: outcome.error.errorKind,
            message: outcome.error.message,
          });
        }
        this.reportProgress(sink, totalRequests);
      },
    });

    return sink.seal();
  }

  private reportProgress(sink: ResultSink, totalRequests: number): void {
    const completed = sink.size;
    const { progressEvery } = this.coordinator;
    if (completed <= this.lastProgress) return;
    if (completed % progressEvery !== 0 && completed !== totalRequests) return;

    this.lastProgress = completed;
    const progress: ExecutionProgress = {
      runId: this.runId,
      totalRequests,
      completedRequests: completed,
      successfulRequests: sink.successCount,
      failedRequests: sink.failureCount,
      averageResponseTime: sink.averageResponseTime,
    };
    this.notify('onProgress', () => this.callbacks.onProgress?.(progress));
  }

  private attachCancellationSources(): () => void {
    const { signal, maxDurationMs } = this.callbacks;
    const onExternalAbort = () => this.cancel();

    if (signal?.aborted) {
      this.controller.abort();
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const timer = maxDurationMs !== undefined
      ? setTimeout(() => {
          this.coordinator.logger.warn('Execution time budget exhausted', { runId: this.runId, maxDurationMs });
          this.cancel();
        }, maxDurationMs)
      : undefined;

    return () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onExternalAbort);
    };
  }

  private notify(name: CallbackName, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      // Listener errors are logged and never reach the workers.
      this.coordinator.logger.error(`${name} callback threw`, { runId: this.runId, error: errorMessage(error) });
    }
  }
}

/**
 * Public entry point: validates, runs and tracks concurrent executions of one request.
 */
export class ExecutionCoordinator {
  private executor: CallExecutor;
  private logger: Logger;
  private progressEvery: number;
  private createSink: (shardCount: number) => ResultSink;
  private executions = new Map<string, Execution>();

  constructor(options: CoordinatorOptions) {
    this.executor = new CallExecutor(options.transport);
    this.logger = options.logger ?? silentLogger;
    this.progressEvery = Math.max(1, Math.floor(options.progressEvery ?? DEFAULT_PROGRESS_EVERY));
    this.createSink = options.createSink ?? (shardCount => new ResultSink(shardCount));
  }

  /**
   * Starts a run and returns immediately.
   * @throws ValidationError when the parameters or the descriptor are invalid; nothing is started.
   */
  start(descriptor: RequestDescriptor, parameters: ExecutionParameters, callbacks: RunCallbacks = {}): ExecutionHandle {
    const parameterErrors = validateParameters(parameters);
    if (parameterErrors.length > 0) {
      this.logger.error('Concurrent execution rejected', { errors: parameterErrors.join('; ') });
      throw new ValidationError('Concurrent execution', parameterErrors);
    }
    const descriptorErrors = validateDescriptor(descriptor);
    if (descriptorErrors.length > 0) {
      this.logger.error('Request rejected', { errors: descriptorErrors.join('; ') });
      throw new ValidationError('Request', descriptorErrors);
    }

    const execution = new Execution(
      {
        executor: this.executor,
        logger: this.logger,
        progressEvery: this.progressEvery,
        createSink: this.createSink,
      },
      descriptor,
      parameters,
      callbacks,
    );
    this.executions.set(execution.runId, execution);
    void execution.done.finally(() => this.executions.delete(execution.runId));
    return execution;
  }

  /**
   * Runs to the end. Resolves with a partial result when cancelled through `options.signal`
   * or `options.maxDurationMs`; rejects with ValidationError or FatalSchedulingError.
   */
  async run(
    descriptor: RequestDescriptor,
    parameters: ExecutionParameters,
    options: RunCallbacks = {},
  ): Promise<AggregateResult> {
    const outcome = await this.start(descriptor, parameters, options).done;
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
    return outcome.result;
  }

  getStatus(runId: string): RunState | undefined {
    return this.executions.get(runId)?.state;
  }

  cancel(runId: string): boolean {
    return this.executions.get(runId)?.cancel() ?? false;
  }

  get activeRuns(): string[] {
    return [...this.executions.keys()];
  }
}
