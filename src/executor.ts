import { classifyError, describeCause, errorMessage } from './errors.js';
import { toTransportRequest } from './request.js';
import { CallOutcome, ErrorKind, HttpTransport, RequestDescriptor } from './types.js';

type Interruption = { reason: 'timeout' } | { reason: 'cancelled' };

interface InterruptionGuard {
  /** Settles when the call has to stop early, even if the transport ignores its signal. */
  interrupted: Promise<Interruption>;
  dispose(): void;
}

function armInterruption(timeoutMs: number, signal: AbortSignal, controller: AbortController): InterruptionGuard {
  let settle: (value: Interruption) => void = () => undefined;
  const interrupted = new Promise<Interruption>(resolve => {
    settle = resolve;
  });

  const timer = setTimeout(() => {
    settle({ reason: 'timeout' });
    controller.abort();
  }, timeoutMs);

  const onAbort = () => {
    settle({ reason: 'cancelled' });
    controller.abort();
  };
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }

  return {
    interrupted,
    dispose() {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Issues one call through the transport and turns whatever happens into a CallOutcome.
 */
export class CallExecutor {
  private transport: HttpTransport;

  constructor(transport: HttpTransport) {
    this.transport = transport;
  }

  async execute(descriptor: RequestDescriptor, callIndex: number, signal: AbortSignal): Promise<CallOutcome> {
    const controller = new AbortController();
    const guard = armInterruption(descriptor.timeoutMs, signal, controller);

    const start = performance.now();
    try {
      const sent = this.transport.send(toTransportRequest(descriptor), controller.signal);
      const settled = await Promise.race([
        sent.then(response => ({ response })),
        guard.interrupted,
      ]);

      if ('reason' in settled) {
        // The abandoned send may still reject later.
        sent.catch(() => undefined);
        return settled.reason === 'timeout'
          ? this.failure(callIndex, `Request timed out after ${descriptor.timeoutMs}ms`, 'TIMEOUT', 'TimeoutError')
          : this.failure(callIndex, 'Request cancelled', 'UNKNOWN', 'AbortError');
      }

      const { response } = settled;
      return {
        kind: 'success',
        callIndex,
        statusCode: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body: response.body,
        bodySize: response.size ?? Buffer.byteLength(response.body, 'utf8'),
        responseTime: performance.now() - start,
        timestamp: new Date(),
      };
    } catch (error) {
      return this.failure(callIndex, errorMessage(error), classifyError(error), describeCause(error));
    } finally {
      guard.dispose();
    }
  }

  private failure(callIndex: number, message: string, errorKind: ErrorKind, cause?: string): CallOutcome {
    return {
      kind: 'failure',
      callIndex,
      error: { message, cause, callIndex, timestamp: new Date(), errorKind },
    };
  }
}
