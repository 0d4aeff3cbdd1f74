import { ErrorKind } from './types.js';

export class VolleyError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'VolleyError';
    this.code = code;
  }
}

/**
 * Pre-flight contract violation. The run never starts.
 */
export class ValidationError extends VolleyError {
  errors: string[];

  constructor(context: string, errors: string[]) {
    super(`${context} validation failed: ${errors.join('; ')}`, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * The worker pool could not run at all; no aggregate result exists.
 */
export class FatalSchedulingError extends VolleyError {
  cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, 'FATAL_SCHEDULING');
    this.name = 'FatalSchedulingError';
    this.cause = cause;
  }
}

export class TransportError extends VolleyError {
  statusCode?: number;

  constructor(message: string, code: string = 'TRANSPORT_ERROR', statusCode?: number) {
    super(message, code);
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }
}

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorCause(error: unknown): unknown {
  if (error instanceof Error && 'cause' in error) {
    return error.cause;
  }
  return undefined;
}

/** Name or code describing what went wrong underneath, for `ExecutionError.cause`. */
export function describeCause(error: unknown): string | undefined {
  const code = errorCode(errorCause(error)) ?? errorCode(error);
  if (code) return code;
  if (error instanceof Error) return error.name;
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown error';
  }
  if (typeof error === 'string' && error.length > 0) {
    return error;
  }
  return 'Unknown error';
}

/**
 * Best-effort mapping from a thrown value to an error kind.
 * Codes on `error.cause` are checked too, since fetch wraps socket errors.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof ValidationError) {
    return 'VALIDATION';
  }

  const codes = [errorCode(error), errorCode(errorCause(error))];
  if (codes.some(code => code !== undefined && TIMEOUT_CODES.has(code))) {
    return 'TIMEOUT';
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'TIMEOUT';
  }

  const message = errorMessage(error);
  if (/timed? ?out|timeout/i.test(message)) {
    return 'TIMEOUT';
  }
  if (codes.some(code => code !== undefined && NETWORK_CODES.has(code))) {
    return 'NETWORK';
  }
  if (/fetch failed|socket hang up|network/i.test(message)) {
    return 'NETWORK';
  }

  if (error instanceof TransportError && error.statusCode !== undefined) {
    if (error.statusCode === 401 || error.statusCode === 403) return 'AUTHENTICATION';
    if (error.statusCode >= 500 && error.statusCode <= 599) return 'SERVER_ERROR';
  }
  if (/\b40[13]\b/.test(message)) {
    return 'AUTHENTICATION';
  }

  return 'UNKNOWN';
}
