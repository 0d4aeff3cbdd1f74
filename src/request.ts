import { ExecutionParameters, HTTP_METHODS, HttpMethod, RequestDescriptor, TransportRequest } from './types.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const MAX_TIMEOUT_MS = 300_000;

export const MAX_THREAD_COUNT = 100;
export const MAX_ITERATIONS = 10_000;

const PATH_PARAM_PATTERN = /\{([^}]+)\}/g;
// RFC 7230 token
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HEADER_VALUE_FORBIDDEN = /[\r\n\0]/;

export interface DescriptorInput {
  method?: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  followRedirects?: boolean;
  queryParameters?: Record<string, string>;
  pathParameters?: Record<string, string>;
}

export function createDescriptor(input: DescriptorInput): RequestDescriptor {
  return Object.freeze({
    method: input.method ?? 'GET',
    url: input.url,
    headers: Object.freeze({ ...input.headers }),
    ...(input.body !== undefined && { body: input.body }),
    timeoutMs: input.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    followRedirects: input.followRedirects ?? true,
    queryParameters: Object.freeze({ ...input.queryParameters }),
    pathParameters: Object.freeze({ ...input.pathParameters }),
  });
}

/** Request headers win over global ones. */
export function withGlobalHeaders(
  descriptor: RequestDescriptor,
  globalHeaders: Record<string, string>,
): RequestDescriptor {
  return createDescriptor({ ...descriptor, headers: { ...globalHeaders, ...descriptor.headers } });
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}

export function findHeader(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

export function applyPathParameters(url: string, pathParameters: Readonly<Record<string, string>>): string {
  let processed = url;
  for (const [key, value] of Object.entries(pathParameters)) {
    processed = processed.split(`{${key}}`).join(value);
  }
  return processed;
}

export function buildUrl(descriptor: RequestDescriptor): string {
  const url = applyPathParameters(descriptor.url, descriptor.pathParameters);
  const query = new URLSearchParams(descriptor.queryParameters).toString();
  if (!query) return url;
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${query}`;
}

export function detectContentType(body: string): string {
  const trimmed = body.trim();
  if ((trimmed.startsWith('{') && trimmed.endsWith('}')) || (trimmed.startsWith('[') && trimmed.endsWith(']'))) {
    return 'application/json';
  }
  if (trimmed.startsWith('<') && trimmed.endsWith('>')) {
    return 'application/xml';
  }
  if (/^[^=&]+=[^=&]+(&[^=&]+=[^=&]+)*$/.test(trimmed)) {
    return 'application/x-www-form-urlencoded';
  }
  return 'text/plain';
}

function carriesBody(descriptor: RequestDescriptor): descriptor is RequestDescriptor & { body: string } {
  return descriptor.method !== 'GET' && descriptor.method !== 'HEAD' && descriptor.body !== undefined && descriptor.body.trim() !== '';
}

export function toTransportRequest(descriptor: RequestDescriptor): TransportRequest {
  const headers: Record<string, string> = { ...descriptor.headers };
  if (!carriesBody(descriptor)) {
    return { method: descriptor.method, url: buildUrl(descriptor), headers, followRedirects: descriptor.followRedirects };
  }
  if (findHeader(headers, 'content-type') === undefined) {
    headers['Content-Type'] = detectContentType(descriptor.body);
  }
  return {
    method: descriptor.method,
    url: buildUrl(descriptor),
    headers,
    body: descriptor.body,
    followRedirects: descriptor.followRedirects,
  };
}

export function validateDescriptor(descriptor: RequestDescriptor): string[] {
  const errors: string[] = [];

  if (!isHttpMethod(descriptor.method)) {
    errors.push(`Unsupported HTTP method: ${descriptor.method}`);
  }

  if (descriptor.url.trim() === '') {
    errors.push('URL cannot be empty');
  } else {
    const required = [...descriptor.url.matchAll(PATH_PARAM_PATTERN)].map(match => match[1]);
    const missing = [...new Set(required)].filter(name => !Object.hasOwn(descriptor.pathParameters, name));
    if (missing.length > 0) {
      errors.push(`Missing path parameters: ${missing.join(', ')}`);
    } else if (!isAbsoluteHttpUrl(buildUrl(descriptor))) {
      errors.push('URL format is invalid');
    }
  }

  if (!Number.isFinite(descriptor.timeoutMs) || descriptor.timeoutMs <= 0) {
    errors.push('Timeout must be positive');
  } else if (descriptor.timeoutMs > MAX_TIMEOUT_MS) {
    errors.push('Timeout cannot exceed 5 minutes');
  }

  for (const [name, value] of Object.entries(descriptor.headers)) {
    if (name.trim() === '') {
      errors.push('Header name cannot be empty');
    } else if (!HEADER_NAME_PATTERN.test(name)) {
      errors.push(`Header name '${name}' contains invalid characters`);
    } else if (HEADER_VALUE_FORBIDDEN.test(value)) {
      errors.push(`Header '${name}' value contains invalid characters`);
    }
  }

  if (Object.keys(descriptor.queryParameters).some(name => name.trim() === '')) {
    errors.push('Query parameter name cannot be empty');
  }
  if (Object.keys(descriptor.pathParameters).some(name => name.trim() === '')) {
    errors.push('Path parameter name cannot be empty');
  }

  return errors;
}

export function validateParameters(params: ExecutionParameters): string[] {
  const errors: string[] = [];
  const { threadCount, iterations } = params;

  if (!Number.isInteger(threadCount) || threadCount < 1) {
    errors.push('Thread count must be at least 1');
  } else if (threadCount > MAX_THREAD_COUNT) {
    errors.push(`Thread count cannot exceed ${MAX_THREAD_COUNT} (provided: ${threadCount})`);
  }

  if (!Number.isInteger(iterations) || iterations < 1) {
    errors.push('Iterations must be at least 1');
  } else if (iterations > MAX_ITERATIONS) {
    errors.push(`Iterations cannot exceed ${MAX_ITERATIONS} (provided: ${iterations})`);
  }

  return errors;
}

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
