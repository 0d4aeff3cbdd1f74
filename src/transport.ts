import { TransportError } from './errors.js';
import { HttpTransport, TransportRequest, TransportResponse } from './types.js';

export interface FetchTransportOptions {
  fetch?: typeof globalThis.fetch;
}

/**
 * HttpTransport over the global fetch. Resolves once the body is fully read.
 */
export class FetchTransport implements HttpTransport {
  private fetchImpl?: typeof globalThis.fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetch;
  }

  async send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
    const fetchImpl = this.fetchImpl ?? globalThis.fetch;
    if (typeof fetchImpl !== 'function') {
      throw new TransportError('No fetch implementation available', 'NO_FETCH');
    }

    const response = await fetchImpl(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      redirect: request.followRedirects ? 'follow' : 'manual',
      signal,
    });

    const buffer = await response.arrayBuffer();
    const headers: Record<string, string[]> = {};
    response.headers.forEach((value, name) => {
      (headers[name] ??= []).push(value);
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body: new TextDecoder().decode(buffer),
      size: buffer.byteLength,
    };
  }
}
