/**
 * HttpTransport on the global fetch of Node.js
 */

import type { ReadableStream as WebReadableStream } from 'node:stream/web';
import { NetworkError, ServerError, isVideoGenError } from '../errors/index.js';
import {
  getRequestId,
  type HttpHeaders,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type StreamingHttpResponse,
} from './types.js';

export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds; for streaming, until headers arrive */
  timeout: number;
}

/**
 * Statuses the transport raises itself; everything else reaches the caller
 */
const GATEWAY_ERRORS: Record<number, (requestId?: string) => ServerError> = {
  429: (requestId) => ServerError.throttled(429, requestId),
  500: (requestId) => ServerError.internalError(requestId),
  502: (requestId) => ServerError.badGateway(requestId),
  503: (requestId) => ServerError.throttled(503, requestId),
  504: (requestId) => ServerError.gatewayTimeout(requestId),
};

/**
 * Chunks of a web stream. A consumer that stops early cancels the stream;
 * `onSettled` runs once the stream is finished either way.
 */
async function* iterateStream(
  stream: WebReadableStream<Uint8Array>,
  onSettled: () => void
): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  let done = false;
  try {
    for (;;) {
      const chunk = await reader.read();
      if (chunk.done) {
        done = true;
        return;
      }
      yield chunk.value;
    }
  } finally {
    onSettled();
    if (!done) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Streaming body that can also be thrown away unread
 */
function streamingBody(
  stream: WebReadableStream<Uint8Array>,
  onSettled: () => void
): Pick<StreamingHttpResponse, 'body' | 'discard'> {
  const body = iterateStream(stream, onSettled);
  return {
    body,
    async discard(): Promise<void> {
      if (stream.locked) {
        await body.return(undefined);
        return;
      }
      onSettled();
      await stream.cancel();
    },
  };
}

/**
 * Cancel a body that will not be read
 */
async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

interface ArmedRequest {
  controller: AbortController;
  /** Stop the timeout; the caller's signal stays attached */
  stopTimer(): void;
  /** Detach from the caller's signal */
  detach(): void;
}

function toHeaderRecord(headers: Headers): HttpHeaders {
  const record: HttpHeaders = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

export class FetchTransport implements HttpTransport {
  private readonly timeout: number;

  constructor(options: FetchTransportOptions) {
    this.timeout = options.timeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const armed = this.arm(request);
    try {
      const response = await this.fetch(request, armed.controller.signal);
      const headers = toHeaderRecord(response.headers);
      await this.raiseForGateway(response, headers);

      return {
        status: response.status,
        headers,
        body: new Uint8Array(await response.arrayBuffer()),
      };
    } catch (error) {
      throw this.toTransportError(error, request);
    } finally {
      armed.stopTimer();
      armed.detach();
    }
  }

  /**
   * The timeout covers the wait for headers. The caller's signal stays
   * attached until the body is read to the end, cancelled or discarded.
   */
  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const armed = this.arm(request);
    try {
      const response = await this.fetch(request, armed.controller.signal);
      const headers = toHeaderRecord(response.headers);
      await this.raiseForGateway(response, headers);

      if (!response.body) {
        throw NetworkError.connectionFailed('Response body stream is null');
      }
      return { status: response.status, headers, ...streamingBody(response.body, armed.detach) };
    } catch (error) {
      armed.detach();
      throw this.toTransportError(error, request);
    } finally {
      armed.stopTimer();
    }
  }

  async close(): Promise<void> {
    // fetch holds no connections that need releasing
  }

  /**
   * Controller aborted by the timeout or by the caller's signal
   */
  private arm(request: HttpRequest): ArmedRequest {
    const controller = new AbortController();
    const { signal } = request;
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
    const timer = setTimeout(onAbort, this.timeout);

    return {
      controller,
      stopTimer: () => clearTimeout(timer),
      detach: () => signal?.removeEventListener('abort', onAbort),
    };
  }

  private fetch(request: HttpRequest, signal: AbortSignal): Promise<Response> {
    return fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal,
    });
  }

  private async raiseForGateway(response: Response, headers: HttpHeaders): Promise<void> {
    const toError = GATEWAY_ERRORS[response.status];
    if (toError) {
      await discardBody(response);
      throw toError(getRequestId(headers));
    }
  }

  private toTransportError(error: unknown, request: HttpRequest): Error {
    if (isVideoGenError(error)) {
      return error;
    }
    if (!(error instanceof Error)) {
      return NetworkError.connectionFailed(String(error));
    }

    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return request.signal?.aborted
        ? NetworkError.connectionFailed('Request was cancelled', error)
        : NetworkError.timeout(this.timeout);
    }

    const cause = error.cause instanceof Error ? error.cause.message : '';
    const text = `${error.message} ${cause}`.toLowerCase();
    if (text.includes('enotfound') || text.includes('eai_again')) {
      return NetworkError.dnsError(new URL(request.url).hostname);
    }
    if (text.includes('econnreset')) {
      return NetworkError.connectionReset();
    }
    return NetworkError.connectionFailed(error.message, error);
  }
}

export function createFetchTransport(timeout: number = 300000): HttpTransport {
  return new FetchTransport({ timeout });
}
