import { vi } from 'vitest';
import type { HttpRequest, HttpResponse, StreamingHttpResponse } from '../transport/index.js';

const encoder = new TextEncoder();

export function jsonResponse(
  body: unknown,
  status: number = 200,
  headers: Record<string, string> = {}
): HttpResponse {
  return textResponse(JSON.stringify(body), status, headers);
}

export function textResponse(
  body: string,
  status: number = 200,
  headers: Record<string, string> = {}
): HttpResponse {
  return { status, headers, body: encoder.encode(body) };
}

async function* fromChunks(chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

/**
 * Streaming response whose `discard` is a spy
 */
export function streamResponse(
  chunks: Uint8Array[],
  status: number = 200,
  headers: Record<string, string> = {}
) {
  return {
    status,
    headers,
    body: fromChunks(chunks),
    discard: vi.fn(async (): Promise<void> => undefined),
  } satisfies StreamingHttpResponse;
}

export function createMockHttpTransport() {
  return {
    send: vi.fn(async (_request: HttpRequest): Promise<HttpResponse> => jsonResponse({})),
    sendStreaming: vi.fn(
      async (_request: HttpRequest): Promise<StreamingHttpResponse> => streamResponse([])
    ),
    close: vi.fn(async (): Promise<void> => undefined),
  };
}

export type MockHttpTransport = ReturnType<typeof createMockHttpTransport>;

/**
 * The request passed to the nth call of `send`
 */
export function sentRequest(transport: MockHttpTransport, index: number): HttpRequest {
  const call = transport.send.mock.calls[index];
  if (!call) {
    throw new Error(`send was called ${transport.send.mock.calls.length} times, expected call ${index}`);
  }
  return call[0];
}

/**
 * Parsed JSON body of the nth `send` request
 */
export function sentJson(transport: MockHttpTransport, index: number): unknown {
  const body = sentRequest(transport, index).body;
  return JSON.parse(typeof body === 'string' ? body : new TextDecoder().decode(body));
}
