/**
 * Transport contracts shared by submission, polling, media upload and
 * download
 */

export type HttpHeaders = Record<string, string>;

export interface HttpRequest {
  method: 'GET' | 'POST';
  /** Absolute URL, query string included */
  url: string;
  headers: HttpHeaders;
  body?: string | Uint8Array;
  /** Aborts the request when signalled */
  signal?: AbortSignal;
}

interface ResponseHead {
  status: number;
  /** Header names as the transport received them */
  headers: HttpHeaders;
}

/**
 * Response read fully into memory. Submission, status and upload responses
 * are small JSON documents.
 */
export interface HttpResponse extends ResponseHead {
  body: Uint8Array;
}

/**
 * Response whose body is consumed chunk by chunk, for artifact downloads
 */
export interface StreamingHttpResponse extends ResponseHead {
  body: AsyncIterable<Uint8Array>;
  /** Cancel a body the caller will not read, releasing the connection */
  discard(): Promise<void>;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;
  /** Release connections; the transport is unusable afterwards */
  close(): Promise<void>;
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(headers: HttpHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === wanted);
  return entry?.[1];
}

export function isSuccessResponse(response: ResponseHead): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Declared body size, or undefined when absent or not a number
 */
export function getContentLength(headers: HttpHeaders): number | undefined {
  const value = getHeader(headers, 'content-length')?.trim();
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
}

/**
 * Service log ID: `X-Tt-Logid` on the signed service, `X-Request-Id` elsewhere
 */
export function getRequestId(headers: HttpHeaders): string | undefined {
  return getHeader(headers, 'x-tt-logid') ?? getHeader(headers, 'x-request-id');
}

const utf8 = new TextDecoder();

export function bodyText(response: HttpResponse): string {
  return utf8.decode(response.body);
}
