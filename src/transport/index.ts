/**
 * HTTP transport: buffered exchanges for JSON, streamed bodies for downloads
 * @module volcengine-video-jobs/transport
 */

export {
  bodyText,
  getContentLength,
  getHeader,
  getRequestId,
  isSuccessResponse,
  type HttpHeaders,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type StreamingHttpResponse,
} from './types.js';

export { FetchTransport, createFetchTransport, type FetchTransportOptions } from './fetch-transport.js';
