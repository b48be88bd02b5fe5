/**
 * HTTP transport layer
 */

export type {
  HttpMethod,
  RequestBody,
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
} from './types.js';
export { getHeader } from './types.js';
export {
  UndiciTransport,
  createUndiciTransport,
  type UndiciTransportOptions,
} from './undici-transport.js';
