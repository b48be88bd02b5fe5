/**
 * HTTP transport type definitions
 */

import type { Readable } from 'stream';

/**
 * HTTP methods used by the client. MKCOL is the WebDAV collection verb.
 */
export type HttpMethod = 'MKCOL' | 'PUT' | 'DELETE' | 'GET' | 'HEAD';

/**
 * Request body: an in-memory buffer or a byte stream read while sending.
 */
export type RequestBody = Buffer | Readable;

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Absolute URL */
  url: string;
  /** HTTP headers */
  headers?: Record<string, string>;
  /** Request body (optional) */
  body?: RequestBody;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Reason phrase */
  statusText: string;
  /** HTTP headers, keys lower-cased */
  headers: Record<string, string>;
  /** Response body */
  body: Buffer;
}

/**
 * HTTP response with streaming body
 */
export interface StreamingHttpResponse {
  /** HTTP status code */
  status: number;
  /** Reason phrase */
  statusText: string;
  /** HTTP headers, keys lower-cased */
  headers: Record<string, string>;
  /** Response body as stream */
  body: Readable;
}

/**
 * HTTP transport interface
 *
 * One transport instance is the client's session: implementations keep their
 * connections alive between calls until `close()`.
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns the buffered response
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Sends an HTTP request and returns the response with its body unread
   */
  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;

  /**
   * Closes the transport and releases its connections
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}
