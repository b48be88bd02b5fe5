/**
 * undici-based HTTP transport
 */

import { Readable } from 'stream';
import { Agent, fetch, type Dispatcher, type RequestInit, type Response } from 'undici';
import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingHttpResponse,
} from './types.js';

/**
 * Default keep-alive timeout for idle connections (4 seconds).
 */
const DEFAULT_KEEP_ALIVE_TIMEOUT = 4000;

/**
 * undici transport options
 */
export interface UndiciTransportOptions {
  /** Headers and body timeout in milliseconds */
  timeout?: number;
  /** Idle connection keep-alive in milliseconds */
  keepAliveTimeout?: number;
  /**
   * Dispatcher to send through instead of a private `Agent`.
   * The transport does not close a dispatcher it was given.
   */
  dispatcher?: Dispatcher;
}

/**
 * HTTP transport on undici's fetch.
 *
 * Requests share one `Agent`, so connections are reused across calls.
 * Redirects are returned to the caller rather than followed.
 * Network failures are thrown as undici raises them.
 */
export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: UndiciTransportOptions = {}) {
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        keepAliveTimeout: options.keepAliveTimeout ?? DEFAULT_KEEP_ALIVE_TIMEOUT,
        headersTimeout: options.timeout,
        bodyTimeout: options.timeout,
      });
      this.ownsDispatcher = true;
    }
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.fetch(request);
    const body = Buffer.from(await response.arrayBuffer());

    return {
      status: response.status,
      statusText: response.statusText,
      headers: this.convertHeaders(response),
      body,
    };
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const response = await this.fetch(request);
    const body = response.body ? Readable.fromWeb(response.body) : Readable.from([]);

    return {
      status: response.status,
      statusText: response.statusText,
      headers: this.convertHeaders(response),
      body,
    };
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private fetch(request: HttpRequest): Promise<Response> {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      dispatcher: this.dispatcher,
      // Operations classify 301 themselves
      redirect: 'manual',
    };

    if (request.body) {
      init.body = request.body;
      // Required by fetch for streamed request bodies
      init.duplex = 'half';
    }

    return fetch(request.url, init);
  }

  private convertHeaders(response: Response): Record<string, string> {
    const result: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      result[key.toLowerCase()] = value;
    });
    return result;
  }
}

/**
 * Creates an undici transport
 */
export function createUndiciTransport(options?: UndiciTransportOptions): HttpTransport {
  return new UndiciTransport(options);
}
