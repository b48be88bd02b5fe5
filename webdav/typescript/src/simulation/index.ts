/**
 * WebDAV Simulation Module
 *
 * In-process transport with configurable responses, for tests of the client
 * and of code built on it.
 */

import { STATUS_CODES } from 'http';
import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingHttpResponse,
} from '../transport/index.js';

/**
 * A request as the mock saw it, with the body read into memory.
 */
export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  /** URL path, percent-decoded */
  path: string;
  headers: Record<string, string>;
  body?: Buffer;
}

/**
 * Response description; missing parts are filled with defaults.
 */
export interface MockResponse {
  status: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: Buffer | string;
}

/**
 * Produces the response for a matched request.
 */
export type MockHandler = (request: RecordedRequest) => MockResponse | Promise<MockResponse>;

interface Route {
  method: HttpMethod;
  path: string | RegExp;
  handler: MockHandler;
}

function toHandler(response: MockResponse | MockHandler): MockHandler {
  return typeof response === 'function' ? response : () => response;
}

function toHttpResponse(response: MockResponse): HttpResponse {
  const body = response.body ?? '';
  return {
    status: response.status,
    statusText: response.statusText ?? STATUS_CODES[response.status] ?? '',
    headers: Object.fromEntries(
      Object.entries(response.headers ?? {}).map(([key, value]) => [key.toLowerCase(), value])
    ),
    body: typeof body === 'string' ? Buffer.from(body) : body,
  };
}

/**
 * Mock transport that returns configurable responses.
 *
 * Routes match on method and URL path (percent-decoded); the first matching
 * route wins. An unmatched request fails like a connection error would.
 */
export class MockTransport implements HttpTransport {
  private routes: Route[] = [];
  private requests: RecordedRequest[] = [];
  private defaultHandler?: MockHandler;
  private closed = false;

  /**
   * Register a response for a method and path.
   */
  on(method: HttpMethod, path: string | RegExp, response: MockResponse | MockHandler): this {
    this.routes.push({ method, path, handler: toHandler(response) });
    return this;
  }

  /**
   * Set the response for unmatched requests.
   */
  onDefault(response: MockResponse | MockHandler): this {
    this.defaultHandler = toHandler(response);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const recorded = await this.record(request);
    return toHttpResponse(await this.resolve(recorded));
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const response = await this.send(request);
    return { ...response, body: Readable.from([response.body]) };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * All requests sent so far.
   */
  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  /**
   * Whether `close()` was called.
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Clear routes and recorded requests.
   */
  clear(): void {
    this.routes = [];
    this.requests = [];
    this.defaultHandler = undefined;
  }

  private async record(request: HttpRequest): Promise<RecordedRequest> {
    if (this.closed) {
      throw new Error('Mock transport is closed');
    }

    let body: Buffer | undefined;
    if (Buffer.isBuffer(request.body)) {
      body = Buffer.from(request.body);
    } else if (request.body) {
      body = await buffer(request.body);
    }

    const recorded: RecordedRequest = {
      method: request.method,
      url: request.url,
      path: decodeURIComponent(new URL(request.url).pathname),
      headers: { ...request.headers },
      body,
    };
    this.requests.push(recorded);
    return recorded;
  }

  private resolve(request: RecordedRequest): MockResponse | Promise<MockResponse> {
    const route = this.routes.find(
      (candidate) =>
        candidate.method === request.method &&
        (typeof candidate.path === 'string'
          ? candidate.path === request.path
          : candidate.path.test(request.path))
    );

    if (route) {
      return route.handler(request);
    }
    if (this.defaultHandler) {
      return this.defaultHandler(request);
    }
    throw new Error(`No mock response for ${request.method} ${request.url}`);
  }
}

/**
 * Create a mock transport.
 */
export function createMockTransport(): MockTransport {
  return new MockTransport();
}
