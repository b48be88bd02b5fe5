/**
 * WebDAV Client
 *
 * Maps filesystem-style operations onto WebDAV requests:
 * - MKCOL for collections, PUT for uploads, DELETE, GET for downloads
 * - HEAD for existence, size and modification time
 * - recursive directory upload on top of single-file uploads
 *
 * Every operation sends one request and checks the status code against the
 * operation's expected set (see `OPERATIONS`).
 *
 * @module client
 */

import type { Readable } from 'stream';
import { open } from 'fs/promises';
import { posix } from 'path';
import { buffer } from 'stream/consumers';
import {
  WebDavConfigBuilder,
  type Scheme,
  type WebDavConfig,
} from '../config/index.js';
import { ContentFile } from '../content/index.js';
import { walkFiles } from '../fs/walk.js';
import {
  createConsoleLogger,
  createNoopLogger,
  type Logger,
} from '../observability/index.js';
import { buildUrl, resolveFullPath, toRemoteRelativePath } from '../paths/index.js';
import {
  OPERATIONS,
  classify,
  parseContentLength,
  parseLastModified,
  type OperationName,
  type OperationOutcome,
} from '../protocol/index.js';
import {
  UndiciTransport,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type RequestBody,
  type StreamingHttpResponse,
} from '../transport/index.js';

/**
 * WebDAV client options.
 */
export interface WebDavClientOptions {
  /** Custom HTTP transport (for testing or to add authentication). */
  transport?: HttpTransport;
  /** Logger instance. */
  logger?: Logger;
}

/**
 * Per-request options for the dispatch primitives.
 */
export interface SendOptions {
  /** Request body */
  body?: RequestBody;
  /** Request headers */
  headers?: Record<string, string>;
}

/**
 * What to upload: a local file the client opens and closes itself, or a stream
 * the caller keeps ownership of.
 */
export type UploadSource =
  | { kind: 'file'; path: string }
  | { kind: 'stream'; stream: Readable };

/**
 * WebDAV client.
 *
 * Holds one transport for its whole life; close it with `close()`.
 */
export class WebDavClient {
  private readonly config: Readonly<WebDavConfig>;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(config: WebDavConfig, options: WebDavClientOptions = {}) {
    this.config = Object.freeze({ ...config });
    this.transport = options.transport ?? new UndiciTransport({ timeout: config.timeout });

    const logger =
      options.logger ?? (config.enableLogging ? createConsoleLogger() : createNoopLogger());
    this.logger = logger.child({ networkLocation: config.networkLocation });

    this.logger.info('WebDAV client initialized', {
      basePath: config.basePath,
      port: config.port,
      scheme: config.scheme,
    });
  }

  /**
   * Full remote path of `remotePath` below the base path.
   */
  resolvePath(remotePath: string): string {
    return resolveFullPath(this.config.basePath, remotePath);
  }

  /**
   * Absolute URL of `remotePath`. No request is made.
   *
   * The configured port is included, so this is the URL requests go to, not
   * one built from the network location alone.
   */
  url(remotePath: string): string {
    return buildUrl(
      this.config.networkLocation,
      this.resolvePath(remotePath),
      this.config.port,
      this.config.scheme
    );
  }

  /**
   * Sends one request and classifies the response without throwing on a
   * foreign status code.
   */
  async dispatch(
    method: HttpMethod,
    remotePath: string,
    expected: ReadonlySet<number>,
    options: SendOptions = {}
  ): Promise<OperationOutcome<HttpResponse>> {
    const request = this.buildRequest(method, remotePath, options);
    const response = await this.transport.send(request);
    this.logResponse(request, response.status);
    return classify(method, response, expected);
  }

  /**
   * Sends one request and returns the buffered response.
   * @throws {ProtocolError} If the status code is not in `expected`.
   */
  async send(
    method: HttpMethod,
    remotePath: string,
    expected: ReadonlySet<number>,
    options: SendOptions = {}
  ): Promise<HttpResponse> {
    const outcome = await this.dispatch(method, remotePath, expected, options);
    if (outcome.kind === 'unexpected') {
      throw outcome.error;
    }
    return outcome.response;
  }

  /**
   * Sends one request and returns the response with its body unread.
   * @throws {ProtocolError} If the status code is not in `expected`.
   */
  async sendStreaming(
    method: HttpMethod,
    remotePath: string,
    expected: ReadonlySet<number>,
    options: SendOptions = {}
  ): Promise<StreamingHttpResponse> {
    const request = this.buildRequest(method, remotePath, options);
    const response = await this.transport.sendStreaming(request);
    this.logResponse(request, response.status);

    const outcome = classify(method, response, expected);
    if (outcome.kind === 'unexpected') {
      response.body.destroy();
      throw outcome.error;
    }
    return outcome.response;
  }

  /**
   * Creates a collection. An existing collection (405) or a redirect (301)
   * counts as success.
   */
  async mkdir(remotePath: string): Promise<void> {
    await this.perform('mkdir', remotePath);
  }

  /**
   * Deletes a resource. Never fails on the status code: a resource that is
   * already gone is an acceptable result. Network errors still propagate.
   */
  async delete(remotePath: string): Promise<void> {
    const { method, expected } = OPERATIONS.delete;
    const outcome = await this.dispatch(method, remotePath, expected);

    if (outcome.kind === 'unexpected') {
      this.logger.debug('Delete not confirmed by server', {
        path: remotePath,
        statusCode: outcome.error.statusCode,
        reason: outcome.error.reason,
      });
    }
  }

  /**
   * Uploads a local file or a stream to `remotePath`.
   * @returns The remote path.
   */
  async upload(source: UploadSource, remotePath: string): Promise<string> {
    switch (source.kind) {
      case 'file':
        return this.uploadFile(source.path, remotePath);
      case 'stream':
        return this.uploadStream(source.stream, remotePath);
    }
  }

  /**
   * Streams a local file to `remotePath`. The file is closed whether the
   * request succeeds or fails.
   * @returns The remote path.
   */
  async uploadFile(localPath: string, remotePath: string): Promise<string> {
    const handle = await open(localPath, 'r');
    const stream = handle.createReadStream();

    try {
      await this.perform('upload', remotePath, { body: stream });
    } finally {
      stream.destroy();
      await handle.close();
    }
    return remotePath;
  }

  /**
   * Streams `stream` to `remotePath`. The stream stays the caller's to close.
   * @returns The remote path.
   */
  async uploadStream(stream: Readable, remotePath: string): Promise<string> {
    await this.perform('upload', remotePath, { body: stream });
    return remotePath;
  }

  /**
   * Downloads a resource into memory.
   */
  async download(remotePath: string): Promise<ContentFile> {
    const body = await this.downloadStream(remotePath);
    const content = await buffer(body);
    return new ContentFile(content, posix.basename(remotePath));
  }

  /**
   * Downloads a resource as a stream. The caller must consume or destroy it.
   */
  async downloadStream(remotePath: string): Promise<Readable> {
    const { method, expected } = OPERATIONS.download;
    const response = await this.sendStreaming(method, remotePath, expected);
    return response.body;
  }

  /**
   * Whether the resource exists. Only a 404 answers `false`.
   */
  async exists(remotePath: string): Promise<boolean> {
    const { method, expected } = OPERATIONS.exists;
    const outcome = await this.dispatch(method, remotePath, expected);

    switch (outcome.kind) {
      case 'ok':
        return true;
      case 'not-found':
        return false;
      case 'unexpected':
        throw outcome.error;
    }
  }

  /**
   * Size of the resource in bytes from `content-length`, 0 when absent.
   */
  async size(remotePath: string): Promise<number> {
    const response = await this.perform('size', remotePath);
    return parseContentLength(response.headers);
  }

  /**
   * Modification time from `last-modified`, `undefined` when absent.
   */
  async modifiedTime(remotePath: string): Promise<Date | undefined> {
    const response = await this.perform('modifiedTime', remotePath);
    return parseLastModified(response.headers);
  }

  /**
   * Uploads every regular file below `localRoot` to the same relative path
   * below `remoteRoot`, one at a time in walk order. The first failure stops
   * the walk; files uploaded before it stay on the server.
   *
   * Parent collections are not created unless `createParents` is configured:
   * by default the server must accept the nested PUTs, or the caller has to
   * create the tree beforehand.
   *
   * @returns The remote paths uploaded, in order.
   */
  async uploadDir(remoteRoot: string, localRoot: string): Promise<string[]> {
    const uploaded: string[] = [];
    const collections = new Set<string>();

    for await (const localFile of walkFiles(localRoot)) {
      const relativePath = toRemoteRelativePath(localRoot, localFile);
      const remotePath = posix.join(remoteRoot, relativePath);

      if (this.config.createParents) {
        await this.ensureCollections(remoteRoot, posix.dirname(relativePath), collections);
      }

      await this.uploadFile(localFile, remotePath);
      uploaded.push(remotePath);
      this.logger.debug('Uploaded file', { localFile, path: remotePath });
    }

    this.logger.info('Directory uploaded', {
      localRoot,
      remoteRoot,
      files: uploaded.length,
    });
    return uploaded;
  }

  /**
   * Closes the transport.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  /**
   * Get the client configuration.
   */
  getConfig(): Readonly<WebDavConfig> {
    return this.config;
  }

  private perform(
    operation: OperationName,
    remotePath: string,
    options?: SendOptions
  ): Promise<HttpResponse> {
    const { method, expected } = OPERATIONS[operation];
    return this.send(method, remotePath, expected, options);
  }

  private buildRequest(
    method: HttpMethod,
    remotePath: string,
    options: SendOptions
  ): HttpRequest {
    return {
      method,
      url: this.url(remotePath),
      headers: options.headers,
      body: options.body,
    };
  }

  /**
   * MKCOL for `remoteRoot` and each collection down to `relativeDir`, skipping
   * those already created during this upload.
   */
  private async ensureCollections(
    remoteRoot: string,
    relativeDir: string,
    created: Set<string>
  ): Promise<void> {
    const segments = relativeDir === '.' ? [] : relativeDir.split('/');
    let collection = remoteRoot;
    const chain = [collection];
    for (const segment of segments) {
      collection = posix.join(collection, segment);
      chain.push(collection);
    }

    for (const path of chain) {
      if (!created.has(path)) {
        await this.mkdir(path);
        created.add(path);
      }
    }
  }

  private logResponse(request: HttpRequest, status: number): void {
    this.logger.debug('WebDAV request completed', {
      method: request.method,
      url: request.url,
      status,
    });
  }
}

/**
 * WebDAV client builder.
 */
export class WebDavClientBuilder {
  private readonly configBuilder = new WebDavConfigBuilder();
  private readonly options: WebDavClientOptions = {};

  /**
   * Set the server host, optionally with a port.
   */
  networkLocation(location: string): this {
    this.configBuilder.networkLocation(location);
    return this;
  }

  /**
   * Set the base path.
   */
  basePath(path: string): this {
    this.configBuilder.basePath(path);
    return this;
  }

  /**
   * Set the port.
   */
  port(port: number): this {
    this.configBuilder.port(port);
    return this;
  }

  /**
   * Set the URL scheme.
   */
  scheme(scheme: Scheme): this {
    this.configBuilder.scheme(scheme);
    return this;
  }

  /**
   * Set the transport timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.configBuilder.timeout(timeout);
    return this;
  }

  /**
   * Create parent collections during directory uploads.
   */
  createParents(enabled: boolean = true): this {
    this.configBuilder.createParents(enabled);
    return this;
  }

  /**
   * Enable console logging.
   */
  enableLogging(enabled: boolean = true): this {
    this.configBuilder.enableLogging(enabled);
    return this;
  }

  /**
   * Set a custom logger.
   */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Set a custom HTTP transport.
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env?: NodeJS.ProcessEnv): this {
    this.configBuilder.fromEnv(env);
    return this;
  }

  /**
   * Build the client.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): WebDavClient {
    return new WebDavClient(this.configBuilder.build(), this.options);
  }
}

/**
 * Create a new WebDAV client builder.
 */
export function createClient(): WebDavClientBuilder {
  return new WebDavClientBuilder();
}

/**
 * Create a WebDAV client from environment variables.
 * @see WebDavConfigBuilder.fromEnv
 */
export function createClientFromEnv(options: WebDavClientOptions = {}): WebDavClient {
  const config = new WebDavConfigBuilder().fromEnv().build();
  return new WebDavClient(config, options);
}
