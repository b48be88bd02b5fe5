/**
 * webdav-storage - WebDAV client for remote file storage
 *
 * Filesystem-style operations over WebDAV with:
 * - Idempotent collection creation and deletion
 * - File, stream and recursive directory uploads
 * - Buffered and streaming downloads
 * - Existence, size and modification-time checks
 *
 * @example
 * ```typescript
 * import { createClient } from 'webdav-storage';
 *
 * const client = createClient()
 *   .networkLocation('dav.example.com')
 *   .basePath('/remote.php/dav/files/storage')
 *   .build();
 *
 * await client.mkdir('/reports');
 * await client.uploadFile('./summary.pdf', '/reports/summary.pdf');
 * const exists = await client.exists('/reports/summary.pdf');
 * const file = await client.download('/reports/summary.pdf');
 * await client.close();
 * ```
 *
 * @module webdav-storage
 */

// Client
export {
  WebDavClient,
  WebDavClientBuilder,
  createClient,
  createClientFromEnv,
  type WebDavClientOptions,
  type SendOptions,
  type UploadSource,
} from './client/index.js';

// Configuration
export {
  WebDavConfig,
  WebDavConfigBuilder,
  createDefaultConfig,
  validateConfig,
  DEFAULT_BASE_PATH,
  DEFAULT_SCHEME,
  DEFAULT_TIMEOUT,
  type Scheme,
} from './config/index.js';

// Errors
export {
  WebDavError,
  ProtocolError,
  ConfigurationError,
  HeaderParseError,
  isWebDavError,
  isProtocolError,
  type ConfigurationErrorCode,
} from './errors.js';

// Protocol
export {
  OPERATIONS,
  NOT_FOUND,
  classify,
  parseContentLength,
  parseHttpDate,
  parseLastModified,
  type OperationName,
  type OperationDescriptor,
  type OperationOutcome,
  type StatusLine,
} from './protocol/index.js';

// Paths
export {
  resolveFullPath,
  buildUrl,
  stripLeadingSeparators,
  toRemoteRelativePath,
} from './paths/index.js';

// Transport
export {
  UndiciTransport,
  createUndiciTransport,
  getHeader,
  type UndiciTransportOptions,
  type HttpMethod,
  type RequestBody,
  type HttpRequest,
  type HttpResponse,
  type StreamingHttpResponse,
  type HttpTransport,
} from './transport/index.js';

// Content
export { ContentFile } from './content/index.js';

// Filesystem
export { walkFiles } from './fs/walk.js';

// Observability
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createConsoleLogger,
  createNoopLogger,
  createInMemoryLogger,
  sanitizeContext,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './observability/index.js';

// Simulation
export {
  MockTransport,
  createMockTransport,
  type MockResponse,
  type MockHandler,
  type RecordedRequest,
} from './simulation/index.js';
