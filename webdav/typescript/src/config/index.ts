/**
 * Configuration for the WebDAV client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError, type ConfigurationErrorCode } from '../errors.js';

/** Default base path on the remote server. */
export const DEFAULT_BASE_PATH = '/';

/** Default URL scheme. */
export const DEFAULT_SCHEME = 'https';

/** Default request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/**
 * URL scheme used to reach the server.
 */
export type Scheme = 'http' | 'https';

/**
 * WebDAV client configuration.
 */
export interface WebDavConfig {
  /** Host name of the server, optionally with a port (e.g., "dav.example.com"). */
  networkLocation: string;
  /** Path every remote path is resolved against. */
  basePath: string;
  /** Port; overrides any port carried by the network location. */
  port?: number;
  /** URL scheme. */
  scheme: Scheme;
  /** Transport timeout for headers and body in milliseconds. */
  timeout: number;
  /** Create parent collections with MKCOL during directory uploads. */
  createParents: boolean;
  /** Enable request logging. */
  enableLogging: boolean;
}

const configSchema = z.object({
  networkLocation: z
    .string()
    .trim()
    .min(1, 'Network location cannot be empty')
    .refine((value) => !/^[a-z][a-z0-9+.-]*:\/\//i.test(value), {
      message: 'Network location must not include a scheme',
    }),
  basePath: z.string(),
  port: z
    .number()
    .int('Port must be an integer')
    .min(1, 'Port must be between 1 and 65535')
    .max(65535, 'Port must be between 1 and 65535')
    .optional(),
  scheme: z.enum(['http', 'https']),
  timeout: z.number().int().positive('Timeout must be greater than 0'),
  createParents: z.boolean(),
  enableLogging: z.boolean(),
});

const ISSUE_CODES: Partial<Record<string, ConfigurationErrorCode>> = {
  networkLocation: 'InvalidHost',
  port: 'InvalidPort',
  basePath: 'InvalidBasePath',
  timeout: 'InvalidTimeout',
};

/**
 * Creates a default configuration. The network location must still be set.
 */
export function createDefaultConfig(): WebDavConfig {
  return {
    networkLocation: '',
    basePath: DEFAULT_BASE_PATH,
    scheme: DEFAULT_SCHEME,
    timeout: DEFAULT_TIMEOUT,
    createParents: false,
    enableLogging: false,
  };
}

/**
 * Validates a WebDAV configuration.
 * @throws {ConfigurationError} If the configuration is invalid.
 */
export function validateConfig(config: WebDavConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue.path[0] ?? '');
    throw new ConfigurationError(issue.message, ISSUE_CODES[field] ?? 'InvalidConfig');
  }

  try {
    new URL(`${config.scheme}://${config.networkLocation}`);
  } catch {
    throw new ConfigurationError(
      `Invalid network location: ${config.networkLocation}`,
      'InvalidHost'
    );
  }
}

/**
 * Builder for WebDavConfig.
 */
export class WebDavConfigBuilder {
  private config: WebDavConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the server host, optionally with a port.
   */
  networkLocation(location: string): this {
    this.config.networkLocation = location.trim();
    return this;
  }

  /**
   * Sets the base path remote paths are resolved against.
   */
  basePath(path: string): this {
    this.config.basePath = path;
    return this;
  }

  /**
   * Sets the port.
   */
  port(port: number): this {
    this.config.port = port;
    return this;
  }

  /**
   * Sets the URL scheme.
   */
  scheme(scheme: Scheme): this {
    this.config.scheme = scheme;
    return this;
  }

  /**
   * Sets the transport timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Enables MKCOL of parent collections during directory uploads.
   */
  createParents(enabled: boolean = true): this {
    this.config.createParents = enabled;
    return this;
  }

  /**
   * Enables console logging.
   */
  enableLogging(enabled: boolean = true): this {
    this.config.enableLogging = enabled;
    return this;
  }

  /**
   * Loads settings from environment variables.
   *
   * Environment variables:
   * - WEBDAV_HOST: Network location
   * - WEBDAV_BASE_PATH: Base path
   * - WEBDAV_PORT: Port
   * - WEBDAV_SCHEME: http or https
   * - WEBDAV_TIMEOUT_SECS: Transport timeout in seconds
   * - WEBDAV_CREATE_PARENTS: Create parent collections (true/false)
   * - WEBDAV_ENABLE_LOGGING: Enable console logging (true/false)
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const host = env.WEBDAV_HOST;
    if (host) {
      this.networkLocation(host);
    }

    const basePath = env.WEBDAV_BASE_PATH;
    if (basePath) {
      this.basePath(basePath);
    }

    const port = env.WEBDAV_PORT;
    if (port) {
      const parsed = parseInt(port, 10);
      if (!isNaN(parsed)) {
        this.port(parsed);
      }
    }

    const scheme = env.WEBDAV_SCHEME?.toLowerCase();
    if (scheme === 'http' || scheme === 'https') {
      this.scheme(scheme);
    }

    const timeoutSecs = env.WEBDAV_TIMEOUT_SECS;
    if (timeoutSecs) {
      const timeout = parseInt(timeoutSecs, 10);
      if (!isNaN(timeout)) {
        this.timeout(timeout * 1000);
      }
    }

    const createParents = env.WEBDAV_CREATE_PARENTS;
    if (createParents !== undefined) {
      this.createParents(createParents.toLowerCase() === 'true');
    }

    const enableLogging = env.WEBDAV_ENABLE_LOGGING;
    if (enableLogging !== undefined) {
      this.enableLogging(enableLogging.toLowerCase() === 'true');
    }

    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): WebDavConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

/**
 * Namespace for WebDavConfig-related utilities.
 */
export namespace WebDavConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(): WebDavConfigBuilder {
    return new WebDavConfigBuilder();
  }

  /**
   * Creates a configuration builder pre-filled from environment variables.
   */
  export function fromEnv(env?: NodeJS.ProcessEnv): WebDavConfigBuilder {
    return new WebDavConfigBuilder().fromEnv(env);
  }

  /**
   * Validates a configuration.
   */
  export function validate(config: WebDavConfig): void {
    validateConfig(config);
  }
}
