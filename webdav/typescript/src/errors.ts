/**
 * WebDAV Error Types
 *
 * Error hierarchy for the WebDAV storage client. Only protocol-level failures
 * (a status code outside an operation's expected set) are modelled here;
 * transport and filesystem errors reach the caller untouched.
 */

/**
 * Base WebDAV error class.
 */
export class WebDavError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;

  constructor(message: string, code: string, options?: { statusCode?: number }) {
    super(message);
    this.name = 'WebDavError';
    this.code = code;
    this.statusCode = options?.statusCode;
    Object.setPrototypeOf(this, WebDavError.prototype);
  }
}

/**
 * Raised when the server answers with a status code the operation does not expect.
 */
export class ProtocolError extends WebDavError {
  public readonly method: string;
  public readonly reason: string;
  public override readonly statusCode: number;

  constructor(method: string, statusCode: number, reason: string) {
    super(
      `Method ${method} returns status code: ${statusCode} and reason: ${reason}`,
      'Protocol.UnexpectedStatus',
      { statusCode }
    );
    this.name = 'ProtocolError';
    this.method = method;
    this.reason = reason;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

/**
 * Configuration error codes.
 */
export type ConfigurationErrorCode =
  | 'InvalidHost'
  | 'InvalidPort'
  | 'InvalidBasePath'
  | 'InvalidTimeout'
  | 'InvalidConfig';

/**
 * Configuration error.
 */
export class ConfigurationError extends WebDavError {
  constructor(message: string, code: ConfigurationErrorCode = 'InvalidConfig') {
    super(message, `Configuration.${code}`);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A response header that could not be interpreted.
 */
export class HeaderParseError extends WebDavError {
  public readonly header: string;
  public readonly value: string;

  constructor(
    header: string,
    value: string,
    code: 'InvalidContentLength' | 'InvalidLastModified'
  ) {
    super(`Cannot parse ${header} header: ${value}`, `Header.${code}`);
    this.name = 'HeaderParseError';
    this.header = header;
    this.value = value;
    Object.setPrototypeOf(this, HeaderParseError.prototype);
  }
}

/**
 * Type guard for WebDavError.
 */
export function isWebDavError(error: unknown): error is WebDavError {
  return error instanceof WebDavError;
}

/**
 * Type guard for ProtocolError.
 */
export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}
