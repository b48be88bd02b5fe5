/**
 * Remote path and URL resolution.
 * @module paths
 */

import { posix, relative, sep } from 'path';
import type { Scheme } from '../config/index.js';

/**
 * Removes every leading `/` so a path can only ever extend a base path.
 */
export function stripLeadingSeparators(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * Joins a caller-supplied path onto the configured base path.
 *
 * `resolveFullPath(base, '/p')` and `resolveFullPath(base, 'p')` are identical.
 * Segments such as `..` are normalized lexically and not rejected.
 */
export function resolveFullPath(basePath: string, relativePath: string): string {
  return posix.join(basePath, stripLeadingSeparators(relativePath));
}

/**
 * Builds an absolute URL. The path is percent-encoded by the URL parser.
 *
 * @example
 * ```typescript
 * buildUrl('dav.example.com', '/files/a b.txt', 8443);
 * // => 'https://dav.example.com:8443/files/a%20b.txt'
 * ```
 */
export function buildUrl(
  networkLocation: string,
  path: string,
  port?: number,
  scheme: Scheme = 'https'
): string {
  const url = new URL(`${scheme}://${networkLocation}`);
  if (port !== undefined) {
    url.port = String(port);
  }
  url.pathname = path;
  return url.toString();
}

/**
 * Path of a local file below a local root, using `/` separators.
 */
export function toRemoteRelativePath(localRoot: string, localFile: string): string {
  return relative(localRoot, localFile).split(sep).join('/');
}
