/**
 * Operation table: the HTTP method each client operation sends and the
 * status codes it accepts.
 * @module protocol/operations
 */

import type { HttpMethod } from '../transport/index.js';

/**
 * Names of the operations that talk to the server.
 */
export type OperationName =
  | 'mkdir'
  | 'delete'
  | 'upload'
  | 'download'
  | 'exists'
  | 'size'
  | 'modifiedTime';

/**
 * Method and accepted status codes of one operation.
 */
export interface OperationDescriptor {
  readonly method: HttpMethod;
  readonly expected: ReadonlySet<number>;
}

/** Status code that `exists` and `modifiedTime` read as "no such resource". */
export const NOT_FOUND = 404;

function describe(method: HttpMethod, ...expected: number[]): OperationDescriptor {
  return Object.freeze({ method, expected: new Set(expected) });
}

/**
 * 301 and 405 on MKCOL mean the collection is already there; 404 on HEAD is an
 * answer, not a failure.
 */
export const OPERATIONS: Readonly<Record<OperationName, OperationDescriptor>> = Object.freeze({
  mkdir: describe('MKCOL', 201, 301, 405),
  delete: describe('DELETE', 204),
  upload: describe('PUT', 200, 201, 204),
  download: describe('GET', 200),
  exists: describe('HEAD', 200, 301, NOT_FOUND),
  size: describe('HEAD', 200, 301),
  modifiedTime: describe('HEAD', 200, 301, NOT_FOUND),
});
