/**
 * Classification of a response against an operation's expected status codes.
 * @module protocol/outcome
 */

import { ProtocolError } from '../errors.js';
import { NOT_FOUND } from './operations.js';

/**
 * The part of a response classification looks at.
 */
export interface StatusLine {
  status: number;
  statusText: string;
}

/**
 * Result of one request.
 *
 * `not-found` is only produced when the operation lists 404 as expected; for
 * every other operation a 404 is `unexpected` like any other foreign code.
 */
export type OperationOutcome<R extends StatusLine> =
  | { kind: 'ok'; response: R }
  | { kind: 'not-found'; response: R }
  | { kind: 'unexpected'; response: R; error: ProtocolError };

/**
 * Classifies a response.
 */
export function classify<R extends StatusLine>(
  method: string,
  response: R,
  expected: ReadonlySet<number>
): OperationOutcome<R> {
  if (!expected.has(response.status)) {
    return {
      kind: 'unexpected',
      response,
      error: new ProtocolError(method, response.status, response.statusText),
    };
  }

  if (response.status === NOT_FOUND) {
    return { kind: 'not-found', response };
  }

  return { kind: 'ok', response };
}
