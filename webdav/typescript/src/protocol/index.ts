/**
 * WebDAV request/response protocol
 */

export {
  OPERATIONS,
  NOT_FOUND,
  type OperationName,
  type OperationDescriptor,
} from './operations.js';
export { classify, type OperationOutcome, type StatusLine } from './outcome.js';
export { parseContentLength, parseHttpDate, parseLastModified } from './headers.js';
