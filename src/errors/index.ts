/**
 * Error handling module for fileguard.
 *
 * This module provides:
 * - Error classes carrying an explicit ErrorKind
 * - Path-carrying validation errors (or "<tempfile>" before a path exists)
 * - Conversion of Node.js fs errors to the nearest kind, keeping the cause
 * - Result values for callers that branch on failures instead of catching
 *
 * Usage:
 * ```typescript
 * import { ErrorKind, attempt } from './errors';
 *
 * const result = await attempt(() => validatePath(p), 'validate', p);
 * if (!result.ok && result.error.kind === ErrorKind.NOT_FOUND) {
 *   // ...
 * }
 * ```
 */

// Base error class and types
export { FileGuardError, ErrorKind } from "./base.js";
export type { ErrorDetails, FileGuardErrorOptions } from "./base.js";

// Path and file operation errors
export {
  TEMPFILE_PLACEHOLDER,
  InvalidInputKindError,
  PathValidationError,
  PathNotFoundError,
  WrongKindError,
  HiddenPathError,
  NotReadableError,
  NotWritableError,
  PermissionDeniedError,
  AlreadyExistsError,
  IsADirectoryError,
  DecodeError,
  DirectoryCreateFailedError,
  TempFileCreateFailedError,
  OperationFailedError,
  describeType,
} from "./filesystem-errors.js";

// Content errors
export {
  ContentError,
  UnsupportedTypeError,
  InvalidEncodingError,
  EmptyContentError,
} from "./content-errors.js";

// Error utilities
export {
  isErrnoException,
  toFileGuardError,
  logError,
  guard,
  attempt,
  unwrap,
  withErrorHandling,
  getErrorMessage,
  type Result,
} from "./utils.js";
