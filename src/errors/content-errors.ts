/**
 * Content sanitization errors. These have no path: they are raised before
 * anything touches the filesystem.
 */

import { FileGuardError, ErrorKind } from "./base.js";
import { describeType } from "./filesystem-errors.js";

export class ContentError extends FileGuardError {}

/**
 * Error thrown when a value's type cannot be converted to text.
 */
export class UnsupportedTypeError extends ContentError {
  constructor(value: unknown, reason?: string, cause?: unknown) {
    const type = describeType(value);
    super(
      reason ? `Unsupported content type ${type}: ${reason}` : `Unsupported content type: ${type}`,
      ErrorKind.UNSUPPORTED_TYPE,
      {
        details: { type },
        suggestion:
          "Pass a string, number, boolean, null, plain object, array, or UTF-8 bytes.",
        cause,
      }
    );
  }
}

/**
 * Error thrown when binary content is not valid UTF-8.
 */
export class InvalidEncodingError extends ContentError {
  constructor(cause?: unknown) {
    super("Binary content must be valid UTF-8", ErrorKind.INVALID_ENCODING, { cause });
  }
}

/**
 * Error thrown when nothing but whitespace is left after sanitization.
 */
export class EmptyContentError extends ContentError {
  constructor() {
    super("Content is empty after sanitization", ErrorKind.EMPTY_CONTENT, {
      suggestion: "Printable ASCII text is kept; other characters are stripped.",
    });
  }
}
