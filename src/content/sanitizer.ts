import {
  EmptyContentError,
  InvalidEncodingError,
  UnsupportedTypeError,
  getErrorMessage,
} from "../errors/index.js";

export interface SanitizationPolicy {
  /** Collapse blank lines and whitespace runs, then trim. Defaults to false. */
  compact?: boolean;
}

// Everything outside printable ASCII, tab and newline
const STRIPPED_CHARACTERS = /[^\x20-\x7E\t\n]/g;

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function serializeStructured(value: object, compact: boolean): string {
  let json: string;
  try {
    json = JSON.stringify(value, null, compact ? undefined : 2);
  } catch (error) {
    throw new UnsupportedTypeError(value, `cannot serialize as JSON: ${getErrorMessage(error)}`, error);
  }
  // A toJSON() returning undefined leaves nothing to write
  if (typeof json !== "string") {
    throw new UnsupportedTypeError(value, "serializes to nothing");
  }
  return json;
}

function decodeUtf8(bytes: Uint8Array | ArrayBuffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new InvalidEncodingError(error);
  }
}

/**
 * Convert a value to text. `null` and `undefined` become "null";
 * booleans become "true" / "false".
 */
export function contentToText(value: unknown, compact = false): string {
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "bigint":
    case "boolean":
      return String(value);
    case "undefined":
      return "null";
  }

  if (value === null) {
    return "null";
  }

  if (typeof value === "object") {
    if (Array.isArray(value) || isPlainObject(value)) {
      return serializeStructured(value, compact);
    }
    if (value instanceof Uint8Array || value instanceof ArrayBuffer) {
      return decodeUtf8(value);
    }
  }

  throw new UnsupportedTypeError(value);
}

/**
 * Normalize line endings to Unix style (LF)
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

/**
 * Collapse blank lines and space/tab runs, then trim.
 */
export function compactText(text: string): string {
  return text.replace(/\n{2,}/g, "\n").replace(/[ \t]+/g, " ").trim();
}

/**
 * Turn an arbitrary value into the text written to disk.
 *
 * Structured values are JSON (2-space indent unless compact). Every character
 * outside printable ASCII, tab and newline is removed, CR included, so CRLF
 * becomes LF and a lone CR disappears. This includes non-ASCII letters, which
 * existing callers rely on.
 *
 * @throws UnsupportedTypeError when the value cannot be converted
 * @throws InvalidEncodingError when binary input is not valid UTF-8
 * @throws EmptyContentError when only whitespace is left
 */
export function sanitizeContent(value: unknown, policy: SanitizationPolicy = {}): string {
  const compact = policy.compact ?? false;

  // CR is outside the kept set, so a lone CR is dropped rather than turned into LF
  let text = contentToText(value, compact).replace(STRIPPED_CHARACTERS, "");
  text = normalizeLineEndings(text);

  if (compact) {
    text = compactText(text);
  }

  if (text.trim().length === 0) {
    throw new EmptyContentError();
  }

  return text;
}
