// Re-export all filesystem functionality from a single entry point

// Operations
export {
  createFile,
  readFile,
  deleteFile,
  type CreateFileOptions,
  type ReadFileOptions,
  type DeleteFileOptions,
} from "./operations.js";

// Paths and validation
export { expandHome, resolvePath, toPathString, pathExists, type PathInput } from "./paths.js";
export {
  validatePath,
  hasHiddenName,
  type ValidationConstraints,
  type EntryKind,
} from "./validation.js";

// Directories and temp files
export { ensureDirectory, type EnsureDirectoryOptions } from "./directories.js";
export { createTempFile, type TempFileOptions, type TempFile } from "./tempfile.js";

// Hidden / read-only detection
export { isHidden, isReadonly } from "./attributes.js";
export {
  PosixAttributes,
  Win32Attributes,
  createPlatformAttributes,
  getPlatformAttributes,
  setPlatformAttributes,
  parseAttribOutput,
  type PlatformAttributes,
  type PlatformName,
  type AttributeReader,
} from "./platform.js";
