// Re-export content sanitization from a single entry point
export {
  sanitizeContent,
  contentToText,
  normalizeLineEndings,
  compactText,
  type SanitizationPolicy,
} from "./sanitizer.js";
