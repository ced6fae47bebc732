/**
 * Utility exports
 */

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Errors
export {
  BatchError,
  NoInputsError,
  InvalidTargetFormatError,
  UnsupportedArchiveError,
  ArchivePasswordRequiredError,
  PackagingError,
  isBatchError,
  getErrorMessage,
} from "./errors";
export type { BatchErrorCode } from "./errors";

// Deadlines
export { DeadlineError, withDeadline, linkSignals } from "./deadline";

// Path/filename utilities
export {
  getBaseName,
  getFileExtension,
  getFileStem,
  normalizeFormat,
  sanitizeEntryName,
  toOutputName,
} from "./filename";

// Classes
export { Logger } from "./logger";
