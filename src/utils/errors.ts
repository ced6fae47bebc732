/**
 * Batch-level errors
 * Anything thrown from here aborts the request; per-item problems never do
 */

export type BatchErrorCode =
  | "NO_INPUTS"
  | "INVALID_TARGET_FORMAT"
  | "UNSUPPORTED_ARCHIVE"
  | "ARCHIVE_PASSWORD_REQUIRED"
  | "PACKAGING_FAILED";

export abstract class BatchError extends Error {
  abstract readonly code: BatchErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NoInputsError extends BatchError {
  readonly code = "NO_INPUTS";

  constructor() {
    super("No inputs: provide files, an archive or URLs");
  }
}

export class InvalidTargetFormatError extends BatchError {
  readonly code = "INVALID_TARGET_FORMAT";

  constructor(readonly targetFormat: string) {
    super(`Invalid target format: "${targetFormat}"`);
  }
}

export class UnsupportedArchiveError extends BatchError {
  readonly code = "UNSUPPORTED_ARCHIVE";

  constructor(
    readonly archiveName: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot extract ${archiveName}: ${reason}`, options);
  }
}

export class ArchivePasswordRequiredError extends BatchError {
  readonly code = "ARCHIVE_PASSWORD_REQUIRED";

  constructor(readonly archiveName: string) {
    super(`Archive ${archiveName} is encrypted and no password was supplied`);
  }
}

export class PackagingError extends BatchError {
  readonly code = "PACKAGING_FAILED";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Failed to package results: ${message}`, options);
  }
}

export function isBatchError(error: unknown): error is BatchError {
  return error instanceof BatchError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
