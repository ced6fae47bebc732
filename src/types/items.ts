/**
 * Batch data model
 * Items flow collector → dispatcher → packager; outcomes never hold payloads
 */

// ============================================================================
// Source Items
// ============================================================================

export type ItemOrigin = "direct-upload" | "archive-entry" | "remote-url";

/**
 * Per-item failure kinds recorded in the manifest
 */
export type OutcomeErrorKind =
  | "UnsupportedSource"
  | "UnsupportedPair"
  | "MalformedSource"
  | "FetchFailed"
  | "CorruptArchiveEntry"
  | "Cancelled"
  | "Timeout"
  | "InternalError";

export interface OutcomeError {
  kind: OutcomeErrorKind;
  message: string;
}

/** Intake failures carried by an item into the pipeline */
export type ItemDefect = OutcomeError & {
  kind: "FetchFailed" | "CorruptArchiveEntry";
};

export interface SourceItem {
  name: string;
  sourceFormat: string;
  origin: ItemOrigin;
  // null once released after conversion, or when intake failed
  payload: Uint8Array | null;
  defect?: ItemDefect;
}

export interface NamedBytes {
  name: string;
  data: Uint8Array;
}

// ============================================================================
// Outcomes
// ============================================================================

export type OutcomeStatus = "success" | "skipped" | "failed";

interface OutcomeBase {
  name: string;
  origin: ItemOrigin;
  outputName: string;
}

export interface SuccessOutcome extends OutcomeBase {
  status: "success";
  outputBytes: Uint8Array;
}

export interface SkippedOutcome extends OutcomeBase {
  status: "skipped";
  error: OutcomeError;
}

export interface FailedOutcome extends OutcomeBase {
  status: "failed";
  error: OutcomeError;
}

export type ConversionOutcome = SuccessOutcome | SkippedOutcome | FailedOutcome;

// ============================================================================
// Requests & Results
// ============================================================================

export interface BatchInput {
  uploads?: NamedBytes[];
  archive?: NamedBytes;
  urls?: string[];
  password?: string;
}

export interface BatchRequest {
  targetFormat: string;
  allowedSourceFormats?: string[];
  items: SourceItem[];
}

export interface ManifestItem {
  name: string;
  origin: ItemOrigin;
  status: OutcomeStatus;
  outputName: string | null;
  error: OutcomeError | null;
}

export interface ManifestSummary {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface Manifest {
  targetFormat: string;
  summary: ManifestSummary;
  items: ManifestItem[];
}

export interface BatchResult {
  manifest: Manifest;
  archiveBytes: Uint8Array;
  archiveName: string;
}

export interface BatchProgress {
  completed: number;
  total: number;
  outcome: ConversionOutcome;
}
