/**
 * Central type exports
 */

// Configuration
export type {
  BatchConverterConfig,
  PartialBatchConverterConfig,
  BatchConfig,
  FetchConfig,
  ArchiveConfig,
  OutputConfig,
  MarkdownConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  BatchConverterConfigSchema,
  PartialBatchConverterConfigSchema,
} from "./config";

// Items & outcomes
export type {
  ItemOrigin,
  OutcomeErrorKind,
  OutcomeError,
  ItemDefect,
  SourceItem,
  NamedBytes,
  OutcomeStatus,
  SuccessOutcome,
  SkippedOutcome,
  FailedOutcome,
  ConversionOutcome,
  BatchInput,
  BatchRequest,
  ManifestItem,
  ManifestSummary,
  Manifest,
  BatchResult,
  BatchProgress,
} from "./items";

// Archives
export type {
  ArchiveEntry,
  OpenArchiveOptions,
  ArchiveReader,
  ArchiveWriterOptions,
  ArchiveWriter,
  ArchiveCodec,
} from "./archive";

// Converter
export type {
  ConversionStatus,
  ConverterResult,
  ConvertOptions,
  Converter,
  SupportedConversions,
} from "./converter";

// Context
export type { BatchContext } from "./context";
