/**
 * Pipeline modules export
 */

export { ArchiveExtractor } from "./extractor";
export type { ExtractOptions } from "./extractor";
export {
  RemoteFetcher,
  FetchFailure,
  deriveRemoteName,
  parseDispositionFilename,
} from "./fetcher";
export type { FetchError, FetchFailureReason, FetchReport } from "./fetcher";
export { InputCollector } from "./collector";
export type { CollectResult } from "./collector";
export { ConversionDispatcher } from "./dispatcher";
export type { DispatchOptions } from "./dispatcher";
export { BatchOrchestrator, validateTargetFormat } from "./orchestrator";
export type { OrchestratorOptions, RunOptions } from "./orchestrator";
export {
  ResultPackager,
  MANIFEST_NAME,
  buildManifest,
  resolveOutputNames,
  resultArchiveName,
  serializeManifest,
} from "./packager";
export type { PackResult } from "./packager";
export { stats } from "./stats";
