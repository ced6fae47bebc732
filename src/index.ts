/**
 * Library entry point
 */

export { BatchConverter } from "./batch";
export type { BatchConverterDeps, BatchRunOptions, BatchStage } from "./batch";
export * from "./codecs";
export * from "./converters";
export * from "./modules";
export * from "./utils";
export * from "./types";
