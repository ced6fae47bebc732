/**
 * Batch context - flows through the CLI pipeline
 * Each stage reads what it needs and writes its results back
 */

import type { BatchConverterConfig } from "./config";
import type { BatchInput, BatchResult } from "./items";
import type { Logger } from "../utils/logger";

export interface BatchContext {
  // Input - provided at initialization
  config: BatchConverterConfig;
  logger: Logger;
  targetFormat: string;
  allowedSourceFormats?: string[];
  verbose?: boolean;

  input?: BatchInput;
  result?: BatchResult;
  archivePath?: string;
  startTime: Date;
}
