/**
 * BatchConverter - Pipeline facade
 * Wires the modules together: collect inputs, then orchestrate and package
 */

import { createDefaultCodecs, createZipCodec } from "./codecs";
import {
  ArchiveExtractor,
  BatchOrchestrator,
  ConversionDispatcher,
  InputCollector,
  RemoteFetcher,
  ResultPackager,
  validateTargetFormat,
} from "./modules";
import { Logger } from "./utils/logger";
import type {
  ArchiveCodec,
  BatchConverterConfig,
  BatchInput,
  BatchProgress,
  BatchResult,
  Converter,
} from "./types";

export type BatchStage = "collecting" | "converting";

export interface BatchConverterDeps {
  converter: Converter;
  codecs?: ArchiveCodec[];
  fetch?: typeof fetch;
  logger?: Logger;
}

export interface BatchRunOptions {
  targetFormat: string;
  allowedSourceFormats?: string[];
  signal?: AbortSignal;
  onStage?: (stage: BatchStage) => void;
  onProgress?: (progress: BatchProgress) => void;
}

export class BatchConverter {
  private collector: InputCollector;
  private orchestrator: BatchOrchestrator;

  constructor(config: BatchConverterConfig, deps: BatchConverterDeps) {
    const logger = deps.logger ?? new Logger(config.logging.level);
    const codecs = deps.codecs ?? createDefaultCodecs();
    const writerCodec =
      codecs.find((codec) => codec.format === "zip" && codec.createWriter) ??
      createZipCodec();

    this.collector = new InputCollector(
      new ArchiveExtractor(codecs, config.archive, logger),
      new RemoteFetcher(config.fetch, logger, deps.fetch),
    );
    this.orchestrator = new BatchOrchestrator(
      new ConversionDispatcher(deps.converter),
      new ResultPackager(writerCodec, {
        compressionLevel: config.output.compressionLevel,
      }),
      {
        concurrency: config.batch.concurrency,
        itemTimeout: config.batch.itemTimeout,
        batchTimeout: config.batch.timeout,
      },
      logger,
    );
  }

  /**
   * Run the whole batch
   * Throws only the fatal BatchError subclasses; per-item problems end up in
   * the manifest.
   */
  async run(input: BatchInput, options: BatchRunOptions): Promise<BatchResult> {
    // Reject a bad target before downloading or extracting anything
    const targetFormat = validateTargetFormat(options.targetFormat);

    options.onStage?.("collecting");
    const { items } = await this.collector.collect(input, options.signal);

    options.onStage?.("converting");
    return this.orchestrator.run(
      {
        targetFormat,
        allowedSourceFormats: options.allowedSourceFormats,
        items,
      },
      { signal: options.signal, onProgress: options.onProgress },
    );
  }
}
