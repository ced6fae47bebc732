/**
 * Orchestrator Module
 * Converts every item with a bounded worker pool, then packages the outcomes
 */

import pLimit from "p-limit";
import { resultArchiveName, type ResultPackager } from "./packager";
import { linkSignals } from "../utils/deadline";
import { InvalidTargetFormatError } from "../utils/errors";
import { normalizeFormat } from "../utils/filename";
import type { ConversionDispatcher } from "./dispatcher";
import type { Logger } from "../utils/logger";
import type {
  BatchProgress,
  BatchRequest,
  BatchResult,
  ConversionOutcome,
} from "../types";

const TARGET_FORMAT_PATTERN = /^[a-z0-9]+$/;

/**
 * Normalized target format, or InvalidTargetFormatError
 */
export function validateTargetFormat(targetFormat: string): string {
  const normalized = normalizeFormat(targetFormat);
  if (!TARGET_FORMAT_PATTERN.test(normalized)) {
    throw new InvalidTargetFormatError(targetFormat);
  }
  return normalized;
}

export interface OrchestratorOptions {
  concurrency: number;
  itemTimeout: number; // In milliseconds
  batchTimeout: number; // In milliseconds, 0 disables
  converterOptions?: Record<string, unknown>;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

export class BatchOrchestrator {
  constructor(
    private dispatcher: ConversionDispatcher,
    private packager: ResultPackager,
    private options: OrchestratorOptions,
    private logger: Logger,
  ) {}

  /**
   * Outcomes land in a slot per input index, so manifest order is input order
   * whatever order workers finish in. Item payloads are released as soon as
   * their outcome is recorded.
   *
   * On cancellation (caller signal or batch timeout) remaining items are
   * recorded as Cancelled and the completed work is still packaged.
   */
  async run(request: BatchRequest, runOptions: RunOptions = {}): Promise<BatchResult> {
    const targetFormat = validateTargetFormat(request.targetFormat);
    const allowed = request.allowedSourceFormats ?? [];
    const total = request.items.length;
    const sourceFormats = request.items.map((item) => item.sourceFormat);
    const slots = new Array<ConversionOutcome | undefined>(total);

    const limit = pLimit(this.options.concurrency);
    const linked = linkSignals([runOptions.signal], this.options.batchTimeout);
    let completed = 0;

    this.logger.debug(
      `Converting ${total} item(s) to ${targetFormat} with ${this.options.concurrency} worker(s)`,
    );

    try {
      await Promise.all(
        request.items.map((item, index) =>
          limit(async () => {
            const outcome = await this.dispatcher.dispatch(
              item,
              targetFormat,
              allowed,
              {
                timeout: this.options.itemTimeout,
                signal: linked.signal,
                converterOptions: this.options.converterOptions,
              },
            );
            slots[index] = outcome;
            item.payload = null;
            completed++;
            this.logger.debug(`[${completed}/${total}] ${item.name}: ${outcome.status}`);
            runOptions.onProgress?.({ completed, total, outcome });
          }),
        ),
      );
    } finally {
      linked.dispose();
    }

    const outcomes = request.items.map(
      (item, index): ConversionOutcome =>
        slots[index] ?? {
          name: item.name,
          origin: item.origin,
          outputName: "",
          status: "failed",
          error: { kind: "InternalError", message: "No outcome recorded" },
        },
    );

    if (linked.signal.aborted) {
      const cancelled = outcomes.filter(
        (outcome) => outcome.status === "failed" && outcome.error.kind === "Cancelled",
      ).length;
      this.logger.warn(`Batch cancelled: ${cancelled} of ${total} item(s) not converted`);
    }

    const { archiveBytes, manifest } = await this.packager.pack(outcomes, targetFormat);
    return {
      manifest,
      archiveBytes,
      archiveName: resultArchiveName(sourceFormats, targetFormat),
    };
  }
}
