/**
 * Dispatcher Module
 * Runs one item through the converter and turns whatever happens into an outcome
 */

import { DeadlineError, linkSignals, withDeadline } from "../utils/deadline";
import { getErrorMessage } from "../utils/errors";
import { normalizeFormat, toOutputName } from "../utils/filename";
import type {
  ConversionOutcome,
  Converter,
  OutcomeError,
  SourceItem,
} from "../types";

export interface DispatchOptions {
  timeout?: number; // Per item, in milliseconds
  signal?: AbortSignal; // Batch cancellation
  converterOptions?: Record<string, unknown>;
}

export class ConversionDispatcher {
  constructor(private converter: Converter) {}

  /**
   * Never throws: defects, allow-list exclusions, converter statuses and
   * converter faults all come back as outcomes.
   */
  async dispatch(
    item: SourceItem,
    targetFormat: string,
    allowedSourceFormats: readonly string[] = [],
    options: DispatchOptions = {},
  ): Promise<ConversionOutcome> {
    const base = {
      name: item.name,
      origin: item.origin,
      outputName: toOutputName(item.name, targetFormat),
    };
    const failed = (error: OutcomeError): ConversionOutcome => ({
      ...base,
      status: "failed",
      error,
    });

    if (item.defect) {
      return failed(item.defect);
    }

    const allowed = allowedSourceFormats.map(normalizeFormat);
    if (allowed.length > 0 && !allowed.includes(item.sourceFormat)) {
      return {
        ...base,
        status: "skipped",
        error: {
          kind: "UnsupportedSource",
          message: `Source format "${item.sourceFormat}" is not in the allowed list (${allowed.join(", ")})`,
        },
      };
    }

    if (options.signal?.aborted) {
      return failed({ kind: "Cancelled", message: "Batch cancelled before conversion started" });
    }

    if (!item.payload) {
      return failed({ kind: "InternalError", message: "Item payload was already released" });
    }

    const payload = item.payload;
    const linked = linkSignals([options.signal], options.timeout);
    const task = Promise.resolve().then(() =>
      this.converter.convert(payload, item.sourceFormat, targetFormat, {
        ...options.converterOptions,
        signal: linked.signal,
      }),
    );
    try {
      const result = await withDeadline(task, { signal: linked.signal });

      if (result.status === "OK") {
        return { ...base, status: "success", outputBytes: result.data };
      }
      return failed({ kind: result.status, message: result.message });
    } catch (error) {
      if (error instanceof DeadlineError) {
        // The call counts against the pool until it settles, even past its deadline
        await Promise.allSettled([task]);
        if (options.signal?.aborted) {
          return failed({ kind: "Cancelled", message: "Batch cancelled before conversion finished" });
        }
        return failed({
          kind: "Timeout",
          message: `Conversion timed out after ${options.timeout}ms`,
        });
      }
      return failed({ kind: "InternalError", message: getErrorMessage(error) });
    } finally {
      linked.dispose();
    }
  }
}
