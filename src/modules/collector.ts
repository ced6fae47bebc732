/**
 * Collector Module
 * Merges uploads, archive entries and URL downloads into one ordered item list
 */

import { NoInputsError } from "../utils/errors";
import { getFileExtension } from "../utils/filename";
import type { ArchiveExtractor } from "./extractor";
import type { FetchError, RemoteFetcher } from "./fetcher";
import type { BatchInput, NamedBytes, SourceItem } from "../types";

export interface CollectResult {
  items: SourceItem[];
  fetchErrors: FetchError[];
}

function fromUpload(upload: NamedBytes): SourceItem {
  return {
    name: upload.name,
    sourceFormat: getFileExtension(upload.name),
    origin: "direct-upload",
    payload: upload.data,
  };
}

export class InputCollector {
  constructor(
    private extractor: ArchiveExtractor,
    private fetcher: RemoteFetcher,
  ) {}

  /**
   * Order is fixed: uploads, then archive entries, then URL items.
   * Nothing is deduplicated; name collisions are settled at packaging time.
   */
  async collect(input: BatchInput, signal?: AbortSignal): Promise<CollectResult> {
    const items: SourceItem[] = (input.uploads ?? []).map(fromUpload);
    let fetchErrors: FetchError[] = [];

    if (input.archive) {
      const entries = await this.extractor.extract(
        input.archive.name,
        input.archive.data,
        { password: input.password },
      );
      items.push(...entries);
    }

    if (input.urls && input.urls.length > 0) {
      const report = await this.fetcher.fetchAll(input.urls, signal);
      items.push(...report.items);
      fetchErrors = report.errors;
    }

    if (items.length === 0) {
      throw new NoInputsError();
    }

    return { items, fetchErrors };
  }
}
