/**
 * Extractor Module
 * Unpacks an uploaded container into source items
 */

import { describeUnsupported, resolveCodec } from "../codecs";
import {
  UnsupportedArchiveError,
  getErrorMessage,
  isBatchError,
} from "../utils/errors";
import { getFileExtension, sanitizeEntryName } from "../utils/filename";
import type { Logger } from "../utils/logger";
import type {
  ArchiveCodec,
  ArchiveConfig,
  ArchiveReader,
  SourceItem,
} from "../types";

export interface ExtractOptions {
  password?: string;
}

export class ArchiveExtractor {
  constructor(
    private codecs: readonly ArchiveCodec[],
    private limits: ArchiveConfig,
    private logger: Logger,
  ) {}

  /**
   * Extract every regular file of the archive, in archive order.
   *
   * Unreadable members become items carrying a CorruptArchiveEntry defect so
   * that they are reported in the manifest; only container-level problems
   * throw.
   */
  async extract(
    archiveName: string,
    archiveBytes: Uint8Array,
    options: ExtractOptions = {},
  ): Promise<SourceItem[]> {
    const codec = resolveCodec(this.codecs, archiveName, archiveBytes);
    if (!codec) {
      throw new UnsupportedArchiveError(
        archiveName,
        describeUnsupported(this.codecs, archiveName, archiveBytes),
      );
    }

    let reader: ArchiveReader;
    try {
      reader = await codec.open(archiveBytes, {
        archiveName,
        password: options.password,
        maxEntrySize: this.limits.maxEntrySize,
        maxTotalSize: this.limits.maxTotalSize,
      });
    } catch (error) {
      if (isBatchError(error)) throw error;
      throw new UnsupportedArchiveError(
        archiveName,
        `unreadable ${codec.format} container (${getErrorMessage(error)})`,
        { cause: error },
      );
    }

    const files = reader.listEntries().filter((entry) => !entry.directory);
    if (files.length > this.limits.maxEntries) {
      throw new UnsupportedArchiveError(
        archiveName,
        `${files.length} entries exceed the limit of ${this.limits.maxEntries}`,
      );
    }

    this.logger.debug(
      `Extracting ${files.length} entries from ${archiveName} (${codec.format})`,
    );

    const items: SourceItem[] = [];
    for (const entry of files) {
      const { name, flattened } = sanitizeEntryName(entry.path);
      if (!name) {
        this.logger.warn(`Skipping unnamed entry in ${archiveName}: "${entry.path}"`);
        continue;
      }
      if (flattened) {
        this.logger.warn(
          `Flattened entry path "${entry.path}" to "${name}" in ${archiveName}`,
        );
      }

      const sourceFormat = getFileExtension(name);
      try {
        const payload = await reader.readEntry(entry);
        items.push({ name, sourceFormat, origin: "archive-entry", payload });
      } catch (error) {
        const message = getErrorMessage(error);
        this.logger.warn(`Dropping corrupt entry ${name} in ${archiveName}: ${message}`);
        items.push({
          name,
          sourceFormat,
          origin: "archive-entry",
          payload: null,
          defect: { kind: "CorruptArchiveEntry", message },
        });
      }
    }

    return items;
  }
}
