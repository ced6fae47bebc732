/**
 * GZ codec
 * A gzip stream holds one file, unless it wraps a TAR (.tar.gz / .tgz).
 */

import { gunzip } from "node:zlib";
import { promisify } from "node:util";
import { hasSignature } from "./signature";
import { UnsupportedArchiveError, getErrorMessage } from "../utils/errors";
import { getBaseName } from "../utils/filename";
import type {
  ArchiveCodec,
  ArchiveEntry,
  ArchiveReader,
  OpenArchiveOptions,
} from "../types";

const gunzipAsync = promisify(gunzip);

const GZIP_MAGIC = [0x1f, 0x8b];
const FALLBACK_NAME = "extracted_file";

/**
 * "notes.txt.gz" -> "notes.txt"
 */
export function gzipMemberName(archiveName: string): string {
  const base = getBaseName(archiveName);
  const name = base.replace(/\.gz$/i, "");
  return name.length > 0 && name !== base ? name : FALLBACK_NAME;
}

class SingleFileReader implements ArchiveReader {
  private entry: ArchiveEntry;

  constructor(
    name: string,
    private data: Uint8Array,
    private maxEntrySize: number,
  ) {
    this.entry = { path: name, directory: false };
  }

  listEntries(): ArchiveEntry[] {
    return [this.entry];
  }

  async readEntry(entry: ArchiveEntry): Promise<Uint8Array> {
    if (entry !== this.entry) {
      throw new Error(`Entry not found: ${entry.path}`);
    }
    if (this.data.length > this.maxEntrySize) {
      throw new Error(
        `Entry exceeds maximum size of ${this.maxEntrySize} bytes`,
      );
    }
    return this.data;
  }
}

export function createGzipCodec(tar: ArchiveCodec): ArchiveCodec {
  return {
    format: "gz",
    extensions: [".tar.gz", ".tgz", ".gz"],

    sniff(bytes) {
      return hasSignature(bytes, GZIP_MAGIC);
    },

    async open(bytes: Uint8Array, options: OpenArchiveOptions) {
      let inflated: Uint8Array;
      try {
        inflated = await gunzipAsync(bytes, {
          maxOutputLength: options.maxTotalSize,
        });
      } catch (error) {
        throw new UnsupportedArchiveError(
          options.archiveName,
          `unreadable GZ stream (${getErrorMessage(error)})`,
          { cause: error },
        );
      }

      if (tar.sniff(inflated) || /\.(tar\.gz|tgz)$/i.test(options.archiveName)) {
        return tar.open(inflated, options);
      }

      return new SingleFileReader(
        gzipMemberName(options.archiveName),
        inflated,
        options.maxEntrySize,
      );
    },
  };
}
