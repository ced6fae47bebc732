/**
 * ZIP codec
 * Uploaded archives are read with zip.js (ZipCrypto and AES decryption);
 * the batch result archive is written with JSZip.
 */

import { Uint8ArrayReader, ZipReader, type Entry } from "@zip.js/zip.js";
import JSZip from "jszip";
import { hasSignature } from "./signature";
import {
  ArchivePasswordRequiredError,
  UnsupportedArchiveError,
  getErrorMessage,
} from "../utils/errors";
import type {
  ArchiveCodec,
  ArchiveEntry,
  ArchiveReader,
  ArchiveWriter,
  ArchiveWriterOptions,
  OpenArchiveOptions,
} from "../types";

const LOCAL_FILE_HEADER = [0x50, 0x4b, 0x03, 0x04];
const EMPTY_ARCHIVE = [0x50, 0x4b, 0x05, 0x06];

const entryTooLarge = (limit: number) => `Entry exceeds maximum size of ${limit} bytes`;
const archiveTooLarge = (limit: number) => `Archive exceeds maximum size of ${limit} bytes`;

/**
 * Collects inflated chunks and errors the stream once `limit` is passed,
 * so nothing beyond the limit is kept in memory.
 */
function boundedSink(limit: number, overflow: string) {
  const chunks: Uint8Array[] = [];
  let length = 0;

  const writable = new WritableStream<Uint8Array>({
    write(chunk) {
      length += chunk.length;
      if (length > limit) {
        throw new Error(overflow);
      }
      chunks.push(chunk);
    },
  });

  return {
    writable,
    bytes: (): Uint8Array => Buffer.concat(chunks),
  };
}

class ZipArchiveReader implements ArchiveReader {
  private entries = new Map<ArchiveEntry, Entry>();
  // Decompressed bytes handed out so far
  private total = 0;

  constructor(
    entries: Entry[],
    private options: OpenArchiveOptions,
  ) {
    for (const entry of entries) {
      this.entries.set({ path: entry.filename, directory: entry.directory }, entry);
    }
  }

  listEntries(): ArchiveEntry[] {
    return [...this.entries.keys()];
  }

  async readEntry(entry: ArchiveEntry): Promise<Uint8Array> {
    const source = this.entries.get(entry);
    if (!source || source.directory) {
      throw new Error(`Entry not found: ${entry.path}`);
    }

    const { maxEntrySize, maxTotalSize, password } = this.options;
    if (source.uncompressedSize > maxEntrySize) {
      throw new Error(entryTooLarge(maxEntrySize));
    }

    // Declared sizes can lie; the sink enforces whichever bound is closer
    const remaining = maxTotalSize - this.total;
    const sink =
      remaining < maxEntrySize
        ? boundedSink(remaining, archiveTooLarge(maxTotalSize))
        : boundedSink(maxEntrySize, entryTooLarge(maxEntrySize));

    await source.getData?.(sink.writable, { password, checkSignature: true });

    const data = sink.bytes();
    this.total += data.length;
    return data;
  }
}

class ZipWriter implements ArchiveWriter {
  private zip = new JSZip();

  constructor(private compressionLevel: number) {}

  writeEntry(path: string, data: Uint8Array): void {
    this.zip.file(path, data, { binary: true });
  }

  finalize(): Promise<Uint8Array> {
    return this.zip.generateAsync({
      type: "uint8array",
      compression: this.compressionLevel > 0 ? "DEFLATE" : "STORE",
      compressionOptions: { level: this.compressionLevel },
    });
  }
}

export function createZipCodec(): ArchiveCodec {
  return {
    format: "zip",
    extensions: [".zip"],

    sniff(bytes) {
      return (
        hasSignature(bytes, LOCAL_FILE_HEADER) ||
        hasSignature(bytes, EMPTY_ARCHIVE)
      );
    },

    async open(bytes: Uint8Array, options: OpenArchiveOptions) {
      let entries: Entry[];
      try {
        const reader = new ZipReader(new Uint8ArrayReader(bytes), {
          password: options.password,
          useWebWorkers: false,
        });
        entries = await reader.getEntries();
      } catch (error) {
        throw new UnsupportedArchiveError(
          options.archiveName,
          `unreadable ZIP container (${getErrorMessage(error)})`,
          { cause: error },
        );
      }

      if (!options.password && entries.some((entry) => entry.encrypted)) {
        throw new ArchivePasswordRequiredError(options.archiveName);
      }

      const declared = entries.reduce((sum, entry) => sum + entry.uncompressedSize, 0);
      if (declared > options.maxTotalSize) {
        throw new UnsupportedArchiveError(
          options.archiveName,
          `${declared} decompressed bytes exceed the limit of ${options.maxTotalSize}`,
        );
      }

      return new ZipArchiveReader(entries, options);
    },

    createWriter(options: ArchiveWriterOptions) {
      return new ZipWriter(options.compressionLevel);
    },
  };
}
