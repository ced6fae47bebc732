/**
 * Archive codec contracts
 * One codec per container format; the extractor and packager only see these
 */

export interface ArchiveEntry {
  path: string;
  directory: boolean;
}

export interface OpenArchiveOptions {
  archiveName: string;
  password?: string;
  maxEntrySize: number;
  maxTotalSize: number;
}

export interface ArchiveReader {
  listEntries(): ArchiveEntry[];
  readEntry(entry: ArchiveEntry): Promise<Uint8Array>;
}

export interface ArchiveWriterOptions {
  compressionLevel: number;
}

export interface ArchiveWriter {
  writeEntry(path: string, data: Uint8Array): void;
  finalize(): Promise<Uint8Array>;
}

export interface ArchiveCodec {
  readonly format: string;
  // Lowercase, with leading dot (".zip", ".tar.gz")
  readonly extensions: readonly string[];
  sniff(bytes: Uint8Array): boolean;
  open(bytes: Uint8Array, options: OpenArchiveOptions): Promise<ArchiveReader>;
  createWriter?(options: ArchiveWriterOptions): ArchiveWriter;
}
