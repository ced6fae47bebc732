/**
 * TAR codec backed by tar-stream
 * The whole container is walked once on open; entries are served from memory.
 */

import { extract } from "tar-stream";
import { hasSignature } from "./signature";
import { UnsupportedArchiveError, getErrorMessage } from "../utils/errors";
import type {
  ArchiveCodec,
  ArchiveEntry,
  ArchiveReader,
  OpenArchiveOptions,
} from "../types";

// "ustar" magic inside the first header block
const USTAR_MAGIC = [0x75, 0x73, 0x74, 0x61, 0x72];
const USTAR_OFFSET = 257;

type TarMember =
  | { path: string; directory: true }
  | { path: string; directory: false; data: Uint8Array }
  | { path: string; directory: false; problem: string };

function walkTar(bytes: Uint8Array, options: OpenArchiveOptions): Promise<TarMember[]> {
  return new Promise((resolve, reject) => {
    const members: TarMember[] = [];
    let total = 0;
    const extractor = extract();

    extractor.on("entry", (header, stream, next) => {
      const path = header.name;
      const skip = (member?: TarMember) => {
        if (member) members.push(member);
        stream.on("end", () => next());
        stream.resume();
      };

      if (header.type === "directory") {
        skip({ path, directory: true });
        return;
      }
      // Links, devices and fifos carry no content of their own
      if (header.type !== "file" && header.type !== "contiguous-file") {
        skip();
        return;
      }
      if ((header.size ?? 0) > options.maxEntrySize) {
        skip({
          path,
          directory: false,
          problem: `Entry exceeds maximum size of ${options.maxEntrySize} bytes`,
        });
        return;
      }

      total += header.size ?? 0;
      if (total > options.maxTotalSize) {
        extractor.destroy(
          new Error(`Archive exceeds maximum size of ${options.maxTotalSize} bytes`),
        );
        return;
      }

      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => chunks.push(chunk));
      stream.on("end", () => {
        members.push({ path, directory: false, data: Buffer.concat(chunks) });
        next();
      });
    });

    extractor.on("finish", () => resolve(members));
    extractor.on("error", reject);
    extractor.end(Buffer.from(bytes));
  });
}

class TarReader implements ArchiveReader {
  // Keyed by entry object: tar allows the same path twice
  private members = new Map<ArchiveEntry, TarMember>();

  constructor(members: TarMember[]) {
    for (const member of members) {
      this.members.set(
        { path: member.path, directory: member.directory },
        member,
      );
    }
  }

  listEntries(): ArchiveEntry[] {
    return [...this.members.keys()];
  }

  async readEntry(entry: ArchiveEntry): Promise<Uint8Array> {
    const member = this.members.get(entry);
    if (!member || member.directory) {
      throw new Error(`Entry not found: ${entry.path}`);
    }
    if ("problem" in member) {
      throw new Error(member.problem);
    }
    return member.data;
  }
}

export function createTarCodec(): ArchiveCodec {
  return {
    format: "tar",
    extensions: [".tar"],

    sniff(bytes) {
      return hasSignature(bytes, USTAR_MAGIC, USTAR_OFFSET);
    },

    async open(bytes: Uint8Array, options: OpenArchiveOptions) {
      try {
        return new TarReader(await walkTar(bytes, options));
      } catch (error) {
        throw new UnsupportedArchiveError(
          options.archiveName,
          `unreadable TAR container (${getErrorMessage(error)})`,
          { cause: error },
        );
      }
    },
  };
}
