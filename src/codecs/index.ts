/**
 * Archive codec registry
 */

import { createZipCodec } from "./zip";
import { createTarCodec } from "./tar";
import { createGzipCodec } from "./gzip";
import { UNDECODED_CONTAINERS, hasSignature } from "./signature";
import { getBaseName } from "../utils/filename";
import type { ArchiveCodec } from "../types";

export { createZipCodec } from "./zip";
export { createTarCodec } from "./tar";
export { createGzipCodec, gzipMemberName } from "./gzip";

export function createDefaultCodecs(): ArchiveCodec[] {
  const tar = createTarCodec();
  return [createZipCodec(), createGzipCodec(tar), tar];
}

/**
 * Pick a codec by magic bytes, then by the longest matching extension
 */
export function resolveCodec(
  codecs: readonly ArchiveCodec[],
  archiveName: string,
  bytes: Uint8Array,
): ArchiveCodec | undefined {
  const bySignature = codecs.find((codec) => codec.sniff(bytes));
  if (bySignature) return bySignature;

  const name = getBaseName(archiveName).toLowerCase();
  let best: { codec: ArchiveCodec; length: number } | undefined;
  for (const codec of codecs) {
    for (const ext of codec.extensions) {
      if (name.endsWith(ext) && (!best || ext.length > best.length)) {
        best = { codec, length: ext.length };
      }
    }
  }
  return best?.codec;
}

/**
 * Reason used when no codec matches
 */
export function describeUnsupported(
  codecs: readonly ArchiveCodec[],
  archiveName: string,
  bytes: Uint8Array,
): string {
  const name = archiveName.toLowerCase();
  const known = UNDECODED_CONTAINERS.find(
    (container) =>
      hasSignature(bytes, container.signature) ||
      container.extensions.some((ext) => name.endsWith(ext)),
  );
  const supported = codecs.map((codec) => codec.format).join(", ");

  if (known) {
    return `no decoder registered for ${known.format} archives (supported: ${supported})`;
  }
  return `unrecognized archive format (supported: ${supported})`;
}
