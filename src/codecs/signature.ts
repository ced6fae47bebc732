/**
 * Magic-byte matching for container detection
 */

export function hasSignature(
  bytes: Uint8Array,
  signature: readonly number[],
  offset = 0,
): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

/**
 * Containers we recognize but ship no decoder for
 */
export const UNDECODED_CONTAINERS: ReadonlyArray<{
  format: string;
  signature: readonly number[];
  extensions: readonly string[];
}> = [
  {
    format: "rar",
    signature: [0x52, 0x61, 0x72, 0x21, 0x1a, 0x07],
    extensions: [".rar"],
  },
  {
    format: "7z",
    signature: [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c],
    extensions: [".7z"],
  },
  { format: "bz2", signature: [0x42, 0x5a, 0x68], extensions: [".bz2"] },
];
