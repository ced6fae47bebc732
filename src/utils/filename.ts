/**
 * Filename helpers shared by intake and packaging
 */

const FALLBACK_STEM = "file";

/**
 * Last path segment, accepting both separators
 */
export function getBaseName(name: string): string {
  const segments = name.split(/[\\/]/);
  return segments[segments.length - 1] ?? "";
}

/**
 * Lowercase extension without the dot ("Report.DOCX" -> "docx")
 * Dotfiles and names without a dot have no extension.
 */
export function getFileExtension(name: string): string {
  const base = getBaseName(name);
  const dot = base.lastIndexOf(".");
  if (dot <= 0 || dot === base.length - 1) return "";
  return base.slice(dot + 1).toLowerCase();
}

/**
 * Base name without its extension, "file" when nothing is left
 */
export function getFileStem(name: string): string {
  const base = getBaseName(name);
  const ext = getFileExtension(base);
  const stem = ext ? base.slice(0, base.length - ext.length - 1) : base;
  return stem.length > 0 ? stem : FALLBACK_STEM;
}

/**
 * "<stem>.<target>" for a converted item
 */
export function toOutputName(itemName: string, targetFormat: string): string {
  return `${getFileStem(itemName)}.${targetFormat}`;
}

/**
 * Normalize a user-supplied format (" .PDF" -> "pdf")
 */
export function normalizeFormat(format: string): string {
  return format.trim().replace(/^\.+/, "").toLowerCase();
}

export interface SanitizedEntryName {
  name: string;
  flattened: boolean;
}

/**
 * Make an archive-internal path safe to use as an item name.
 * Absolute prefixes and "." segments are dropped; any path that climbs with
 * ".." is flattened to its last real segment.
 */
export function sanitizeEntryName(rawPath: string): SanitizedEntryName {
  const segments = rawPath
    .replace(/\\/g, "/")
    .replace(/^[a-zA-Z]:/, "")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");

  if (segments.includes("..")) {
    const real = segments.filter((segment) => segment !== "..");
    return { name: real[real.length - 1] ?? "", flattened: true };
  }

  return { name: segments.join("/"), flattened: false };
}
