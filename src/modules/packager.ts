/**
 * Packager Module
 * Writes successful outputs plus manifest.json into the result archive
 */

import { PackagingError, getErrorMessage } from "../utils/errors";
import type {
  ArchiveCodec,
  ArchiveWriterOptions,
  ConversionOutcome,
  Manifest,
  ManifestSummary,
} from "../types";

export const MANIFEST_NAME = "manifest.json";

export interface PackResult {
  archiveBytes: Uint8Array;
  manifest: Manifest;
}

// ============================================================================
// Naming
// ============================================================================

function splitName(name: string): { stem: string; ext: string } {
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return { stem: name, ext: "" };
  return { stem: name.slice(0, dot), ext: name.slice(dot) };
}

/**
 * Collision-free archive names for successful outcomes, in manifest order.
 * A taken name gets _1, _2, ... before its extension. Comparison ignores case
 * and the manifest name is always reserved.
 */
export function resolveOutputNames(
  outcomes: readonly ConversionOutcome[],
): Array<string | null> {
  const taken = new Set<string>([MANIFEST_NAME]);

  return outcomes.map((outcome) => {
    if (outcome.status !== "success") return null;

    const { stem, ext } = splitName(outcome.outputName);
    let candidate = outcome.outputName;
    for (let n = 1; taken.has(candidate.toLowerCase()); n++) {
      candidate = `${stem}_${n}${ext}`;
    }
    taken.add(candidate.toLowerCase());
    return candidate;
  });
}

/**
 * "batch_docx_to_pdf.zip" when every item shares one source format
 */
export function resultArchiveName(
  sourceFormats: readonly string[],
  targetFormat: string,
): string {
  const unique = new Set(sourceFormats);
  const [only] = [...unique];
  if (unique.size === 1 && only) {
    return `batch_${only}_to_${targetFormat}.zip`;
  }
  return "batch_results.zip";
}

// ============================================================================
// Manifest
// ============================================================================

export function buildManifest(
  outcomes: readonly ConversionOutcome[],
  targetFormat: string,
): Manifest {
  const names = resolveOutputNames(outcomes);
  const summary: ManifestSummary = {
    total: outcomes.length,
    succeeded: 0,
    skipped: 0,
    failed: 0,
  };

  const items = outcomes.map((outcome, index) => {
    switch (outcome.status) {
      case "success":
        summary.succeeded++;
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "failed":
        summary.failed++;
        break;
    }
    return {
      name: outcome.name,
      origin: outcome.origin,
      status: outcome.status,
      outputName: names[index] ?? null,
      error: outcome.status === "success" ? null : outcome.error,
    };
  });

  return { targetFormat, summary, items };
}

export function serializeManifest(manifest: Manifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}

// ============================================================================
// ResultPackager
// ============================================================================

export class ResultPackager {
  constructor(
    private codec: ArchiveCodec,
    private options: ArchiveWriterOptions,
  ) {}

  /**
   * Always produces an archive once outcomes exist, even a manifest-only one.
   * Only a writer failure is fatal.
   */
  async pack(
    outcomes: readonly ConversionOutcome[],
    targetFormat: string,
  ): Promise<PackResult> {
    if (!this.codec.createWriter) {
      throw new PackagingError(`${this.codec.format} codec cannot write archives`);
    }

    const manifest = buildManifest(outcomes, targetFormat);

    try {
      const writer = this.codec.createWriter(this.options);
      outcomes.forEach((outcome, index) => {
        const name = manifest.items[index]?.outputName;
        if (outcome.status === "success" && name) {
          writer.writeEntry(name, outcome.outputBytes);
        }
      });
      writer.writeEntry(
        MANIFEST_NAME,
        new TextEncoder().encode(serializeManifest(manifest)),
      );

      const archiveBytes = await writer.finalize();
      return { archiveBytes, manifest };
    } catch (error) {
      throw new PackagingError(getErrorMessage(error), { cause: error });
    }
  }
}
