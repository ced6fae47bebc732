/**
 * Fetcher Module
 * Downloads URL inputs into source items under size, time and redirect bounds
 */

import pLimit from "p-limit";
import { sleep } from "../utils/deadline";
import { getErrorMessage } from "../utils/errors";
import { getBaseName, getFileExtension } from "../utils/filename";
import type { Logger } from "../utils/logger";
import type { FetchConfig, SourceItem } from "../types";

// ============================================================================
// Failures
// ============================================================================

export type FetchFailureReason =
  | "invalid-url"
  | "timeout"
  | "cancelled"
  | "invalid-response"
  | "too-large"
  | "too-many-redirects"
  | "download-failed";

export class FetchFailure extends Error {
  constructor(
    readonly reason: FetchFailureReason,
    message: string,
    readonly transient = false,
  ) {
    super(message);
    this.name = "FetchFailure";
  }
}

export interface FetchError {
  url: string;
  index: number;
  reason: FetchFailureReason;
  message: string;
}

export interface FetchReport {
  // One item per URL, in URL order; failed URLs carry a FetchFailed defect
  items: SourceItem[];
  errors: FetchError[];
}

// ============================================================================
// Naming
// ============================================================================

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "application/pdf": "pdf",
  "application/json": "json",
  "application/msword": "doc",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  "application/rtf": "rtf",
  "application/epub+zip": "epub",
  "text/html": "html",
  "text/plain": "txt",
  "text/markdown": "md",
  "text/csv": "csv",
  "text/xml": "xml",
};

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function lastPathSegment(url: URL): string {
  const segments = url.pathname.split("/").filter((s) => s.length > 0);
  const last = segments[segments.length - 1];
  return last ? getBaseName(safeDecode(last)) : "";
}

/**
 * Filename from a Content-Disposition header, RFC 5987 form first
 */
export function parseDispositionFilename(header: string | null): string {
  if (!header) return "";
  const extended = /filename\*\s*=\s*(?:[\w-]+)?'[^']*'([^;]+)/i.exec(header);
  if (extended?.[1]) return getBaseName(safeDecode(extended[1].trim()));
  const plain = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/i.exec(header);
  const value = plain?.[1] ?? plain?.[2];
  return value ? getBaseName(value.trim()) : "";
}

/**
 * Disposition filename, then URL segment, then remote_<n>[.<ext>]
 * Names without an extension are too ambiguous to dispatch on.
 */
export function deriveRemoteName(
  finalUrl: URL,
  headers: Headers,
  index: number,
): string {
  const disposition = parseDispositionFilename(
    headers.get("content-disposition"),
  );
  if (getFileExtension(disposition)) return disposition;

  const segment = lastPathSegment(finalUrl);
  if (getFileExtension(segment)) return segment;

  const mime = (headers.get("content-type") ?? "")
    .split(";")[0]
    .trim()
    .toLowerCase();
  const ext = CONTENT_TYPE_EXTENSIONS[mime];
  return ext ? `remote_${index + 1}.${ext}` : `remote_${index + 1}`;
}

// ============================================================================
// Bounded body reading
// ============================================================================

function tooLarge(maxSize: number): FetchFailure {
  return new FetchFailure(
    "too-large",
    `Response body exceeds maximum size of ${maxSize} bytes`,
  );
}

async function readBounded(
  response: Response,
  maxSize: number,
): Promise<Uint8Array> {
  const declared = Number(response.headers.get("content-length"));
  if (Number.isFinite(declared) && declared > maxSize) {
    await response.body?.cancel();
    throw tooLarge(maxSize);
  }
  if (!response.body) return new Uint8Array(0);

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk: Uint8Array = value;
    total += chunk.byteLength;
    if (total > maxSize) {
      await reader.cancel();
      throw tooLarge(maxSize);
    }
    chunks.push(chunk);
  }

  const body = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return body;
}

// ============================================================================
// RemoteFetcher
// ============================================================================

interface Download {
  url: URL;
  headers: Headers;
  data: Uint8Array;
}

export class RemoteFetcher {
  constructor(
    private config: FetchConfig,
    private logger: Logger,
    private fetchImpl: typeof fetch = globalThis.fetch,
  ) {}

  /**
   * Fetch every URL; one bad URL never stops the others
   */
  async fetchAll(urls: string[], signal?: AbortSignal): Promise<FetchReport> {
    const limit = pLimit(this.config.concurrency);
    const errors: FetchError[] = [];

    const items = await Promise.all(
      urls.map((url, index) =>
        limit(async (): Promise<SourceItem> => {
          try {
            const download = await this.fetchWithRetry(url, signal);
            const name = deriveRemoteName(download.url, download.headers, index);
            this.logger.debug(`Fetched ${url} as ${name} (${download.data.length} bytes)`);
            return {
              name,
              sourceFormat: getFileExtension(name),
              origin: "remote-url",
              payload: download.data,
            };
          } catch (error) {
            const failure =
              error instanceof FetchFailure
                ? error
                : new FetchFailure("download-failed", getErrorMessage(error));
            this.logger.warn(`Failed to fetch ${url}: ${failure.message}`);
            errors.push({ url, index, reason: failure.reason, message: failure.message });
            return this.failedItem(url, index, failure.message);
          }
        }),
      ),
    );

    errors.sort((a, b) => a.index - b.index);
    return { items, errors };
  }

  private failedItem(url: string, index: number, message: string): SourceItem {
    const parsed = tryParseUrl(url);
    const name = (parsed && lastPathSegment(parsed)) || `remote_${index + 1}`;
    return {
      name,
      sourceFormat: getFileExtension(name),
      origin: "remote-url",
      payload: null,
      defect: { kind: "FetchFailed", message: `${url}: ${message}` },
    };
  }

  /**
   * Retry transient failures with exponential backoff (1s, 2s, 4s, ...)
   */
  private async fetchWithRetry(
    rawUrl: string,
    signal?: AbortSignal,
  ): Promise<Download> {
    const url = parseHttpUrl(rawUrl);
    let lastError: FetchFailure | null = null;

    for (let attempt = 0; attempt <= this.config.retries; attempt++) {
      try {
        return await this.attempt(url, signal);
      } catch (error) {
        lastError =
          error instanceof FetchFailure
            ? error
            : new FetchFailure("download-failed", getErrorMessage(error), true);
        if (!lastError.transient || attempt === this.config.retries) break;
        try {
          await sleep(Math.pow(2, attempt) * 1000, signal);
        } catch {
          throw new FetchFailure("cancelled", "Fetch cancelled");
        }
      }
    }

    throw lastError ?? new FetchFailure("download-failed", "Download failed");
  }

  private async attempt(url: URL, signal?: AbortSignal): Promise<Download> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      let current = url;
      for (let hops = 0; ; hops++) {
        const response = await this.fetchImpl(current.href, {
          redirect: "manual",
          signal: controller.signal,
        });

        if (REDIRECT_STATUSES.has(response.status)) {
          await response.body?.cancel();
          const location = response.headers.get("location");
          if (!location) {
            throw new FetchFailure(
              "invalid-response",
              `HTTP ${response.status} without Location header`,
            );
          }
          if (hops >= this.config.maxRedirects) {
            throw new FetchFailure(
              "too-many-redirects",
              `Too many redirects (max ${this.config.maxRedirects})`,
            );
          }
          current = parseHttpUrl(new URL(location, current).href);
          continue;
        }

        if (!response.ok) {
          throw new FetchFailure(
            "invalid-response",
            `HTTP ${response.status}: ${response.statusText}`,
            response.status >= 500,
          );
        }

        const data = await readBounded(response, this.config.maxSize);
        return { url: current, headers: response.headers, data };
      }
    } catch (error) {
      if (error instanceof FetchFailure) throw error;
      if (signal?.aborted) {
        throw new FetchFailure("cancelled", "Fetch cancelled");
      }
      if (controller.signal.aborted) {
        throw new FetchFailure(
          "timeout",
          `Request timed out after ${this.config.timeout}ms`,
          true,
        );
      }
      throw new FetchFailure("download-failed", getErrorMessage(error), true);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

function tryParseUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

function parseHttpUrl(raw: string): URL {
  const url = tryParseUrl(raw);
  if (!url) {
    throw new FetchFailure("invalid-url", `Invalid URL: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new FetchFailure("invalid-url", `Unsupported URL scheme: ${url.protocol}`);
  }
  return url;
}
