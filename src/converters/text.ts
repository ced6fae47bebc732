/**
 * Plain-text handlers
 */

import type { ConverterResult } from "../types";

const encoder = new TextEncoder();

/**
 * Strict UTF-8 decode; null when the bytes are not text
 */
export function decodeText(input: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(input);
  } catch {
    return null;
  }
}

export function malformed(format: string): ConverterResult {
  return {
    status: "MalformedSource",
    message: `Input is not valid UTF-8 ${format}`,
  };
}

export function encodeText(text: string): ConverterResult {
  return { status: "OK", data: encoder.encode(text) };
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Blank lines separate paragraphs; single newlines become <br>
 */
export function txtToHtml(input: Uint8Array): ConverterResult {
  const text = decodeText(input);
  if (text === null) return malformed("text");

  const paragraphs = normalizeNewlines(text)
    .split(/\n[ \t]*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0)
    .map((paragraph) => `<p>${escapeHtml(paragraph).replace(/\n/g, "<br>\n")}</p>`);

  return encodeText(
    [
      "<!DOCTYPE html>",
      "<html>",
      '<head><meta charset="utf-8"></head>',
      "<body>",
      ...paragraphs,
      "</body>",
      "</html>",
      "",
    ].join("\n"),
  );
}

export function txtToMarkdown(input: Uint8Array): ConverterResult {
  const text = decodeText(input);
  if (text === null) return malformed("text");

  const body = normalizeNewlines(text).trimEnd();
  return encodeText(`${body}\n`);
}
