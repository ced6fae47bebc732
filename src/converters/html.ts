/**
 * HTML handlers
 */

import { load } from "cheerio";
import { createTurndownService } from "../turndown";
import { decodeText, encodeText, malformed } from "./text";
import type { ConversionHandler } from "./registry";
import type { MarkdownConfig } from "../types";

const BLOCK_SELECTOR =
  "p, div, li, tr, h1, h2, h3, h4, h5, h6, blockquote, pre, section, article, header, footer";

export function createHtmlToMarkdown(config: MarkdownConfig): ConversionHandler {
  const turndownService = createTurndownService(config);

  return (input) => {
    const html = decodeText(input);
    if (html === null) return malformed("HTML");
    return encodeText(`${turndownService.turndown(html).trim()}\n`);
  };
}

/**
 * Visible text, one line per block element
 */
export const htmlToText: ConversionHandler = (input) => {
  const html = decodeText(input);
  if (html === null) return malformed("HTML");

  const $ = load(html);
  $("script, style, noscript").remove();
  $("br").replaceWith("\n");
  $(BLOCK_SELECTOR).after("\n");

  const lines = $("body")
    .text()
    .split("\n")
    .map((line) => line.replace(/[ \t]+/g, " ").trim())
    .filter((line) => line.length > 0);

  return encodeText(lines.length > 0 ? `${lines.join("\n")}\n` : "");
};
