/**
 * Built-in converters
 */

import { ConverterRegistry } from "./registry";
import { createHtmlToMarkdown, htmlToText } from "./html";
import { txtToHtml, txtToMarkdown } from "./text";
import type { MarkdownConfig } from "../types";

export { ConverterRegistry } from "./registry";
export type { ConversionHandler } from "./registry";

export function createDefaultConverter(markdown: MarkdownConfig): ConverterRegistry {
  const htmlToMarkdown = createHtmlToMarkdown(markdown);

  return new ConverterRegistry()
    .register("html", "md", htmlToMarkdown)
    .register("htm", "md", htmlToMarkdown)
    .register("html", "txt", htmlToText)
    .register("htm", "txt", htmlToText)
    .register("txt", "html", txtToHtml)
    .register("txt", "md", txtToMarkdown);
}
