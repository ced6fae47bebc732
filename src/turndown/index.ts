/**
 * Turndown Configuration
 * Sets up Turndown from the markdown section of the config
 */

import TurndownService from "turndown";
import { gfm } from "@truto/turndown-plugin-gfm";
import type { MarkdownConfig } from "../types";

export function createTurndownService(config: MarkdownConfig): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: config.headingStyle,
    codeBlockStyle: config.codeBlockStyle,
    emDelimiter: config.emphasis,
    strongDelimiter: config.strong,
    bulletListMarker: config.bulletMarker,
  });

  // Tables, strikethrough and task lists
  turndownService.use(gfm);

  // Drop elements that carry no readable content
  turndownService.remove(["script", "style", "noscript"]);

  return turndownService;
}
