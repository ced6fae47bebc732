/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const BatchConfigSchema = z.object({
  concurrency: z.number().int().positive(),
  itemTimeout: z.number().int().positive(), // In milliseconds
  timeout: z.number().int().nonnegative(), // Whole batch, 0 disables
});

export const FetchConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  maxSize: z.number().int().positive(), // In bytes (default: 10MB)
  maxRedirects: z.number().int().nonnegative(),
  retries: z.number().int().nonnegative(),
  concurrency: z.number().int().positive(),
});

export const ArchiveConfigSchema = z.object({
  maxEntries: z.number().int().positive(),
  maxEntrySize: z.number().int().positive(), // In bytes, per entry
  maxTotalSize: z.number().int().positive(), // In bytes, decompressed container
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  compressionLevel: z.number().int().min(0).max(9),
});

export const MarkdownConfigSchema = z.object({
  headingStyle: z.enum(["atx", "setext"]),
  codeBlockStyle: z.enum(["fenced", "indented"]),
  emphasis: z.enum(["_", "*"]),
  strong: z.enum(["__", "**"]),
  bulletMarker: z.enum(["-", "+", "*"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const BatchConverterConfigSchema = z.object({
  batch: BatchConfigSchema,
  fetch: FetchConfigSchema,
  archive: ArchiveConfigSchema,
  output: OutputConfigSchema,
  markdown: MarkdownConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialBatchConverterConfigSchema = z.object({
  batch: BatchConfigSchema.partial().optional(),
  fetch: FetchConfigSchema.partial().optional(),
  archive: ArchiveConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type BatchConverterConfig = z.infer<typeof BatchConverterConfigSchema>;
export type PartialBatchConverterConfig = z.infer<
  typeof PartialBatchConverterConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
