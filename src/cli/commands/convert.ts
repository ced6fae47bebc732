/**
 * Convert command - Loads config, gathers inputs and runs the batch
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { basename, join, resolve } from "path";
import fg from "fast-glob";
import ora from "ora";
import { ZodError, z } from "zod";
import { BatchConverter } from "../../batch";
import { createDefaultConverter } from "../../converters";
import * as modules from "../../modules";
import { Logger, getErrorMessage, isBatchError, loadConfig } from "../../utils";
import type { BatchContext, BatchInput, NamedBytes } from "../../types";

const ConvertOptionsSchema = z.object({
  to: z.string().min(1),
  archive: z.string().optional(),
  url: z.array(z.string()).optional(),
  allow: z.array(z.string()).optional(),
  password: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

function describeConfigError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
  }
  return getErrorMessage(error);
}

/**
 * Expand file arguments; literal paths are kept as given, globs sorted
 */
async function expandPatterns(patterns: string[]): Promise<string[]> {
  const paths: string[] = [];
  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      paths.push(pattern);
      continue;
    }
    const matches = await fg(pattern.replace(/\\/g, "/"), {
      onlyFiles: true,
      absolute: true,
    });
    paths.push(...matches.sort());
  }
  return paths;
}

async function readNamed(path: string): Promise<NamedBytes> {
  const data = await readFile(path);
  return { name: basename(path), data: new Uint8Array(data) };
}

async function readInputs(patterns: string[], options: Options): Promise<BatchInput> {
  const files = await expandPatterns(patterns);
  const uploads = await Promise.all(files.map(readNamed));

  return {
    uploads,
    archive: options.archive ? await readNamed(options.archive) : undefined,
    urls: options.url,
    password: options.password,
  };
}

export async function convertCommand(patterns: string[], opts: unknown): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.output) {
      config.output.directory = options.output;
    }
    if (options.concurrency) {
      config.batch.concurrency = options.concurrency;
    }

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);
    for (const err of errors) {
      logger.warn(`Ignoring config ${err.path}: ${describeConfigError(err.error)}`);
    }

    const ctx: BatchContext = {
      config,
      logger,
      targetFormat: options.to,
      allowedSourceFormats: options.allow,
      verbose: options.verbose,
      startTime: new Date(),
    };

    spinner.text = "Reading inputs...";
    ctx.input = await readInputs(patterns, options);

    const batch = new BatchConverter(config, {
      converter: createDefaultConverter(config.markdown),
      logger,
    });

    ctx.result = await batch.run(ctx.input, {
      targetFormat: ctx.targetFormat,
      allowedSourceFormats: ctx.allowedSourceFormats,
      signal: controller.signal,
      onStage: (stage) => {
        spinner.text =
          stage === "collecting" ? "Collecting items..." : "Converting items...";
      },
      onProgress: ({ completed, total }) => {
        if (config.logging.showProgress) {
          spinner.text = `Converting items... ${completed}/${total}`;
        }
      },
    });

    spinner.text = "Writing archive...";
    const outputDir = resolve(config.output.directory);
    await mkdir(outputDir, { recursive: true });
    ctx.archivePath = join(outputDir, ctx.result.archiveName);
    await writeFile(ctx.archivePath, ctx.result.archiveBytes);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats(ctx);
  } catch (error) {
    spinner.fail("Batch conversion failed");
    console.error(isBatchError(error) ? error.message : error);
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
