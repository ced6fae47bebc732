/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  BatchConverterConfig,
  PartialBatchConverterConfig,
  ConfigError,
} from "../types";
import {
  BatchConverterConfigSchema,
  PartialBatchConverterConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("docbatch", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/docbatch or ~/.config/docbatch
 * - macOS: ~/Library/Preferences/docbatch
 * - Windows: %APPDATA%\docbatch
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<BatchConverterConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return BatchConverterConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial config file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialBatchConverterConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialBatchConverterConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: BatchConverterConfig,
  override: PartialBatchConverterConfig,
): BatchConverterConfig {
  return {
    batch: { ...base.batch, ...override.batch },
    fetch: { ...base.fetch, ...override.fetch },
    archive: { ...base.archive, ...override.archive },
    output: { ...base.output, ...override.output },
    markdown: { ...base.markdown, ...override.markdown },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: BatchConverterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A broken user or custom file is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
