/**
 * Config command - Show configuration file location and effective settings
 */

import { getUserConfigPath, loadConfig } from "../../utils";

interface ConfigCommandOptions {
  show?: boolean;
}

export async function configCommand(options: ConfigCommandOptions): Promise<void> {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize batch settings.");
  console.log("See src/config/default.json for available options.");

  if (options.show) {
    const { config, errors } = await loadConfig();
    for (const err of errors) {
      console.error(`\nIgnored ${err.path}`);
    }
    console.log("\nEffective configuration:");
    console.log(JSON.stringify(config, null, 2));
  }
}
