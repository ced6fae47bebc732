/**
 * Formats command - List conversion pairs and readable archive formats
 */

import chalk from "chalk";
import { createDefaultCodecs } from "../../codecs";
import { createDefaultConverter } from "../../converters";
import { loadConfig } from "../../utils";

export async function formatsCommand(): Promise<void> {
  const { config } = await loadConfig();
  const conversions = createDefaultConverter(config.markdown).supportedConversions();

  console.log(chalk.bold("\nConversions"));
  for (const [source, targets] of Object.entries(conversions)) {
    console.log(`  ${chalk.cyan(source.padEnd(6))} → ${targets.join(", ")}`);
  }

  console.log(chalk.bold("\nArchives"));
  for (const codec of createDefaultCodecs()) {
    console.log(`  ${chalk.cyan(codec.format.padEnd(6))} ${chalk.dim(codec.extensions.join(" "))}`);
  }
  console.log("");
}
