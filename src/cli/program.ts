/**
 * Command-line program definition
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { formatsCommand } from "./commands/formats";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("docbatch")
    .description("Convert a batch of documents and package the results as a ZIP")
    .version("0.1.0");

  // Main conversion command (default action)
  // --to is checked here: commander also enforces required options of the
  // parent when a subcommand runs
  program
    .argument("[files...]", "Files or glob patterns to convert")
    .option("-t, --to <format>", "Target format (e.g. md, txt, html)")
    .option("-a, --archive <path>", "Archive whose entries are converted")
    .option("-u, --url <urls...>", "Remote documents to download and convert")
    .option("--allow <formats...>", "Only convert these source formats")
    .option("-p, --password <password>", "Password for an encrypted archive")
    .option("-o, --output <dir>", "Directory for the result archive")
    .option("-c, --config <path>", "Path to custom config file")
    .option("--concurrency <n>", "Conversions running at once")
    .option("-v, --verbose", "Verbose output")
    .action(async (files: string[], _options: unknown, command: Command) => {
      const options = command.opts<{ to?: string }>();
      if (!options.to) {
        command.error("error: required option '-t, --to <format>' not specified");
      }
      await convertCommand(files, options);
    });

  // Formats command - supported conversions
  program
    .command("formats")
    .description("List supported conversions and archive formats")
    .action(formatsCommand);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location")
    .option("--show", "Print the effective configuration")
    .action(configCommand);

  return program;
}
