#!/usr/bin/env node

import { Command } from "commander";
import { compressCommand } from "./frontend/compress";
import { decompressCommand } from "./frontend/decompress";
import { inspectCommand } from "./frontend/inspect";
import { CommandLineOptions } from "./frontend/parseOptions";
import * as cons from "./utils/console";
import { errorMessage } from "./utils/errorHandling";
import { printHelp, resolveHelpTopic } from "./utils/help";
import { getVersionTag, readPackageInfo } from "./utils/versionString";

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Handle global help
  if (args.length === 0 || (args.length === 1 && (args[0] === "-h" || args[0] === "--help"))) {
    printHelp("main");
    return;
  }

  // Handle command-specific help
  if (args.length >= 2 && (args.includes("-h") || args.includes("--help"))) {
    const topic = resolveHelpTopic(args[0]);
    if (topic) {
      printHelp(topic);
      return;
    }
  }

  const program = new Command();

  // Disable default help
  program.helpOption(false);
  program.addHelpCommand(false);

  program
    .name("huffpack")
    .description("Huffman file compressor")
    .version(getVersionTag(readPackageInfo()), "-v, --version", "Output version information");

  program
    .command("compress <file>")
    .alias("c")
    .description("Compress a file")
    .option("-o, --output <path>", "Output file path")
    .option("--log-file <path>", "Also write log output to this file")
    .action(async (file: string, options?: CommandLineOptions) => {
      await compressCommand(file, options);
    });

  program
    .command("decompress <file>")
    .alias("d")
    .description("Decompress a huffpack container")
    .option("-o, --output <path>", "Output file path")
    .option("--log-file <path>", "Also write log output to this file")
    .action(async (file: string, options?: CommandLineOptions) => {
      await decompressCommand(file, options);
    });

  program
    .command("inspect <file>")
    .alias("x")
    .description("Print the header and code table of a container")
    .option("--log-file <path>", "Also write log output to this file")
    .action(async (file: string, options?: CommandLineOptions) => {
      await inspectCommand(file, options);
    });

  program
    .command("help [command]")
    .description("Show help information")
    .action((command?: string) => {
      if (!command) {
        printHelp("main");
        return;
      }
      const topic = resolveHelpTopic(command);
      if (!topic) {
        cons.error(`Unknown command: ${command}`);
        process.stdout.write("\n");
        printHelp("main");
        process.exitCode = 1;
        return;
      }
      printHelp(topic);
    });

  await program.parseAsync(args, { from: "user" });
}

main().catch((e: unknown) => {
  cons.error(errorMessage(e));
  process.exitCode = 1;
});
