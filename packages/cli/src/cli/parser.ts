/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional args after the command are source documents
    if (command && !arg.startsWith("-")) {
      files.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", files: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", files: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "-p":
      case "--root-package":
        options.rootPackage = args[++i] ?? "";
        break;
      case "--release-method":
        options.releaseMethod = args[++i] ?? "";
        break;
      case "-r":
      case "--report":
        options.report = args[++i] ?? "";
        break;
    }
  }

  return { command, files, options };
};
