/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { error, ok } from "@semport/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand } from "../commands/check.js";
import { mapCommand } from "../commands/map.js";
import {
  failureExitCode,
  printFailure,
  runExitCode,
  type PipelineFailure,
} from "../commands/pipeline.js";
import { reportCommand } from "../commands/report.js";
import type { ParsedArgs, ResolvedConfig, Result, SemportConfig } from "../types.js";
import { EXIT_CODES, VERSION, isCommandName } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const loadProjectConfig = (
  parsed: ParsedArgs,
  cwd: string
): Result<ResolvedConfig, string> => {
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath) {
    if (parsed.files.length === 0) {
      return error("No semport.json found and no source documents given");
    }
    const empty: SemportConfig = {};
    return ok(resolveConfig(empty, parsed.options, cwd, parsed.files, cwd));
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    return error(configResult.error);
  }

  // Project root is the directory containing semport.json
  return ok(
    resolveConfig(
      configResult.value,
      parsed.options,
      dirname(configPath),
      parsed.files,
      cwd
    )
  );
};

const finish = <T>(
  result: Result<T, PipelineFailure>,
  exitCode: (value: T) => number
): number => {
  if (!result.ok) {
    printFailure(result.error);
    return failureExitCode(result.error);
  }
  return exitCode(result.value);
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`semport v${VERSION}`);
    return EXIT_CODES.success;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.success;
  }

  if (!isCommandName(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'semport --help' for usage information");
    return EXIT_CODES.unknownCommand;
  }

  const config = loadProjectConfig(parsed, cwd);
  if (!config.ok) {
    console.error(`Error: ${config.error}`);
    return EXIT_CODES.inputFailure;
  }

  // Dispatch to command handlers
  switch (parsed.command) {
    case "map":
      return finish(mapCommand(config.value), (summary) =>
        runExitCode(summary.run)
      );
    case "check":
      return finish(checkCommand(config.value), runExitCode);
    case "report":
      return finish(reportCommand(config.value), runExitCode);
  }
};
