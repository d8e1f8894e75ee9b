/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { error, ok } from "@semport/frontend";
import type {
  CliOptions,
  ResolvedConfig,
  Result,
  SemportConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "semport.json";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const STRING_KEYS = [
  "$schema",
  "outputDirectory",
  "rootPackage",
  "releaseMethodName",
  "releaseGuardName",
  "report",
] as const;

/**
 * Check the shape of a parsed semport.json
 */
export const validateConfig = (
  value: unknown
): Result<SemportConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: expected an object`);
  }

  for (const key of STRING_KEYS) {
    const field = value[key];
    if (field !== undefined && typeof field !== "string") {
      return error(`${CONFIG_FILE_NAME}: '${key}' must be a string`);
    }
  }

  const { sources, indent } = value;
  if (
    sources !== undefined &&
    !(Array.isArray(sources) && sources.every((s) => typeof s === "string"))
  ) {
    return error(`${CONFIG_FILE_NAME}: 'sources' must be a list of paths`);
  }
  if (
    indent !== undefined &&
    !(typeof indent === "number" && Number.isInteger(indent) && indent >= 0)
  ) {
    return error(`${CONFIG_FILE_NAME}: 'indent' must be a non-negative integer`);
  }

  const text = (key: (typeof STRING_KEYS)[number]): string | undefined => {
    const field = value[key];
    return typeof field === "string" ? field : undefined;
  };

  return ok({
    $schema: text("$schema"),
    sources: Array.isArray(sources)
      ? sources.filter((s): s is string => typeof s === "string")
      : undefined,
    outputDirectory: text("outputDirectory"),
    rootPackage: text("rootPackage"),
    releaseMethodName: text("releaseMethodName"),
    releaseGuardName: text("releaseGuardName"),
    indent: typeof indent === "number" ? indent : undefined,
    report: text("report"),
  });
};

/**
 * Load semport.json
 */
export const loadConfig = (
  configPath: string
): Result<SemportConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
  return validateConfig(parsed);
};

/**
 * Find semport.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing semport.json (or the working directory)
 * @param files - Source documents named on the command line, relative to `cwd`
 */
export const resolveConfig = (
  config: SemportConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  files: readonly string[] = [],
  cwd: string = process.cwd()
): ResolvedConfig => {
  const sources =
    files.length > 0
      ? files.map((f) => resolve(cwd, f))
      : (config.sources ?? []).map((s) => resolve(projectRoot, s));

  const report = cliOptions.report
    ? resolve(cwd, cliOptions.report)
    : config.report
      ? resolve(projectRoot, config.report)
      : undefined;

  const releaseMethodName = cliOptions.releaseMethod ?? config.releaseMethodName;

  return {
    projectRoot,
    sources,
    outputDirectory: cliOptions.out
      ? resolve(cwd, cliOptions.out)
      : resolve(projectRoot, config.outputDirectory ?? "java"),
    report,
    mapping: {
      ...(releaseMethodName ? { releaseMethodName } : {}),
      ...(config.releaseGuardName
        ? { releaseGuardName: config.releaseGuardName }
        : {}),
    },
    emitter: {
      rootPackage: cliOptions.rootPackage ?? config.rootPackage,
      indent: config.indent,
    },
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
