/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  success: 0,
  errorDiagnostics: 1,
  unknownCommand: 2,
  inputFailure: 3,
  fatal: 4,
} as const;

export const COMMANDS = ["map", "check", "report"] as const;

export type CommandName = (typeof COMMANDS)[number];

export const isCommandName = (name: string): name is CommandName =>
  COMMANDS.some((c) => c === name);
