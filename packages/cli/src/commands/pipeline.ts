/**
 * Shared load → map pipeline of the mapping commands
 */

import {
  collectResults,
  createDiagnostic,
  error,
  formatDiagnostic,
  loadSourceUnit,
  ok,
  type Diagnostic,
} from "@semport/frontend";
import { mapSourceUnits, type MappingRun } from "@semport/mapper";
import { EXIT_CODES } from "../cli/constants.js";
import type { ResolvedConfig, Result } from "../types.js";

export type PipelineFailure =
  /** Unreadable or invalid source documents */
  | { readonly kind: "input"; readonly diagnostics: readonly Diagnostic[] }
  /** The symbol table could not be built (inheritance cycle) */
  | { readonly kind: "fatal"; readonly diagnostic: Diagnostic }
  /** Generated files could not be written */
  | { readonly kind: "output"; readonly message: string };

export const runPipeline = (
  config: ResolvedConfig
): Result<MappingRun, PipelineFailure> => {
  if (config.sources.length === 0) {
    return error({
      kind: "input",
      diagnostics: [
        createDiagnostic(
          "SPM1004",
          "error",
          "No source documents given",
          undefined,
          undefined,
          "Name them on the command line or under 'sources' in semport.json"
        ),
      ],
    });
  }

  if (config.verbose) {
    console.log(`Loading ${config.sources.length} source document(s)...`);
  }
  const units = collectResults(config.sources.map(loadSourceUnit));
  if (!units.ok) {
    return error({ kind: "input", diagnostics: units.error });
  }

  const run = mapSourceUnits(units.value, config.mapping);
  return run.ok
    ? ok(run.value)
    : error({ kind: "fatal", diagnostic: run.error });
};

/**
 * Print diagnostics to stderr
 */
export const printDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Print the per-type outcome lines of verbose mode
 */
export const printOutcomes = (run: MappingRun): void => {
  for (const result of run.results) {
    if (result.construct.memberIndex === undefined) {
      console.log(`  ${result.construct.name}: ${result.outcome.status}`);
    }
  }
};

export const printFailure = (failure: PipelineFailure): void => {
  switch (failure.kind) {
    case "input":
      printDiagnostics(failure.diagnostics);
      return;
    case "fatal":
      printDiagnostics([failure.diagnostic]);
      return;
    case "output":
      console.error(`Error: ${failure.message}`);
      return;
  }
};

export const failureExitCode = (failure: PipelineFailure): number =>
  failure.kind === "fatal" ? EXIT_CODES.fatal : EXIT_CODES.inputFailure;

export const runExitCode = (run: MappingRun): number =>
  run.report.hasErrors ? EXIT_CODES.errorDiagnostics : EXIT_CODES.success;
