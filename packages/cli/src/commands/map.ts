/**
 * semport map command - map source documents and write Java files
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, relative } from "node:path";
import { error, flatMap, ok } from "@semport/frontend";
import { emitEnumSources, emitJavaSources } from "@semport/emitter";
import type { MappingRun } from "@semport/mapper";
import type { ResolvedConfig, Result } from "../types.js";
import {
  printDiagnostics,
  printOutcomes,
  runPipeline,
  type PipelineFailure,
} from "./pipeline.js";
import { buildReport, formatReport } from "./report.js";

export type MapSummary = {
  readonly run: MappingRun;
  /** Absolute paths of the written Java files */
  readonly files: readonly string[];
};

const writeFile = (path: string, content: string): void => {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, "utf-8");
};

const errorCount = (run: MappingRun): number =>
  run.report.diagnostics.filter((d) => d.severity === "error").length;

/**
 * Write the Java files and the report. A run with error diagnostics writes
 * only the report.
 */
const writeOutputs = (
  run: MappingRun,
  config: ResolvedConfig
): Result<MapSummary, PipelineFailure> => {
  const { outputDirectory, quiet, report } = config;
  const sources = run.report.hasErrors
    ? []
    : [
        ...emitJavaSources(run.declarations, config.emitter),
        ...emitEnumSources(run.enumerations, config.emitter),
      ];

  try {
    const files = sources.map((source) => {
      const path = join(outputDirectory, source.path);
      writeFile(path, source.code);
      return path;
    });

    if (report) {
      writeFile(report, formatReport(buildReport(run, config.emitter)));
    }

    if (run.report.hasErrors) {
      console.error(
        `✗ No Java files written: ${errorCount(run)} error diagnostic(s)`
      );
    } else if (!quiet) {
      const where = relative(process.cwd(), outputDirectory) || ".";
      console.log(`✓ Wrote ${files.length} Java file(s) to ${where}`);
    }
    if (report && !quiet) {
      console.log(`  Report: ${relative(process.cwd(), report)}`);
    }
    return ok({ run, files });
  } catch (e) {
    return error({
      kind: "output",
      message: `Failed to write output: ${e instanceof Error ? e.message : String(e)}`,
    });
  }
};

export const mapCommand = (
  config: ResolvedConfig
): Result<MapSummary, PipelineFailure> => {
  if (!config.quiet) {
    console.log(`Mapping ${config.sources.length} source document(s)...`);
  }

  return flatMap(runPipeline(config), (run) => {
    printDiagnostics(run.report.diagnostics);
    if (config.verbose) {
      printOutcomes(run);
    }
    return writeOutputs(run, config);
  });
};
