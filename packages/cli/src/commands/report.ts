/**
 * semport report command - JSON mapping report
 */

import {
  formatLocation,
  map,
  qualifiedNameKey,
  type ConstructKind,
  type DiagnosticCode,
  type DiagnosticSeverity,
} from "@semport/frontend";
import type {
  MappingRun,
  MappingStatus,
  OutcomeCounts,
  TargetKind,
} from "@semport/mapper";
import { renderOutputPath, type EmitterOptions } from "@semport/emitter";
import { VERSION } from "../cli/constants.js";
import type { ResolvedConfig, Result } from "../types.js";
import { runPipeline, type PipelineFailure } from "./pipeline.js";

export type MappingReport = {
  readonly version: string;
  readonly counts: OutcomeCounts;
  readonly hasErrors: boolean;
  readonly diagnostics: readonly {
    readonly code: DiagnosticCode;
    readonly severity: DiagnosticSeverity;
    readonly message: string;
    readonly location?: string;
    readonly hint?: string;
  }[];
  readonly constructs: readonly {
    readonly name: string;
    readonly kind: ConstructKind;
    readonly status: MappingStatus;
    readonly reason?: string;
  }[];
  readonly declarations: readonly {
    readonly name: string;
    readonly kind: TargetKind | "enum";
    readonly path: string;
  }[];
};

/**
 * Serializable summary of a mapping run
 */
export const buildReport = (
  run: MappingRun,
  emitter: EmitterOptions
): MappingReport => ({
  version: VERSION,
  counts: run.report.counts,
  hasErrors: run.report.hasErrors,
  diagnostics: run.report.diagnostics.map((d) => ({
    code: d.code,
    severity: d.severity,
    message: d.message,
    ...(d.location ? { location: formatLocation(d.location) } : {}),
    ...(d.hint ? { hint: d.hint } : {}),
  })),
  constructs: run.results.map(({ construct, outcome }) => ({
    name: construct.name,
    kind: construct.constructKind,
    status: outcome.status,
    ...(outcome.status === "unmappable" ? { reason: outcome.reason } : {}),
  })),
  declarations: [
    ...run.declarations.map((d) => ({
      name: qualifiedNameKey(d.name),
      kind: d.kind,
      path: renderOutputPath(d.name, emitter),
    })),
    ...run.enumerations.map((e) => ({
      name: qualifiedNameKey(e.name),
      kind: "enum" as const,
      path: renderOutputPath(e.name, emitter),
    })),
  ],
});

export const formatReport = (report: MappingReport): string =>
  `${JSON.stringify(report, null, 2)}\n`;

/**
 * Map the sources and print the report to stdout
 */
export const reportCommand = (
  config: ResolvedConfig
): Result<MappingRun, PipelineFailure> =>
  map(runPipeline(config), (run) => {
    process.stdout.write(formatReport(buildReport(run, config.emitter)));
    return run;
  });
