/**
 * Diagnostics Aggregator - merges mapping outcomes into one report
 */

import { createDiagnostic, type Diagnostic } from "@semport/frontend";
import type { MappingNote, MappingResult, MappingStatus } from "../types.js";

export type OutcomeCounts = Readonly<Record<MappingStatus, number>>;

export type DiagnosticsReport = {
  readonly diagnostics: readonly Diagnostic[];
  readonly counts: OutcomeCounts;
  readonly hasErrors: boolean;
};

const noteDiagnostic = (
  result: MappingResult,
  note: MappingNote,
  severity: "error" | "warning"
): Diagnostic =>
  createDiagnostic(
    note.code,
    severity,
    `${result.construct.name}: ${note.message}`,
    result.construct.location,
    result.construct.constructKind,
    note.hint
  );

const compareResults = (a: MappingResult, b: MappingResult): number =>
  a.construct.typeOrdinal - b.construct.typeOrdinal ||
  (a.construct.memberIndex ?? -1) - (b.construct.memberIndex ?? -1);

/**
 * Mapped contributes nothing, BestEffort one warning per note, Unmappable
 * one error per reason. Ordered by type then member position.
 */
export const aggregateDiagnostics = (
  results: readonly MappingResult[]
): DiagnosticsReport => {
  const counts = { mapped: 0, bestEffort: 0, unmappable: 0 };
  const diagnostics = [...results]
    .sort(compareResults)
    .flatMap((result): Diagnostic[] => {
      const { outcome } = result;
      counts[outcome.status]++;
      switch (outcome.status) {
        case "mapped":
          return [];
        case "bestEffort":
          return outcome.notes.map((note) =>
            noteDiagnostic(result, note, "warning")
          );
        case "unmappable":
          return [outcome.note, ...(outcome.furtherNotes ?? [])].map((note) =>
            noteDiagnostic(result, note, "error")
          );
      }
    });

  return {
    diagnostics,
    counts,
    hasErrors: diagnostics.some((d) => d.severity === "error"),
  };
};

/**
 * Prepend run-level diagnostics (loader or table problems) to a report
 */
export const withLeadingDiagnostics = (
  report: DiagnosticsReport,
  leading: readonly Diagnostic[]
): DiagnosticsReport =>
  leading.length === 0
    ? report
    : {
        ...report,
        diagnostics: [...leading, ...report.diagnostics],
        hasErrors:
          report.hasErrors || leading.some((d) => d.severity === "error"),
      };
