import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic } from "@semport/frontend";
import { aggregateDiagnostics, withLeadingDiagnostics } from "./aggregator.js";
import { bestEffort, mapped, unmappable } from "../outcome.js";
import type {
  ConstructRef,
  MappingResult,
  TargetDeclaration,
  TargetMember,
} from "../types.js";

const construct = (
  typeOrdinal: number,
  memberIndex: number | undefined,
  name: string
): ConstructRef => ({
  typeKey: name.split("::")[0] ?? name,
  typeOrdinal,
  ...(memberIndex === undefined ? {} : { memberIndex }),
  constructKind: memberIndex === undefined ? "type" : "method",
  name,
  location: { file: "a.hpp", line: typeOrdinal + 1, column: (memberIndex ?? 0) + 1 },
});

describe("Diagnostics Aggregator", () => {
  const results: MappingResult[] = [
    {
      construct: construct(1, 0, "B::run"),
      outcome: unmappable<TargetMember>("operator-not-representable", {
        code: "SPM4001",
        message: "no equivalent",
      }),
    },
    {
      construct: construct(0, 2, "A::walk"),
      outcome: bestEffort([], [
        { code: "SPM3003", message: "implicit override" },
        { code: "SPM3004", message: "marker dropped" },
      ]),
    },
    { construct: construct(0, undefined, "A"), outcome: mapped([]) },
    {
      construct: construct(1, undefined, "B"),
      outcome: bestEffort([], [{ code: "SPM1002", message: "base dropped" }]),
    },
  ];

  it("should order entries by type, then member", () => {
    const report = aggregateDiagnostics(results);
    expect(report.diagnostics.map((d) => [d.code, d.message])).to.deep.equal([
      ["SPM3003", "A::walk: implicit override"],
      ["SPM3004", "A::walk: marker dropped"],
      ["SPM1002", "B: base dropped"],
      ["SPM4001", "B::run: no equivalent"],
    ]);
  });

  it("should map outcome statuses to severities", () => {
    const report = aggregateDiagnostics(results);
    expect(report.diagnostics.map((d) => d.severity)).to.deep.equal([
      "warning",
      "warning",
      "warning",
      "error",
    ]);
    expect(report.hasErrors).to.equal(true);
    expect(report.diagnostics[3]?.location).to.deep.equal({
      file: "a.hpp",
      line: 2,
      column: 1,
    });
    expect(report.diagnostics[3]?.constructKind).to.equal("method");
  });

  it("should count outcomes", () => {
    expect(aggregateDiagnostics(results).counts).to.deep.equal({
      mapped: 1,
      bestEffort: 2,
      unmappable: 1,
    });
  });

  it("should report nothing for a fully mapped run", () => {
    const report = aggregateDiagnostics([
      { construct: construct(0, undefined, "A"), outcome: mapped([]) },
    ]);
    expect(report.diagnostics).to.deep.equal([]);
    expect(report.hasErrors).to.equal(false);
  });

  it("should report every reason of an unmappable construct", () => {
    const report = aggregateDiagnostics([
      {
        construct: construct(0, undefined, "C"),
        outcome: unmappable<TargetDeclaration>(
          "multiple-implementation-inheritance-unsupported",
          { code: "SPM3002", message: "two implementation bases" },
          [{ code: "SPM3001", message: "missing overrides" }]
        ),
      },
    ]);
    expect(
      report.diagnostics.map((d) => [d.severity, d.code, d.message])
    ).to.deep.equal([
      ["error", "SPM3002", "C: two implementation bases"],
      ["error", "SPM3001", "C: missing overrides"],
    ]);
    expect(report.counts.unmappable).to.equal(1);
  });

  it("should put run-level diagnostics first", () => {
    const report = withLeadingDiagnostics(aggregateDiagnostics([]), [
      createDiagnostic("SPM1004", "error", "bad document"),
    ]);
    expect(report.diagnostics.map((d) => d.code)).to.deep.equal(["SPM1004"]);
    expect(report.hasErrors).to.equal(true);
  });
});
