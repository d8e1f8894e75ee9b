/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "SPM3001",
        "error",
        "Dog does not override speak/0",
        { file: "animals.yaml", line: 10, column: 5 },
        "type",
        "Add an override for speak"
      );

      expect(diagnostic.code).to.equal("SPM3001");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.constructKind).to.equal("type");
      expect(diagnostic.location?.line).to.equal(10);
      expect(diagnostic.hint).to.equal("Add an override for speak");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("SPM1002", "warning", "Missing base");

      expect(diagnostic.location).to.be.undefined;
      expect(diagnostic.constructKind).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("formatDiagnostic", () => {
    it("should format diagnostic with location", () => {
      const diagnostic = createDiagnostic(
        "SPM4001",
        "error",
        "operator[] is not representable",
        { file: "/units/matrix.yaml", line: 5, column: 10 }
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "/units/matrix.yaml:5:10 error SPM4001: operator[] is not representable"
      );
    });

    it("should append the hint", () => {
      const diagnostic = createDiagnostic(
        "SPM2001",
        "warning",
        "No resource detected",
        undefined,
        "destructor",
        "Mark the owning field"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "warning SPM2001: No resource detected Hint: Mark the owning field"
      );
    });
  });

  describe("collectors", () => {
    it("should track errors as diagnostics are added", () => {
      const warning = createDiagnostic("SPM2001", "warning", "w");
      const failure = createDiagnostic("SPM3002", "error", "e");

      const withWarning = addDiagnostic(createDiagnosticsCollector(), warning);
      expect(withWarning.hasErrors).to.equal(false);

      const withError = addDiagnostic(withWarning, failure);
      expect(withError.hasErrors).to.equal(true);
      expect(withError.diagnostics).to.have.length(2);
    });

    it("should seed hasErrors from initial diagnostics", () => {
      const collector = createDiagnosticsCollector([
        createDiagnostic("SPM1001", "error", "cycle"),
      ]);
      expect(collector.hasErrors).to.equal(true);
    });

    it("should merge collectors in order", () => {
      const first = createDiagnosticsCollector([
        createDiagnostic("SPM1002", "warning", "a"),
      ]);
      const second = createDiagnosticsCollector([
        createDiagnostic("SPM4001", "error", "b"),
      ]);

      const merged = mergeDiagnostics(first, second);
      expect(merged.diagnostics.map((d) => d.message)).to.deep.equal([
        "a",
        "b",
      ]);
      expect(merged.hasErrors).to.equal(true);
    });

    it("should classify severity", () => {
      expect(isError(createDiagnostic("SPM6001", "error", "x"))).to.equal(true);
      expect(isError(createDiagnostic("SPM2004", "warning", "x"))).to.equal(
        false
      );
    });
  });
});
