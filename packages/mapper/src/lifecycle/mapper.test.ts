/**
 * Tests for the Resource Lifecycle Mapper
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  sourceField,
  sourceFunction,
  sourceType,
  sourceUnit,
  type MemberSyntax,
} from "@semport/frontend";
import { fileHandlerUnit, mapFixtureType } from "../fixtures.js";
import { releaseOrderFor } from "./mapper.js";
import type { TypeMapping } from "../declaration.js";
import type { MappingStatus, TargetMember } from "../types.js";

const mapMembers = (members: readonly MemberSyntax[]): TypeMapping =>
  mapFixtureType([sourceUnit("res.hpp", [sourceType("Res", members)])], "Res");

const memberStatus = (mapping: TypeMapping, index: number): MappingStatus =>
  mapping.members.find((m) => m.construct.memberIndex === index)?.outcome
    .status ?? "mapped";

const memberCodes = (mapping: TypeMapping, index: number): readonly string[] => {
  const outcome = mapping.members.find(
    (m) => m.construct.memberIndex === index
  )?.outcome;
  if (!outcome) return [];
  switch (outcome.status) {
    case "mapped":
      return [];
    case "bestEffort":
      return outcome.notes.map((n) => n.code);
    case "unmappable":
      return [outcome.note.code];
  }
};

const releaseMethodOf = (
  members: readonly TargetMember[]
): TargetMember | undefined =>
  members.find((m) => m.kind === "method" && m.name === "close");

describe("Resource Lifecycle Mapper", () => {
  it("should map FileHandler to an idempotent release method", () => {
    const mapping = mapFixtureType([fileHandlerUnit()], "FileHandler");

    expect(mapping.type.outcome.status).to.equal("mapped");
    expect(mapping.members.map((m) => m.outcome.status)).to.deep.equal([
      "mapped",
      "mapped",
      "mapped",
    ]);

    const declaration = mapping.declaration;
    expect(declaration?.capabilities).to.deep.equal(["releasable"]);
    expect(
      declaration?.members.map((m) => (m.kind === "constructor" ? "<init>" : m.name))
    ).to.deep.equal(["handle", "released", "<init>", "close"]);

    const release = releaseMethodOf(declaration?.members ?? []);
    expect(release?.kind === "method" ? release.body : undefined).to.deep.equal({
      kind: "release",
      resources: ["handle"],
      guard: "released",
      chainsToSuper: false,
    });

    const handle = declaration?.members[0];
    expect(handle?.kind === "field" && handle.isOwnedResource).to.equal(true);
  });

  it("should release in reverse acquisition order and note a different destructor order", () => {
    const mapping = mapMembers([
      sourceField("a", "int*"),
      sourceField("b", "int*"),
      sourceFunction("Res", { acquires: ["a", "b"] }),
      sourceFunction("~Res", { releases: ["a", "b"] }),
    ]);

    expect(memberCodes(mapping, 3)).to.deep.equal(["SPM2004"]);
    const release = releaseMethodOf(mapping.declaration?.members ?? []);
    expect(
      release?.kind === "method" && release.body.kind === "release"
        ? release.body.resources
        : []
    ).to.deep.equal(["b", "a"]);
  });

  it("should keep a destructor that already releases in reverse order mapped", () => {
    const mapping = mapMembers([
      sourceField("a", "int*"),
      sourceField("b", "int*"),
      sourceFunction("Res", { acquires: ["a", "b"] }),
      sourceFunction("~Res", { releases: ["b", "a"] }),
    ]);
    expect(memberStatus(mapping, 3)).to.equal("mapped");
  });

  it("should flag ownership as ambiguous when the field is also exposed", () => {
    const mapping = mapMembers([
      sourceField("buffer", "char*"),
      sourceFunction("Res", { acquires: ["buffer"] }),
      sourceFunction("~Res", { releases: ["buffer"] }),
      sourceFunction("data", { returnType: "char*", exposes: ["buffer"] }),
    ]);

    expect(memberCodes(mapping, 0)).to.deep.equal(["SPM2003"]);
    const release = releaseMethodOf(mapping.declaration?.members ?? []);
    expect(
      release?.kind === "method" && release.body.kind === "release"
        ? release.body.resources
        : []
    ).to.deep.equal(["buffer"]);
  });

  it("should flag ownership as ambiguous when the field is never acquired", () => {
    const mapping = mapMembers([
      sourceField("buffer", "char*"),
      sourceFunction("Res"),
      sourceFunction("~Res", { releases: ["buffer"] }),
    ]);
    expect(memberCodes(mapping, 0)).to.deep.equal(["SPM2003"]);
  });

  it("should let an explicit ownership claim override the heuristic", () => {
    const mapping = mapMembers([
      sourceField("buffer", "char*", { ownsResource: true }),
      sourceFunction("Res"),
      sourceFunction("~Res", { releases: ["buffer"] }),
      sourceFunction("data", { returnType: "char*", exposes: ["buffer"] }),
    ]);
    expect(memberStatus(mapping, 0)).to.equal("mapped");
    expect(memberStatus(mapping, 2)).to.equal("mapped");
  });

  it("should map a destructor without resources to a no-op release", () => {
    const mapping = mapMembers([
      sourceField("count", "int"),
      sourceFunction("Res"),
      sourceFunction("~Res", { body: "log(\"bye\");" }),
    ]);

    expect(memberCodes(mapping, 2)).to.deep.equal(["SPM2001"]);
    const release = releaseMethodOf(mapping.declaration?.members ?? []);
    expect(release?.kind === "method" ? release.body : undefined).to.deep.equal({
      kind: "noopRelease",
      chainsToSuper: false,
    });
    expect(mapping.declaration?.capabilities).to.deep.equal(["releasable"]);
  });

  it("should reject a type with a destructor but no constructor", () => {
    const mapping = mapMembers([
      sourceField("buffer", "char*"),
      sourceFunction("~Res", { releases: ["buffer"] }),
    ]);
    const { outcome } = mapping.type;

    expect(memberStatus(mapping, 1)).to.equal("unmappable");
    expect(memberCodes(mapping, 1)).to.deep.equal(["SPM2002"]);
    expect(outcome.status).to.equal("unmappable");
    if (outcome.status !== "unmappable") return;
    expect(outcome.reason).to.equal("acquisition-point-unknown");
    expect(outcome.note.code).to.equal("SPM2002");
    expect(mapping.declaration).to.equal(undefined);
  });

  it("should keep a type whose only destructor is defaulted", () => {
    const mapping = mapMembers([
      sourceField("count", "int"),
      sourceFunction("~Res", { isDefaulted: true }),
    ]);
    expect(mapping.type.outcome.status).to.equal("mapped");
    expect(mapping.declaration?.capabilities).to.deep.equal([]);
  });

  it("should map a defaulted destructor to nothing", () => {
    const mapping = mapMembers([sourceFunction("~Res", { isDefaulted: true })]);
    expect(memberStatus(mapping, 0)).to.equal("mapped");
    expect(mapping.declaration?.members).to.deep.equal([]);
  });

  it("should use the configured release method name", () => {
    const mapping = mapFixtureType([fileHandlerUnit()], "FileHandler", {
      releaseMethodName: "dispose",
    });
    expect(
      mapping.declaration?.members.some(
        (m) => m.kind === "method" && m.name === "dispose"
      )
    ).to.equal(true);
  });

  it("should chain to a releasing superclass", () => {
    const mapping = mapFixtureType(
      [
        fileHandlerUnit(),
        sourceUnit("logged.hpp", [
          sourceType(
            "LoggedFile",
            [
              sourceField("log", "FILE*"),
              sourceFunction("LoggedFile", { acquires: ["log"] }),
              sourceFunction("~LoggedFile", { releases: ["log"] }),
            ],
            { bases: ["FileHandler"] }
          ),
        ]),
      ],
      "LoggedFile"
    );

    const release = releaseMethodOf(mapping.declaration?.members ?? []);
    expect(release?.kind === "method" && release.isOverride).to.equal(true);
    expect(
      release?.kind === "method" && release.body.kind === "release"
        ? release.body.chainsToSuper
        : false
    ).to.equal(true);
    expect(mapping.declaration?.superClass?.simpleName).to.equal("FileHandler");
  });

  describe("releaseOrderFor", () => {
    it("should put released fields that were never acquired last", () => {
      expect(
        releaseOrderFor(["a", "b"], ["c", "a", "b"], ["a", "b", "c"])
      ).to.deep.equal(["b", "a", "c"]);
    });
  });
});
