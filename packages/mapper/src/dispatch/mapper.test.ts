/**
 * Tests for the Dispatch Mapper
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  lookupType,
  qualifiedNameKey,
  sourceField,
  sourceFunction,
  sourceType,
  sourceUnit,
  type SourceUnit,
} from "@semport/frontend";
import {
  animalUnit,
  buildTable,
  mapFixtureType,
  multipleBasesUnit,
} from "../fixtures.js";
import { deriveTargetKind } from "./shape.js";
import type { TypeMapping } from "../declaration.js";
import type { TargetKind } from "../types.js";

const kindOf = (units: readonly SourceUnit[], key: string): TargetKind => {
  const table = buildTable(units);
  const entry = lookupType(table, key);
  if (!entry) {
    throw new Error(`missing ${key}`);
  }
  return deriveTargetKind(entry, table);
};

const typeCodes = (mapping: TypeMapping): readonly string[] => {
  const { outcome } = mapping.type;
  switch (outcome.status) {
    case "mapped":
      return [];
    case "bestEffort":
      return outcome.notes.map((n) => n.code);
    case "unmappable":
      return [outcome.note.code];
  }
};

const shapeUnit = (derived: readonly ReturnType<typeof sourceFunction>[]) =>
  sourceUnit("shapes.hpp", [
    sourceType("Shape", [
      sourceFunction("area", { returnType: "double", isPureVirtual: true }),
      sourceFunction("name", { returnType: "std::string", isPureVirtual: true }),
    ]),
    sourceType("Square", derived, { bases: ["Shape"] }),
  ]);

describe("Dispatch Mapper", () => {
  describe("target kind", () => {
    it("should map an abstract-only type to an interface", () => {
      expect(kindOf([animalUnit()], "Animal")).to.equal("interface");
    });

    it("should map an abstract type with state to an abstract class", () => {
      const unit = sourceUnit("a.hpp", [
        sourceType("Counter", [
          sourceField("count", "int"),
          sourceFunction("step", { isPureVirtual: true }),
        ]),
      ]);
      expect(kindOf([unit], "Counter")).to.equal("abstractClass");
    });

    it("should map an abstract type over a concrete base to an abstract class", () => {
      const unit = sourceUnit("a.hpp", [
        sourceType("Base", [sourceFunction("run")]),
        sourceType("Job", [sourceFunction("step", { isPureVirtual: true })], {
          bases: ["Base"],
        }),
      ]);
      expect(kindOf([unit], "Job")).to.equal("abstractClass");
    });

    it("should honor an explicit abstract marker", () => {
      const unit = sourceUnit("a.hpp", [
        sourceType("Marker", [sourceField("id", "int")], { isAbstract: true }),
      ]);
      expect(kindOf([unit], "Marker")).to.equal("abstractClass");
    });
  });

  it("should map Animal/Dog to an interface and an implementing class", () => {
    const units = [animalUnit()];
    const animal = mapFixtureType(units, "Animal");
    const dog = mapFixtureType(units, "Dog");

    expect(animal.type.outcome.status).to.equal("mapped");
    expect(animal.declaration?.kind).to.equal("interface");
    expect(
      animal.declaration?.members.map((m) =>
        m.kind === "method" ? [m.name, m.isAbstract] : []
      )
    ).to.deep.equal([["speak", true]]);

    expect(dog.type.outcome.status).to.equal("mapped");
    expect(dog.declaration?.kind).to.equal("concreteClass");
    expect(dog.declaration?.superClass).to.equal(undefined);
    expect(dog.declaration?.interfaces.map(qualifiedNameKey)).to.deep.equal([
      "Animal",
    ]);
    const [speak] = dog.declaration?.members ?? [];
    expect(speak?.kind === "method" && speak.isOverride).to.equal(true);
    expect(dog.members.every((m) => m.outcome.status === "mapped")).to.equal(
      true
    );
  });

  it("should reject multiple implementation bases, naming both", () => {
    const mapping = mapFixtureType([multipleBasesUnit()], "Copier");
    const { outcome } = mapping.type;

    expect(outcome.status).to.equal("unmappable");
    if (outcome.status !== "unmappable") return;
    expect(outcome.reason).to.equal(
      "multiple-implementation-inheritance-unsupported"
    );
    expect(outcome.note.code).to.equal("SPM3002");
    expect(outcome.note.message).to.equal(
      "'Copier' inherits implementation from more than one base: Printer, Scanner"
    );
    expect(mapping.declaration).to.equal(undefined);
  });

  it("should extend the implementation base and implement interface bases", () => {
    const unit = sourceUnit("a.hpp", [
      sourceType("Named", [
        sourceFunction("name", { returnType: "std::string", isPureVirtual: true }),
      ]),
      sourceType("Entity", [sourceField("id", "int")]),
      sourceType(
        "User",
        [
          sourceFunction("name", {
            returnType: "std::string",
            isOverride: true,
          }),
        ],
        { bases: ["Entity", "Named"] }
      ),
    ]);
    const mapping = mapFixtureType([unit], "User");

    expect(mapping.type.outcome.status).to.equal("mapped");
    expect(mapping.declaration?.superClass?.simpleName).to.equal("Entity");
    expect(mapping.declaration?.interfaces.map(qualifiedNameKey)).to.deep.equal([
      "Named",
    ]);
  });

  it("should report every missing override", () => {
    const mapping = mapFixtureType(
      [shapeUnit([sourceFunction("area", { returnType: "double", isOverride: true })])],
      "Square"
    );
    const { outcome } = mapping.type;

    expect(outcome.status).to.equal("unmappable");
    if (outcome.status !== "unmappable") return;
    expect(outcome.reason).to.equal("incomplete-override");
    expect(outcome.note.message).to.equal(
      "'Square' does not override inherited abstract method(s): name/0 (from Shape)"
    );
  });

  it("should accept abstract methods implemented further up the chain", () => {
    const unit = sourceUnit("a.hpp", [
      sourceType("Shape", [
        sourceFunction("area", { returnType: "double", isPureVirtual: true }),
      ]),
      sourceType(
        "Polygon",
        [sourceFunction("area", { returnType: "double", isOverride: true })],
        { bases: ["Shape"] }
      ),
      sourceType("Triangle", [sourceField("sides", "int")], {
        bases: ["Polygon"],
      }),
    ]);
    expect(mapFixtureType([unit], "Triangle").type.outcome.status).to.equal(
      "mapped"
    );
  });

  it("should require the override marker on implementations", () => {
    const mapping = mapFixtureType(
      [
        shapeUnit([
          sourceFunction("area", { returnType: "double" }),
          sourceFunction("name", { returnType: "std::string", isOverride: true }),
        ]),
      ],
      "Square"
    );
    const { outcome } = mapping.type;

    expect(outcome.status).to.equal("unmappable");
    if (outcome.status !== "unmappable") return;
    expect(outcome.reason).to.equal("incomplete-override");
    expect(outcome.note.message).to.equal(
      "'Square' does not override inherited abstract method(s): area/0 (from Shape, declared without override)"
    );
    expect(mapping.declaration).to.equal(undefined);

    const area = mapping.members[0]?.outcome;
    expect(area?.status === "bestEffort" ? area.notes[0]?.code : undefined).to.equal(
      "SPM3003"
    );
  });

  it("should report every reason a type cannot be mapped", () => {
    const unit = sourceUnit("combo.hpp", [
      sourceType("Printer", [sourceFunction("print", { body: "puts(\"p\");" })]),
      sourceType("Scanner", [sourceFunction("scan", { body: "puts(\"s\");" })]),
      sourceType("Shape", [
        sourceFunction("area", { returnType: "double", isPureVirtual: true }),
      ]),
      sourceType("Combo", [], { bases: ["Printer", "Scanner", "Shape"] }),
    ]);
    const { outcome } = mapFixtureType([unit], "Combo").type;

    expect(outcome.status).to.equal("unmappable");
    if (outcome.status !== "unmappable") return;
    expect(outcome.note.code).to.equal("SPM3002");
    expect(outcome.furtherNotes?.map((n) => n.message)).to.deep.equal([
      "'Combo' does not override inherited abstract method(s): area/0 (from Shape)",
    ]);
  });

  describe("bases without implementation", () => {
    it("should not count empty class bases as implementation", () => {
      const unit = sourceUnit("tags.hpp", [
        sourceType("Tag", []),
        sourceType("Marker", []),
        sourceType("Item", [sourceField("id", "int")], {
          bases: ["Tag", "Marker"],
        }),
      ]);
      const mapping = mapFixtureType([unit], "Item");
      const { outcome } = mapping.type;

      expect(outcome.status).to.equal("bestEffort");
      if (outcome.status !== "bestEffort") return;
      expect(outcome.notes).to.deep.equal([
        {
          code: "SPM3005",
          message:
            "base 'Marker' declares no state or behaviour and was left out of the class hierarchy",
          hint: "Give the base an abstract method to keep it as an interface",
        },
      ]);
      expect(mapping.declaration?.superClass?.simpleName).to.equal("Tag");
      expect(mapping.declaration?.interfaces).to.deep.equal([]);
    });

    it("should extend the base that carries implementation", () => {
      const unit = sourceUnit("tags.hpp", [
        sourceType("Tag", []),
        sourceType("Logger", [sourceFunction("log", { body: "puts(\"l\");" })]),
        sourceType("Job", [], { bases: ["Tag", "Logger"] }),
      ]);
      const mapping = mapFixtureType([unit], "Job");

      expect(mapping.type.outcome.status).to.equal("bestEffort");
      expect(typeCodes(mapping)).to.deep.equal(["SPM3005"]);
      expect(mapping.declaration?.superClass?.simpleName).to.equal("Logger");
    });

    it("should count implementation inherited through an empty base", () => {
      const unit = sourceUnit("tags.hpp", [
        sourceType("Logger", [sourceFunction("log", { body: "puts(\"l\");" })]),
        sourceType("Audited", [], { bases: ["Logger"] }),
        sourceType("Counter", [sourceField("count", "int")]),
        sourceType("Job", [], { bases: ["Audited", "Counter"] }),
      ]);
      const { outcome } = mapFixtureType([unit], "Job").type;

      expect(outcome.status === "unmappable" ? outcome.note.message : "").to.equal(
        "'Job' inherits implementation from more than one base: Audited, Counter"
      );
    });
  });

  it("should drop an override marker that overrides nothing", () => {
    const unit = sourceUnit("a.hpp", [
      sourceType("Base", [sourceFunction("run")]),
      sourceType("Derived", [sourceFunction("walk", { isOverride: true })], {
        bases: ["Base"],
      }),
    ]);
    const mapping = mapFixtureType([unit], "Derived");
    const walk = mapping.members[0]?.outcome;

    expect(walk?.status === "bestEffort" ? walk.notes[0]?.code : undefined).to.equal(
      "SPM3004"
    );
    const [target] = mapping.declaration?.members ?? [];
    expect(target?.kind === "method" && target.isOverride).to.equal(false);
  });

  it("should surface unresolved bases and renamed types on the type", () => {
    const unit = sourceUnit("a.hpp", [
      sourceType("Widget", []),
      sourceType("Widget", [], { bases: ["Missing"] }),
    ]);
    const mapping = mapFixtureType([unit], "Widget_2");

    expect(mapping.type.outcome.status).to.equal("bestEffort");
    expect(typeCodes(mapping)).to.deep.equal(["SPM1002", "SPM1003"]);
  });
});
