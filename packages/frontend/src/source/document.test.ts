/**
 * Tests for the source document loader
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseSourceDocument } from "./document.js";
import type { SourceUnit, TypeDeclaration } from "./types.js";

const SHAPES = `
file: shapes.hpp
declarations:
  - kind: namespace
    name: Geometry::Shapes
    line: 1
    declarations:
      - kind: type
        name: Shape
        line: 4
        column: 9
        members:
          - { kind: field, name: name, type: string, line: 6 }
          - kind: function
            name: Shape
            parameters:
              - { name: n, type: "const string&" }
            reads: [name]
          - { kind: function, name: "~Shape", virtual: true, defaulted: true }
          - { kind: function, name: getArea, returnType: double, pureVirtual: true, const: true }
`;

const firstNestedType = (unit: SourceUnit): TypeDeclaration => {
  const namespace = unit.declarations[0];
  if (namespace?.kind !== "namespace") throw new Error("expected namespace");
  const type = namespace.declarations[0];
  if (type?.kind !== "type") throw new Error("expected type");
  return type;
};

describe("Source documents", () => {
  it("should qualify types with their enclosing namespaces", () => {
    const result = parseSourceDocument(SHAPES, "input.yaml");
    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    const unit = result.value;
    expect(unit.file).to.equal("shapes.hpp");

    const shape = firstNestedType(unit);
    expect(shape.name).to.deep.equal({
      namespacePath: ["Geometry", "Shapes"],
      simpleName: "Shape",
    });
    expect(shape.location).to.deep.equal({
      file: "shapes.hpp",
      line: 4,
      column: 9,
    });
  });

  it("should fill function defaults", () => {
    const result = parseSourceDocument(SHAPES, "input.yaml");
    if (!result.ok) throw new Error("expected ok");

    const shape = firstNestedType(result.value);
    const [, ctor, dtor, getArea] = shape.members;

    expect(ctor?.kind).to.equal("function");
    if (ctor?.kind !== "function") return;
    expect(ctor.parameters).to.deep.equal([{ name: "n", type: "const string&" }]);
    expect(ctor.returnType).to.be.undefined;
    expect(ctor.hasBody).to.equal(true);
    expect(ctor.acquires).to.deep.equal([]);

    if (dtor?.kind !== "function") throw new Error("expected function");
    expect(dtor.isDefaulted).to.equal(true);
    expect(dtor.hasBody).to.equal(false);

    if (getArea?.kind !== "function") throw new Error("expected function");
    expect(getArea.isPureVirtual).to.equal(true);
    expect(getArea.isVirtual).to.equal(true);
    expect(getArea.hasBody).to.equal(false);
  });

  it("should use the document path when no file is given", () => {
    const result = parseSourceDocument("declarations: []", "units/empty.yaml");
    expect(result).to.deep.equal({
      ok: true,
      value: { file: "units/empty.yaml", declarations: [] },
    });
  });

  it("should accept JSON documents", () => {
    const json = JSON.stringify({
      declarations: [{ kind: "type", name: "Point", members: [] }],
    });
    const result = parseSourceDocument(json, "point.json");
    expect(result.ok).to.equal(true);
  });

  it("should report every invalid entry", () => {
    const text = `
declarations:
  - kind: type
    members:
      - { kind: property, name: x }
  - kind: union
    name: Color
`;
    const result = parseSourceDocument(text, "broken.yaml");
    expect(result.ok).to.equal(false);
    if (result.ok) return;

    expect(result.error.map((d) => d.message)).to.deep.equal([
      "document.declarations[0]: 'name' must be a non-empty string",
      'document.declarations[0].members[0]: unknown member kind "property" (expected "field" or "function")',
      'document.declarations[1]: unknown declaration kind "union" (expected "namespace", "type" or "enum")',
    ]);
    expect(result.error.every((d) => d.code === "SPM1004")).to.equal(true);
  });

  it("should read enumerations with and without initializers", () => {
    const text = `
file: status.hpp
declarations:
  - kind: namespace
    name: Net
    declarations:
      - kind: enum
        name: Status
        line: 3
        enumerators:
          - OK
          - { name: NOT_FOUND, value: 404, line: 5 }
`;
    const result = parseSourceDocument(text, "status.yaml");
    if (!result.ok) throw new Error("expected ok");

    const namespace = result.value.declarations[0];
    if (namespace?.kind !== "namespace") throw new Error("expected namespace");
    const status = namespace.declarations[0];
    if (status?.kind !== "enum") throw new Error("expected enum");

    expect(status.name).to.deep.equal({
      namespacePath: ["Net"],
      simpleName: "Status",
    });
    expect(status.enumerators).to.deep.equal([
      { name: "OK", location: { file: "status.hpp", line: 3, column: 1 } },
      {
        name: "NOT_FOUND",
        value: 404,
        location: { file: "status.hpp", line: 5, column: 1 },
      },
    ]);
  });

  it("should reject repeated enumerators and fractional values", () => {
    const text = `
declarations:
  - kind: enum
    name: Mode
    enumerators: [READ, { name: WRITE, value: 1.5 }, READ]
`;
    const result = parseSourceDocument(text, "mode.yaml");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.message)).to.deep.equal([
      "document.declarations[0].enumerators[1]: 'value' must be an integer",
      "document.declarations[0]: enumerator 'READ' is declared twice",
    ]);
  });

  it("should reject a document that is not an object", () => {
    const result = parseSourceDocument("- just\n- a list\n", "list.yaml");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.message).to.equal(
      "Source document must be an object with a 'declarations' list"
    );
  });
});
