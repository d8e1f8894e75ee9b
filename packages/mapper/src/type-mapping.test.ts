import { describe, it } from "mocha";
import { expect } from "chai";
import { sourceEnum, sourceType, sourceUnit } from "@semport/frontend";
import { buildTable } from "./fixtures.js";
import { mapTypeSpelling, typeRefKey } from "./type-mapping.js";

describe("Type-reference mapping", () => {
  const table = buildTable([
    sourceUnit("types.hpp", [
      sourceType("Widget", []),
      sourceType("ui::Button", []),
      sourceEnum("ui::Align", ["LEFT", "RIGHT"]),
    ]),
  ]);
  const global = { table, scope: [] };
  const inUi = { table, scope: ["ui"] };

  it("should map primitives", () => {
    expect(mapTypeSpelling("int", global)).to.deep.equal({
      kind: "primitive",
      name: "int",
    });
    expect(mapTypeSpelling("unsigned long", global)).to.deep.equal({
      kind: "primitive",
      name: "long",
    });
    expect(mapTypeSpelling("const bool", global)).to.deep.equal({
      kind: "primitive",
      name: "boolean",
    });
  });

  it("should map C strings and std::string to String", () => {
    expect(mapTypeSpelling("const char*", global)).to.deep.equal({
      kind: "string",
    });
    expect(mapTypeSpelling("const std::string&", global)).to.deep.equal({
      kind: "string",
    });
  });

  it("should map primitive pointers and arrays to arrays", () => {
    expect(mapTypeSpelling("char*", global)).to.deep.equal({
      kind: "array",
      element: { kind: "primitive", name: "byte" },
    });
    expect(mapTypeSpelling("int[4]", global)).to.deep.equal({
      kind: "array",
      element: { kind: "primitive", name: "int" },
    });
  });

  it("should collapse pointers and references to declared types", () => {
    expect(typeRefKey(mapTypeSpelling("Widget*", global))).to.equal("Widget");
    expect(typeRefKey(mapTypeSpelling("const Widget&", global))).to.equal(
      "Widget"
    );
  });

  it("should resolve declared types from the enclosing namespace", () => {
    expect(typeRefKey(mapTypeSpelling("Button", inUi))).to.equal("ui::Button");
    expect(mapTypeSpelling("Button", global)).to.deep.equal({
      kind: "unknown",
      spelling: "Button",
    });
  });

  it("should resolve enumerations like declared types", () => {
    expect(mapTypeSpelling("Align", inUi)).to.deep.equal({
      kind: "declared",
      name: { namespacePath: ["ui"], simpleName: "Align" },
    });
    expect(mapTypeSpelling("Align", global)).to.deep.equal({
      kind: "unknown",
      spelling: "Align",
    });
  });

  it("should map library containers with their arguments", () => {
    expect(
      typeRefKey(mapTypeSpelling("std::map<std::string, int>", global))
    ).to.equal("java.util.Map<string,int>");
    expect(
      typeRefKey(mapTypeSpelling("std::vector<std::unique_ptr<Widget>>", global))
    ).to.equal("java.util.List<Widget>");
  });

  it("should map void pointers to Object", () => {
    expect(typeRefKey(mapTypeSpelling("void*", global))).to.equal(
      "java.lang.Object"
    );
    expect(mapTypeSpelling("void", global)).to.deep.equal({ kind: "void" });
  });
});
