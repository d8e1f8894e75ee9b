/**
 * Tests for the Java enum emitter
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  sourceEnum,
  sourceEnumerator,
  sourceUnit,
  type EnumeratorSyntax,
} from "@semport/frontend";
import { mapSourceUnits, type TargetEnum } from "@semport/mapper";
import { emitEnumFile, emitEnumSources } from "./emitter.js";

const enumerationOf = (
  name: string,
  enumerators: readonly (string | EnumeratorSyntax)[]
): TargetEnum => {
  const result = mapSourceUnits([
    sourceUnit("enums.hpp", [sourceEnum(name, enumerators)]),
  ]);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  const [enumeration] = result.value.enumerations;
  if (!enumeration) {
    throw new Error(`no enumeration for ${name}`);
  }
  return enumeration;
};

const bodyOf = (enumeration: TargetEnum): readonly string[] =>
  emitEnumFile(enumeration, { includeTimestamp: false }).split("\n").slice(3);

describe("Java Enum Emitter", () => {
  it("should emit sequential enumerators as plain constants", () => {
    const code = emitEnumFile(enumerationOf("Direction", ["NORTH", "SOUTH"]), {
      includeTimestamp: false,
    });

    expect(code).to.equal(
      [
        "// Mapped from: <memory>",
        "// WARNING: Do not modify this file manually",
        "",
        "public enum Direction {",
        "    NORTH,",
        "    SOUTH",
        "}",
        "",
      ].join("\n")
    );
  });

  it("should carry explicit values through a final field", () => {
    const lines = bodyOf(
      enumerationOf("Status", [
        sourceEnumerator("OK", 200),
        sourceEnumerator("NOT_FOUND", 404),
      ])
    );

    expect(lines).to.deep.equal([
      "public enum Status {",
      "    OK(200),",
      "    NOT_FOUND(404);",
      "",
      "    private final int value;",
      "",
      "    Status(int value) {",
      "        this.value = value;",
      "    }",
      "",
      "    public int getValue() {",
      "        return value;",
      "    }",
      "}",
      "",
    ]);
  });

  it("should widen the value field for values beyond 32 bits", () => {
    const lines = bodyOf(
      enumerationOf("Limit", [sourceEnumerator("HUGE", 2 ** 40)])
    );
    expect(lines.slice(1, 4)).to.deep.equal([
      "    HUGE(1099511627776L);",
      "",
      "    private final long value;",
    ]);
  });

  it("should escape enumerators named after Java keywords", () => {
    const lines = bodyOf(enumerationOf("Access", ["public", "private"]));
    expect(lines.slice(1, 3)).to.deep.equal(["    public_,", "    private_"]);
  });

  it("should emit an empty enumeration", () => {
    expect(bodyOf(enumerationOf("Nothing", []))).to.deep.equal([
      "public enum Nothing {",
      "}",
      "",
    ]);
  });

  it("should place namespaced enumerations in lower-case packages", () => {
    const [file] = emitEnumSources(
      [enumerationOf("Net::Http::Method", ["GET", "POST"])],
      { rootPackage: "com.example", includeTimestamp: false }
    );
    expect(file?.path).to.equal("com/example/net/http/Method.java");
    expect(file?.packageName).to.equal("com.example.net.http");
    expect(file?.code.split("\n")[3]).to.equal("package com.example.net.http;");
  });
});
