/**
 * Tests for the construct classifier
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { classifyMembers } from "./classify.js";
import { parseOperatorName } from "./operators.js";
import {
  sourceField,
  sourceFunction,
  sourceType,
} from "../source/builders.js";

describe("Construct Classifier", () => {
  it("should classify the FileHandler members", () => {
    const fileHandler = sourceType("FileHandler", [
      sourceField("filename", "char*"),
      sourceFunction("FileHandler", {
        parameters: [{ name: "name", type: "const char*" }],
        acquires: ["filename"],
      }),
      sourceFunction("~FileHandler", { releases: ["filename"] }),
      sourceFunction("open", { returnType: "void" }),
    ]);

    expect(classifyMembers(fileHandler).map((m) => m.kind)).to.deep.equal([
      "field",
      "constructor",
      "destructor",
      "method",
    ]);
  });

  it("should keep member indices", () => {
    const point = sourceType("Point", [
      sourceField("x", "int"),
      sourceField("y", "int"),
    ]);
    expect(classifyMembers(point).map((m) => m.memberIndex)).to.deep.equal([
      0, 1,
    ]);
  });

  it("should classify pure virtual methods as abstract", () => {
    const animal = sourceType("Animal", [
      sourceFunction("speak", { returnType: "void", isPureVirtual: true }),
      sourceFunction("describe", { returnType: "void", isVirtual: true }),
    ]);

    expect(classifyMembers(animal).map((m) => m.kind)).to.deep.equal([
      "abstractMethod",
      "method",
    ]);
  });

  it("should classify operators with their token", () => {
    const vector = sourceType("Vector2D", [
      sourceFunction("operator==", {
        returnType: "bool",
        parameters: [{ name: "other", type: "const Vector2D&" }],
      }),
      sourceFunction("operator +", {
        returnType: "Vector2D",
        parameters: [{ name: "other", type: "const Vector2D&" }],
      }),
    ]);

    const [equality, addition] = classifyMembers(vector);
    expect(equality?.kind).to.equal("operatorOverload");
    if (equality?.kind === "operatorOverload") {
      expect(equality.token).to.equal("==");
      expect(equality.isConversion).to.equal(false);
    }
    if (addition?.kind !== "operatorOverload") {
      throw new Error("expected operator");
    }
    expect(addition.token).to.equal("+");
  });

  it("should never guess an operator from a lookalike name", () => {
    const numeric = sourceType("Numeric", [
      sourceFunction("operatorPlus", { returnType: "Numeric" }),
      sourceFunction("operator_add", { returnType: "Numeric" }),
      sourceFunction("operatornew", { returnType: "void" }),
    ]);

    expect(classifyMembers(numeric).map((m) => m.kind)).to.deep.equal([
      "method",
      "method",
      "method",
    ]);
  });

  it("should treat a destructor-like name with parameters as a method", () => {
    const odd = sourceType("Odd", [
      sourceFunction("~Odd", {
        returnType: "void",
        parameters: [{ name: "flag", type: "int" }],
      }),
      sourceFunction("~Other"),
    ]);

    expect(classifyMembers(odd).map((m) => m.kind)).to.deep.equal([
      "method",
      "method",
    ]);
  });

  it("should use the simple name for qualified types", () => {
    const shape = sourceType("Geometry::Shapes::Shape", [
      sourceFunction("Shape", { parameters: [{ name: "n", type: "string" }] }),
      sourceFunction("~Shape", { isVirtual: true, isDefaulted: true }),
    ]);

    expect(classifyMembers(shape).map((m) => m.kind)).to.deep.equal([
      "constructor",
      "destructor",
    ]);
  });

  describe("parseOperatorName", () => {
    it("should recognize call, subscript and allocation operators", () => {
      expect(parseOperatorName("operator()")?.token).to.equal("()");
      expect(parseOperatorName("operator [ ]")?.token).to.equal("[]");
      expect(parseOperatorName("operator new[]")?.token).to.equal("new[]");
      expect(parseOperatorName("operator<=>")?.token).to.equal("<=>");
    });

    it("should recognize conversion operators", () => {
      expect(parseOperatorName("operator bool")).to.deep.equal({
        token: "bool",
        isConversion: true,
      });
      expect(parseOperatorName("operator std::string")?.token).to.equal(
        "std::string"
      );
    });

    it("should reject ordinary identifiers", () => {
      expect(parseOperatorName("operate")).to.be.undefined;
      expect(parseOperatorName("operator")).to.be.undefined;
    });
  });
});
