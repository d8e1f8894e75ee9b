/**
 * Source units for the reference scenarios, shared by the package tests
 */

import {
  buildSymbolTable,
  lookupType,
  sourceField,
  sourceFunction,
  sourceNamespace,
  sourceType,
  sourceUnit,
  type SourceUnit,
  type SymbolTable,
} from "@semport/frontend";
import { mapTypeDeclaration, type TypeMapping } from "./declaration.js";
import { resolveMappingOptions } from "./engine.js";
import type { MappingOptions } from "./types.js";

export const buildTable = (units: readonly SourceUnit[]): SymbolTable => {
  const result = buildSymbolTable(units);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
};

/**
 * Map one type of the given units
 */
export const mapFixtureType = (
  units: readonly SourceUnit[],
  key: string,
  options: Partial<MappingOptions> = {}
): TypeMapping => {
  const table = buildTable(units);
  const entry = lookupType(table, key);
  if (!entry) {
    throw new Error(`No type '${key}' in fixture`);
  }
  return mapTypeDeclaration(entry, table, resolveMappingOptions(options));
};

/** A constructor acquires a buffer that the destructor releases */
export const fileHandlerUnit = (): SourceUnit =>
  sourceUnit("file_handler.hpp", [
    sourceType("FileHandler", [
      sourceField("handle", "FILE*"),
      sourceFunction("FileHandler", {
        parameters: [{ name: "path", type: "const char*" }],
        acquires: ["handle"],
        body: "handle = fopen(path, \"r\");",
      }),
      sourceFunction("~FileHandler", { releases: ["handle"] }),
    ]),
  ]);

/** An abstract-only base and one complete override */
export const animalUnit = (): SourceUnit =>
  sourceUnit("animals.hpp", [
    sourceType("Animal", [
      sourceFunction("speak", {
        returnType: "std::string",
        isPureVirtual: true,
        isConst: true,
      }),
      sourceFunction("~Animal", { isVirtual: true, isDefaulted: true }),
    ]),
    sourceType(
      "Dog",
      [
        sourceFunction("speak", {
          returnType: "std::string",
          isVirtual: true,
          isOverride: true,
          isConst: true,
          body: "return \"Woof\";",
        }),
      ],
      { bases: ["Animal"] }
    ),
  ]);

/** Full equality and component-wise addition */
export const vectorUnit = (): SourceUnit =>
  sourceUnit("vector2d.hpp", [
    sourceType("Vector2D", [
      sourceField("x", "double"),
      sourceField("y", "double"),
      sourceFunction("Vector2D", {
        parameters: [
          { name: "x", type: "double" },
          { name: "y", type: "double" },
        ],
      }),
      sourceFunction("operator==", {
        parameters: [{ name: "other", type: "const Vector2D&" }],
        returnType: "bool",
        isConst: true,
        reads: ["x", "y"],
      }),
      sourceFunction("operator+", {
        parameters: [{ name: "other", type: "const Vector2D&" }],
        returnType: "Vector2D",
        isConst: true,
        reads: ["x", "y"],
      }),
    ]),
  ]);

/** A type inheriting implementation from two concrete bases */
export const multipleBasesUnit = (): SourceUnit =>
  sourceUnit("mixins.hpp", [
    sourceType("Printer", [
      sourceFunction("print", { returnType: "void", body: "puts(\"print\");" }),
    ]),
    sourceType("Scanner", [
      sourceFunction("scan", { returnType: "void", body: "puts(\"scan\");" }),
    ]),
    sourceType("Copier", [], { bases: ["Printer", "Scanner"] }),
  ]);

/** Two `Shape` types in different namespaces */
export const geometryUnit = (): SourceUnit =>
  sourceUnit("geometry.hpp", [
    sourceNamespace("Geometry", [
      sourceNamespace("Shapes", [
        sourceType("Geometry::Shapes::Shape", [
          sourceFunction("area", {
            returnType: "double",
            isPureVirtual: true,
            isConst: true,
          }),
        ]),
      ]),
    ]),
    sourceNamespace("Render", [
      sourceType("Render::Shape", [sourceField("color", "int")]),
    ]),
  ]);
