/**
 * Source document loader
 *
 * The external front-end writes one YAML (or JSON, which YAML accepts)
 * document per translation unit:
 *
 * ```yaml
 * file: shapes.hpp
 * declarations:
 *   - kind: namespace
 *     name: Geometry::Shapes
 *     declarations:
 *       - kind: type
 *         name: Shape
 *         line: 5
 *         members:
 *           - { kind: field, name: name, type: string }
 *           - { kind: function, name: getArea, returnType: double, pureVirtual: true }
 *       - kind: enum
 *         name: Color
 *         enumerators: [RED, { name: GREEN, value: 4 }]
 * ```
 */

import { readFileSync } from "node:fs";
import YAML from "yaml";
import {
  Diagnostic,
  SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import { Result, error, ok } from "../types/result.js";
import { qualifiedName, splitNamespaceSegments } from "./qualified-name.js";
import type {
  EnumDeclaration,
  EnumeratorSyntax,
  FieldSyntax,
  FunctionSyntax,
  MemberSyntax,
  NamespacePath,
  SourceParameter,
  SourceUnit,
  TopLevelDeclaration,
  TypeDeclaration,
} from "./types.js";

type RawObject = Readonly<Record<string, unknown>>;

type ReadContext = {
  readonly file: string;
  readonly issues: Diagnostic[];
};

const isObject = (value: unknown): value is RawObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const report = (context: ReadContext, path: string, message: string): void => {
  context.issues.push(
    createDiagnostic(
      "SPM1004",
      "error",
      `${path}: ${message}`,
      { file: context.file, line: 1, column: 1 },
      undefined,
      "Regenerate the document with the front-end"
    )
  );
};

const readLocation = (
  raw: RawObject,
  context: ReadContext
): SourceLocation => ({
  file: context.file,
  line: typeof raw.line === "number" ? raw.line : 1,
  column: typeof raw.column === "number" ? raw.column : 1,
});

const readString = (
  raw: RawObject,
  key: string,
  path: string,
  context: ReadContext
): string => {
  const value = raw[key];
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  report(context, path, `'${key}' must be a non-empty string`);
  return "";
};

const readOptionalString = (
  raw: RawObject,
  key: string,
  path: string,
  context: ReadContext
): string | undefined => {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  report(context, path, `'${key}' must be a string`);
  return undefined;
};

const readFlag = (
  raw: RawObject,
  key: string,
  path: string,
  context: ReadContext
): boolean => {
  const value = raw[key];
  if (value === undefined || value === null) return false;
  if (typeof value === "boolean") return value;
  report(context, path, `'${key}' must be a boolean`);
  return false;
};

const readStringList = (
  raw: RawObject,
  key: string,
  path: string,
  context: ReadContext
): readonly string[] => {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
    return value.filter((v): v is string => typeof v === "string");
  }
  report(context, path, `'${key}' must be a list of strings`);
  return [];
};

const readList = (
  raw: RawObject,
  key: string,
  path: string,
  context: ReadContext
): readonly unknown[] => {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value;
  report(context, path, `'${key}' must be a list`);
  return [];
};

const readParameters = (
  raw: RawObject,
  path: string,
  context: ReadContext
): readonly SourceParameter[] =>
  readList(raw, "parameters", path, context).flatMap((entry, index) => {
    const entryPath = `${path}.parameters[${index}]`;
    if (!isObject(entry)) {
      report(context, entryPath, "parameter must be an object");
      return [];
    }
    return [
      {
        name: readOptionalString(entry, "name", entryPath, context) ?? `arg${index}`,
        type: readString(entry, "type", entryPath, context),
      },
    ];
  });

const readField = (
  raw: RawObject,
  path: string,
  context: ReadContext
): FieldSyntax => {
  const owns = raw.ownsResource;
  if (owns !== undefined && typeof owns !== "boolean") {
    report(context, path, "'ownsResource' must be a boolean");
  }
  return {
    kind: "field",
    name: readString(raw, "name", path, context),
    type: readString(raw, "type", path, context),
    ownsResource: typeof owns === "boolean" ? owns : undefined,
    isStatic: readFlag(raw, "static", path, context),
    location: readLocation(raw, context),
  };
};

const readFunction = (
  raw: RawObject,
  path: string,
  context: ReadContext
): FunctionSyntax => {
  const isPureVirtual = readFlag(raw, "pureVirtual", path, context);
  const isDefaulted = readFlag(raw, "defaulted", path, context);
  const hasBody =
    typeof raw.hasBody === "boolean" ? raw.hasBody : !isPureVirtual && !isDefaulted;

  return {
    kind: "function",
    name: readString(raw, "name", path, context),
    parameters: readParameters(raw, path, context),
    returnType: readOptionalString(raw, "returnType", path, context),
    isVirtual: readFlag(raw, "virtual", path, context) || isPureVirtual,
    isPureVirtual,
    isOverride: readFlag(raw, "override", path, context),
    isDefaulted,
    isStatic: readFlag(raw, "static", path, context),
    isConst: readFlag(raw, "const", path, context),
    hasBody,
    acquires: readStringList(raw, "acquires", path, context),
    releases: readStringList(raw, "releases", path, context),
    reads: readStringList(raw, "reads", path, context),
    exposes: readStringList(raw, "exposes", path, context),
    body: readOptionalString(raw, "body", path, context),
    location: readLocation(raw, context),
  };
};

const readMember = (
  raw: unknown,
  path: string,
  context: ReadContext
): MemberSyntax | undefined => {
  if (!isObject(raw)) {
    report(context, path, "member must be an object");
    return undefined;
  }
  switch (raw.kind) {
    case "field":
      return readField(raw, path, context);
    case "function":
      return readFunction(raw, path, context);
    default:
      report(
        context,
        path,
        `unknown member kind ${JSON.stringify(raw.kind)} (expected "field" or "function")`
      );
      return undefined;
  }
};

const readType = (
  raw: RawObject,
  namespacePath: NamespacePath,
  path: string,
  context: ReadContext
): TypeDeclaration => ({
  kind: "type",
  name: qualifiedName(namespacePath, readString(raw, "name", path, context)),
  bases: readStringList(raw, "bases", path, context),
  members: readList(raw, "members", path, context).flatMap((member, index) => {
    const read = readMember(member, `${path}.members[${index}]`, context);
    return read ? [read] : [];
  }),
  isAbstract: readFlag(raw, "abstract", path, context),
  location: readLocation(raw, context),
});

const readEnumerator = (
  raw: unknown,
  path: string,
  context: ReadContext,
  enumLocation: SourceLocation
): EnumeratorSyntax | undefined => {
  if (typeof raw === "string" && raw.length > 0) {
    return { name: raw, location: enumLocation };
  }
  if (!isObject(raw)) {
    report(context, path, "enumerator must be a name or an object");
    return undefined;
  }
  const value = raw.value;
  if (value !== undefined && value !== null && !Number.isInteger(value)) {
    report(context, path, "'value' must be an integer");
  }
  return {
    name: readString(raw, "name", path, context),
    ...(typeof value === "number" && Number.isInteger(value) ? { value } : {}),
    location: readLocation(raw, context),
  };
};

const readEnum = (
  raw: RawObject,
  namespacePath: NamespacePath,
  path: string,
  context: ReadContext
): EnumDeclaration => {
  const location = readLocation(raw, context);
  const enumerators = readList(raw, "enumerators", path, context).flatMap(
    (entry, index) => {
      const read = readEnumerator(
        entry,
        `${path}.enumerators[${index}]`,
        context,
        location
      );
      return read ? [read] : [];
    }
  );
  const seen = new Set<string>();
  for (const enumerator of enumerators) {
    if (seen.has(enumerator.name)) {
      report(context, path, `enumerator '${enumerator.name}' is declared twice`);
    }
    seen.add(enumerator.name);
  }
  return {
    kind: "enum",
    name: qualifiedName(namespacePath, readString(raw, "name", path, context)),
    enumerators,
    location,
  };
};

const readDeclarations = (
  raw: RawObject,
  namespacePath: NamespacePath,
  path: string,
  context: ReadContext
): readonly TopLevelDeclaration[] =>
  readList(raw, "declarations", path, context).flatMap(
    (entry, index): TopLevelDeclaration[] => {
      const entryPath = `${path}.declarations[${index}]`;
      if (!isObject(entry)) {
        report(context, entryPath, "declaration must be an object");
        return [];
      }
      if (entry.kind === "type") {
        return [readType(entry, namespacePath, entryPath, context)];
      }
      if (entry.kind === "enum") {
        return [readEnum(entry, namespacePath, entryPath, context)];
      }
      if (entry.kind === "namespace") {
        const name = readString(entry, "name", entryPath, context);
        return [
          {
            kind: "namespace",
            name,
            declarations: readDeclarations(
              entry,
              [...namespacePath, ...splitNamespaceSegments(name)],
              entryPath,
              context
            ),
            location: readLocation(entry, context),
          },
        ];
      }
      report(
        context,
        entryPath,
        `unknown declaration kind ${JSON.stringify(entry.kind)} (expected "namespace", "type" or "enum")`
      );
      return [];
    }
  );

/**
 * Parse one source document
 */
export const parseSourceDocument = (
  text: string,
  file: string
): Result<SourceUnit, readonly Diagnostic[]> => {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (e) {
    return error([
      createDiagnostic(
        "SPM1004",
        "error",
        `Failed to parse source document: ${e instanceof Error ? e.message : String(e)}`,
        { file, line: 1, column: 1 }
      ),
    ]);
  }

  if (!isObject(parsed)) {
    return error([
      createDiagnostic(
        "SPM1004",
        "error",
        "Source document must be an object with a 'declarations' list",
        { file, line: 1, column: 1 }
      ),
    ]);
  }

  const unitFile = typeof parsed.file === "string" ? parsed.file : file;
  const context: ReadContext = { file: unitFile, issues: [] };
  const declarations = readDeclarations(parsed, [], "document", context);

  return context.issues.length > 0
    ? error(context.issues)
    : ok({ file: unitFile, declarations });
};

/**
 * Read and parse a source document from disk
 */
export const loadSourceUnit = (
  path: string
): Result<SourceUnit, readonly Diagnostic[]> => {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (e) {
    return error([
      createDiagnostic(
        "SPM1004",
        "error",
        `Failed to read source document: ${e instanceof Error ? e.message : String(e)}`,
        { file: path, line: 1, column: 1 }
      ),
    ]);
  }
  return parseSourceDocument(text, path);
};
