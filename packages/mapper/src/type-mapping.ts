/**
 * Source type spellings to target type references
 */

import {
  resolveDeclaredName,
  type NamespacePath,
  type SymbolTable,
} from "@semport/frontend";
import type { PrimitiveTypeName, TargetTypeRef } from "./types.js";

const PRIMITIVES: ReadonlyMap<string, PrimitiveTypeName> = new Map([
  ["bool", "boolean"],
  ["char", "byte"],
  ["signed char", "byte"],
  ["unsigned char", "byte"],
  ["wchar_t", "char"],
  ["char16_t", "char"],
  ["short", "short"],
  ["unsigned short", "short"],
  ["int", "int"],
  ["unsigned", "int"],
  ["unsigned int", "int"],
  ["long", "long"],
  ["unsigned long", "long"],
  ["long long", "long"],
  ["unsigned long long", "long"],
  ["size_t", "long"],
  ["std::size_t", "long"],
  ["int8_t", "byte"],
  ["uint8_t", "byte"],
  ["int16_t", "short"],
  ["uint16_t", "short"],
  ["int32_t", "int"],
  ["uint32_t", "int"],
  ["int64_t", "long"],
  ["uint64_t", "long"],
  ["float", "float"],
  ["double", "double"],
  ["long double", "double"],
]);

const STRING_TYPES: ReadonlySet<string> = new Set([
  "std::string",
  "string",
  "std::wstring",
  "std::string_view",
]);

/** Library templates whose type arguments carry over */
const LIBRARY_TEMPLATES: ReadonlyMap<string, string> = new Map([
  ["std::vector", "java.util.List"],
  ["std::list", "java.util.List"],
  ["std::deque", "java.util.List"],
  ["std::map", "java.util.Map"],
  ["std::unordered_map", "java.util.Map"],
  ["std::set", "java.util.Set"],
  ["std::unordered_set", "java.util.Set"],
]);

/** Ownership wrappers that collapse to their element under a managed heap */
const TRANSPARENT_TEMPLATES: ReadonlySet<string> = new Set([
  "std::unique_ptr",
  "std::shared_ptr",
  "std::weak_ptr",
  "std::optional",
]);

const QUALIFIERS = /\b(const|volatile|mutable|struct|class|typename)\b/g;

export type TypeMappingContext = {
  readonly table: SymbolTable;
  /** Namespace the spelling was written in */
  readonly scope: NamespacePath;
};

/**
 * Split template arguments at top-level commas
 */
const splitTemplateArguments = (text: string): readonly string[] => {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of text) {
    if (ch === "<") depth++;
    if (ch === ">") depth--;
    if (ch === "," && depth === 0) {
      parts.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }
  if (current.trim().length > 0) {
    parts.push(current.trim());
  }
  return parts;
};

const isCString = (spelling: string): boolean =>
  /^(const\s+char|char\s+const)\s*\*$/.test(spelling.trim());

/**
 * Map a source type spelling to a target type reference
 */
export const mapTypeSpelling = (
  spelling: string,
  context: TypeMappingContext
): TargetTypeRef => {
  if (isCString(spelling)) {
    return { kind: "string" };
  }

  let text = spelling.replace(QUALIFIERS, " ").replace(/\s+/g, " ").trim();

  // References carry no meaning under a managed heap
  text = text.replace(/\s*&{1,2}$/, "").trim();

  const arrayElement = /^(.*?)\s*\[[^\]]*\]$/.exec(text)?.[1];
  if (arrayElement) {
    return { kind: "array", element: mapTypeSpelling(arrayElement, context) };
  }

  const pointerTarget = /^(.*?)\s*\*$/.exec(text)?.[1];
  if (pointerTarget !== undefined) {
    const pointee = pointerTarget.trim();
    if (pointee === "void") {
      return { kind: "library", name: "java.lang.Object", typeArguments: [] };
    }
    const element = mapTypeSpelling(pointee, context);
    // A pointer to a value type is a buffer; a pointer to an object is a reference
    return element.kind === "primitive" ? { kind: "array", element } : element;
  }

  const [, templateHead, templateArgs] = /^([^<]+)<(.*)>$/.exec(text) ?? [];
  if (templateHead && templateArgs !== undefined) {
    const templateName = templateHead.trim();
    const typeArguments = splitTemplateArguments(templateArgs).map((arg) =>
      mapTypeSpelling(arg, context)
    );

    const libraryName = LIBRARY_TEMPLATES.get(templateName);
    if (libraryName) {
      return { kind: "library", name: libraryName, typeArguments };
    }
    const [element] = typeArguments;
    if (TRANSPARENT_TEMPLATES.has(templateName) && element) {
      return element;
    }
    return { kind: "unknown", spelling: text };
  }

  if (text === "void") {
    return { kind: "void" };
  }

  const primitive = PRIMITIVES.get(text);
  if (primitive) {
    return { kind: "primitive", name: primitive };
  }

  if (STRING_TYPES.has(text)) {
    return { kind: "string" };
  }

  const declared = resolveDeclaredName(context.table, text, context.scope);
  if (declared) {
    return { kind: "declared", name: declared };
  }

  return { kind: "unknown", spelling: text };
};

/**
 * Stable key used to compare signatures
 */
export const typeRefKey = (type: TargetTypeRef): string => {
  switch (type.kind) {
    case "void":
    case "string":
      return type.kind;
    case "primitive":
      return type.name;
    case "array":
      return `${typeRefKey(type.element)}[]`;
    case "declared":
      return [...type.name.namespacePath, type.name.simpleName].join("::");
    case "library":
      return type.typeArguments.length === 0
        ? type.name
        : `${type.name}<${type.typeArguments.map(typeRefKey).join(",")}>`;
    case "unknown":
      return `?${type.spelling}`;
  }
};
