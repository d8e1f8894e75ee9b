/**
 * Symbol table query functions
 */

import type { NamespacePath, QualifiedName } from "../source/types.js";
import { resolveReference } from "./resolution.js";
import type { EnumEntry, SymbolEntry, SymbolTable } from "./types.js";

export const lookupType = (
  table: SymbolTable,
  key: string
): SymbolEntry | undefined => table.entries.get(key);

/**
 * Resolve a type name written inside `scope` (C++ lookup rules)
 */
export const resolveTypeReference = (
  table: SymbolTable,
  reference: string,
  scope: NamespacePath
): SymbolEntry | undefined => {
  const key = resolveReference(reference, scope, (candidate) =>
    table.entries.has(candidate)
  );
  return key ? table.entries.get(key) : undefined;
};

export const lookupEnumeration = (
  table: SymbolTable,
  key: string
): EnumEntry | undefined => table.enumerations.get(key);

/**
 * Resolve a type or enumeration name written inside `scope`; the innermost
 * declaration of either kind wins
 */
export const resolveDeclaredName = (
  table: SymbolTable,
  reference: string,
  scope: NamespacePath
): QualifiedName | undefined => {
  const key = resolveReference(
    reference,
    scope,
    (candidate) =>
      table.entries.has(candidate) || table.enumerations.has(candidate)
  );
  if (!key) {
    return undefined;
  }
  return (table.entries.get(key) ?? table.enumerations.get(key))?.name;
};

/**
 * Resolved direct bases, in declaration order
 */
export const getBaseEntries = (
  table: SymbolTable,
  key: string
): readonly SymbolEntry[] =>
  (table.bases.get(key) ?? []).flatMap((baseKey) => {
    const entry = table.entries.get(baseKey);
    return entry ? [entry] : [];
  });

export const getEntriesInOrder = (
  table: SymbolTable
): readonly SymbolEntry[] =>
  table.order.flatMap((key) => {
    const entry = table.entries.get(key);
    return entry ? [entry] : [];
  });

export const getEnumerationsInOrder = (
  table: SymbolTable
): readonly EnumEntry[] => [...table.enumerations.values()];
