/**
 * Symbol table builder - one sequential pass over every source unit
 */

import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { Result, ok } from "../types/result.js";
import { qualifiedNameKey, withSimpleName } from "../source/qualified-name.js";
import type {
  EnumDeclaration,
  QualifiedName,
  SourceUnit,
  TopLevelDeclaration,
  TypeDeclaration,
} from "../source/types.js";
import { checkInheritanceCycles } from "./inheritance.js";
import { resolveReference } from "./resolution.js";
import type {
  EnumEntry,
  NameCollision,
  SymbolEntry,
  SymbolTable,
  UnresolvedBase,
} from "./types.js";

/**
 * A frozen read-only view over a private copy of `source`
 */
const freezeMap = <K, V>(
  source: ReadonlyMap<K, V>
): ReadonlyMap<K, V> => {
  const copy = new Map(source);
  const view: ReadonlyMap<K, V> = {
    get size() {
      return copy.size;
    },
    get: (key) => copy.get(key),
    has: (key) => copy.has(key),
    forEach: (callback, thisArg) =>
      copy.forEach((value, key) => callback.call(thisArg, value, key, view)),
    entries: () => copy.entries(),
    keys: () => copy.keys(),
    values: () => copy.values(),
    [Symbol.iterator]: () => copy[Symbol.iterator](),
  };
  return Object.freeze(view);
};

type NamedDeclaration = TypeDeclaration | EnumDeclaration;

const collectNamed = (
  declarations: readonly TopLevelDeclaration[]
): readonly NamedDeclaration[] =>
  declarations.flatMap((declaration) =>
    declaration.kind === "namespace"
      ? collectNamed(declaration.declarations)
      : [declaration]
  );

const disambiguate = (
  declaration: NamedDeclaration,
  isTaken: (key: string) => boolean
): QualifiedName => {
  for (let suffix = 2; ; suffix++) {
    const candidate = withSimpleName(
      declaration.name,
      `${declaration.name.simpleName}_${suffix}`
    );
    if (!isTaken(qualifiedNameKey(candidate))) {
      return candidate;
    }
  }
};

type Registry = {
  readonly entries: Map<string, SymbolEntry>;
  readonly order: string[];
  readonly enumerations: Map<string, EnumEntry>;
  readonly collisions: Map<string, NameCollision>;
};

/**
 * Register every type and enumeration; later duplicates get `_2`, `_3`, ...
 */
const registerDeclarations = (units: readonly SourceUnit[]): Registry => {
  const entries = new Map<string, SymbolEntry>();
  const order: string[] = [];
  const enumerations = new Map<string, EnumEntry>();
  const collisions = new Map<string, NameCollision>();
  const firstLocations = new Map<string, SourceLocation>();
  let ordinal = 0;

  for (const unit of units) {
    for (const declaration of collectNamed(unit.declarations)) {
      const sourceKey = qualifiedNameKey(declaration.name);
      let name = declaration.name;
      let key = sourceKey;

      const firstLocation = firstLocations.get(sourceKey);
      if (firstLocation) {
        name = disambiguate(declaration, (candidate) =>
          firstLocations.has(candidate)
        );
        key = qualifiedNameKey(name);
        collisions.set(key, {
          key,
          sourceKey,
          location: declaration.location,
          firstLocation,
        });
      }
      firstLocations.set(key, declaration.location);

      const common = {
        key,
        name,
        sourceName: declaration.name,
        unitFile: unit.file,
        ordinal: ordinal++,
      };
      if (declaration.kind === "enum") {
        enumerations.set(key, { ...common, declaration });
      } else {
        entries.set(key, { ...common, declaration });
        order.push(key);
      }
    }
  }

  return { entries, order, enumerations, collisions };
};

/**
 * Build the global type registry and inheritance graph.
 * Enumerations are registered alongside types but take no part in
 * inheritance.
 *
 * Unresolved bases are recorded and their edges dropped. A cycle is fatal.
 */
export const buildSymbolTable = (
  units: readonly SourceUnit[]
): Result<SymbolTable, Diagnostic> => {
  const { entries, order, enumerations, collisions } =
    registerDeclarations(units);

  const bases = new Map<string, readonly string[]>();
  const unresolvedBases = new Map<string, readonly UnresolvedBase[]>();

  for (const key of order) {
    const entry = entries.get(key);
    if (!entry) continue;

    const resolved: string[] = [];
    const unresolved: UnresolvedBase[] = [];

    for (const reference of entry.declaration.bases) {
      const baseKey = resolveReference(
        reference,
        entry.name.namespacePath,
        (candidate) => entries.has(candidate)
      );
      if (baseKey) {
        resolved.push(baseKey);
      } else {
        unresolved.push({
          derivedKey: key,
          reference,
          location: entry.declaration.location,
        });
      }
    }

    bases.set(key, Object.freeze(resolved));
    if (unresolved.length > 0) {
      unresolvedBases.set(key, Object.freeze(unresolved));
    }
  }

  const cycleCheck = checkInheritanceCycles(
    order,
    bases,
    (key) => entries.get(key)?.declaration.location
  );
  if (!cycleCheck.ok) {
    return cycleCheck;
  }

  return ok(
    Object.freeze({
      entries: freezeMap(entries),
      order: Object.freeze([...order]),
      enumerations: freezeMap(enumerations),
      bases: freezeMap(bases),
      unresolvedBases: freezeMap(unresolvedBases),
      collisions: freezeMap(collisions),
    })
  );
};
