/**
 * Symbol table type definitions
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type {
  EnumDeclaration,
  QualifiedName,
  TypeDeclaration,
} from "../source/types.js";

export type SymbolEntry = {
  /** Unique key (`A::B::Name`, disambiguated when the source name collided) */
  readonly key: string;
  readonly name: QualifiedName;
  /** Name as declared, before any disambiguation */
  readonly sourceName: QualifiedName;
  readonly declaration: TypeDeclaration;
  readonly unitFile: string;
  /** Position across all units, used for stable report ordering */
  readonly ordinal: number;
};

/**
 * An enumeration; shares the key space and ordinals with type entries
 */
export type EnumEntry = {
  readonly key: string;
  readonly name: QualifiedName;
  readonly sourceName: QualifiedName;
  readonly declaration: EnumDeclaration;
  readonly unitFile: string;
  readonly ordinal: number;
};

export type NameCollision = {
  readonly key: string;
  readonly sourceKey: string;
  readonly location: SourceLocation;
  readonly firstLocation: SourceLocation;
};

export type UnresolvedBase = {
  readonly derivedKey: string;
  readonly reference: string;
  readonly location: SourceLocation;
};

export type SymbolTable = {
  readonly entries: ReadonlyMap<string, SymbolEntry>; // Key to entry
  readonly order: readonly string[]; // Keys in declaration order
  readonly enumerations: ReadonlyMap<string, EnumEntry>; // In declaration order
  readonly bases: ReadonlyMap<string, readonly string[]>; // Key to resolved base keys
  readonly unresolvedBases: ReadonlyMap<string, readonly UnresolvedBase[]>;
  readonly collisions: ReadonlyMap<string, NameCollision>; // Disambiguated key to collision
};
