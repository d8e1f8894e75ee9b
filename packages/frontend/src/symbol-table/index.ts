/**
 * Symbol table - Public API
 */

export type {
  SymbolEntry,
  EnumEntry,
  SymbolTable,
  NameCollision,
  UnresolvedBase,
} from "./types.js";
export { buildSymbolTable } from "./builder.js";
export {
  lookupType,
  lookupEnumeration,
  resolveTypeReference,
  resolveDeclaredName,
  getBaseEntries,
  getEntriesInOrder,
  getEnumerationsInOrder,
} from "./queries.js";
export { checkInheritanceCycles } from "./inheritance.js";
export { candidateKeys, resolveReference } from "./resolution.js";
