/**
 * Semantic Mapping Engine
 *
 * Builds the symbol table, maps every type declaration and enumeration
 * against the frozen table, and aggregates the outcomes.
 */

import {
  buildSymbolTable,
  getEntriesInOrder,
  getEnumerationsInOrder,
  error,
  ok,
  type Diagnostic,
  type Result,
  type SourceUnit,
  type SymbolEntry,
  type SymbolTable,
} from "@semport/frontend";
import {
  mapTypeDeclaration,
  typeConstructRef,
  type TypeMapping,
} from "./declaration.js";
import { mapEnumDeclaration } from "./enumeration.js";
import {
  aggregateDiagnostics,
  type DiagnosticsReport,
} from "./diagnostics/aggregator.js";
import { unmappable } from "./outcome.js";
import {
  DEFAULT_MAPPING_OPTIONS,
  type MappingOptions,
  type MappingResult,
  type TargetDeclaration,
  type TargetEnum,
} from "./types.js";

export type MappingRun = {
  readonly table: SymbolTable;
  /** Declarations of every type that is not unmappable, in declaration order */
  readonly declarations: readonly TargetDeclaration[];
  /** Every enumeration, in declaration order */
  readonly enumerations: readonly TargetEnum[];
  readonly results: readonly MappingResult[];
  readonly report: DiagnosticsReport;
};

export const resolveMappingOptions = (
  options: Partial<MappingOptions> = {}
): MappingOptions => ({ ...DEFAULT_MAPPING_OPTIONS, ...options });

/**
 * Map one entry; an exception is contained to its own type
 */
const mapEntryIsolated = (
  entry: SymbolEntry,
  table: SymbolTable,
  options: MappingOptions
): TypeMapping => {
  try {
    return mapTypeDeclaration(entry, table, options);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return {
      type: {
        construct: typeConstructRef(entry),
        outcome: unmappable("internal-error", {
          code: "SPM6001",
          message: `mapping failed: ${message}`,
        }),
      },
      members: [],
    };
  }
};

/**
 * Map the entries of a built symbol table, then its enumerations. Entries
 * are mapped in the order given; results do not depend on it.
 */
export const mapSymbolTable = (
  table: SymbolTable,
  options: Partial<MappingOptions> = {},
  entries: readonly SymbolEntry[] = getEntriesInOrder(table)
): MappingRun => {
  const resolved = resolveMappingOptions(options);
  const mappings = entries
    .map((entry) => mapEntryIsolated(entry, table, resolved))
    .sort((a, b) => a.type.construct.typeOrdinal - b.type.construct.typeOrdinal);

  const enumMappings = getEnumerationsInOrder(table).map((entry) =>
    mapEnumDeclaration(entry, table)
  );

  const results = [
    ...mappings.flatMap((m): MappingResult[] => [m.type, ...m.members]),
    ...enumMappings.map((m) => m.result),
  ].sort((a, b) => a.construct.typeOrdinal - b.construct.typeOrdinal);

  return {
    table,
    declarations: mappings.flatMap((m) =>
      m.declaration ? [m.declaration] : []
    ),
    enumerations: enumMappings.flatMap((m) =>
      m.enumeration ? [m.enumeration] : []
    ),
    results,
    report: aggregateDiagnostics(results),
  };
};

/**
 * Run the whole engine over a set of source units. An inheritance cycle is
 * fatal and returned as the error.
 */
export const mapSourceUnits = (
  units: readonly SourceUnit[],
  options: Partial<MappingOptions> = {}
): Result<MappingRun, Diagnostic> => {
  const table = buildSymbolTable(units);
  if (!table.ok) {
    return error(table.error);
  }
  return ok(mapSymbolTable(table.value, options));
};
