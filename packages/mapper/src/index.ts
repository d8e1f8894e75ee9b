/**
 * semport mapper - lifecycle, dispatch and operator mapping of C++ types
 * and enumerations into managed-language target declarations
 */

export type * from "./types.js";
export { DEFAULT_MAPPING_OPTIONS } from "./types.js";

export {
  mapped,
  bestEffort,
  unmappable,
  outcomeTargets,
  createOutcomeLedger,
  type ConstructState,
  type OutcomeLedger,
} from "./outcome.js";

export { mapTypeSpelling, typeRefKey } from "./type-mapping.js";
export { deriveTargetKind } from "./dispatch/shape.js";
export { decideOwnership, releaseOrderFor } from "./lifecycle/mapper.js";
export { OPERATOR_TABLE, lookupOperator } from "./operators/table.js";
export { resolveMemberNames, memberSignature } from "./naming.js";
export { mapTypeDeclaration, type TypeMapping } from "./declaration.js";
export {
  mapEnumDeclaration,
  enumeratorValues,
  type EnumMapping,
} from "./enumeration.js";
export {
  aggregateDiagnostics,
  withLeadingDiagnostics,
  type DiagnosticsReport,
  type OutcomeCounts,
} from "./diagnostics/aggregator.js";
export {
  mapSourceUnits,
  mapSymbolTable,
  resolveMappingOptions,
  type MappingRun,
} from "./engine.js";
