/**
 * semport frontend - source model, symbol table and construct classifier
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type ConstructKind,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  formatLocation,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export type * from "./source/types.js";
export * from "./source/qualified-name.js";
export * from "./source/builders.js";
export { parseSourceDocument, loadSourceUnit } from "./source/document.js";

export * from "./symbol-table/index.js";
export * from "./classifier/index.js";
