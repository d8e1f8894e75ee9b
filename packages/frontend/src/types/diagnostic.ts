/**
 * Diagnostic types for the semport mapping engine
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "SPM1001" // Inheritance cycle
  | "SPM1002" // Unresolved base type
  | "SPM1003" // Duplicate qualified type name
  | "SPM1004" // Invalid source document
  | "SPM2001" // Destructor without a detected resource
  | "SPM2002" // Destructor without a constructor
  | "SPM2003" // Ambiguous resource ownership
  | "SPM2004" // Release order normalized to reverse acquisition
  | "SPM3001" // Inherited abstract method not overridden
  | "SPM3002" // Multiple inheritance of implementation
  | "SPM3003" // Override without `override` marker
  | "SPM3004" // Override target not found
  | "SPM3005" // Class base without implementation dropped
  | "SPM4001" // Operator not representable
  | "SPM4002" // Equality compares a subset of fields
  | "SPM4003" // Equality derived from inequality operator
  | "SPM4004" // Further equality operator folded into equals
  | "SPM5001" // Synthesized member name collision
  | "SPM5002" // Enumerators sharing a value become distinct constants
  | "SPM6001"; // Internal error

/**
 * Kind of construct a diagnostic or outcome refers to
 */
export type ConstructKind =
  | "type"
  | "enum"
  | "field"
  | "constructor"
  | "destructor"
  | "method"
  | "abstractMethod"
  | "operatorOverload";

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly constructKind?: ConstructKind;
  readonly hint?: string;
  readonly relatedLocations?: readonly SourceLocation[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  constructKind?: ConstructKind,
  hint?: string,
  relatedLocations?: readonly SourceLocation[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  constructKind,
  hint,
  relatedLocations,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatLocation = (location: SourceLocation): string =>
  `${location.file}:${location.line}:${location.column}`;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(formatLocation(diagnostic.location));
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (
  diagnostics: readonly Diagnostic[] = []
): DiagnosticsCollector => ({
  diagnostics,
  hasErrors: diagnostics.some(isError),
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});
