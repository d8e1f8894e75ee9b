/**
 * Inheritance cycle detection
 */

import { Diagnostic, SourceLocation, createDiagnostic } from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";

/**
 * Check resolved base edges for cycles using depth-first search.
 * Roots are visited in `order` so the reported cycle is deterministic.
 */
export const checkInheritanceCycles = (
  order: readonly string[],
  bases: ReadonlyMap<string, readonly string[]>,
  locationOf: (key: string) => SourceLocation | undefined
): Result<void, Diagnostic> => {
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (key: string): readonly string[] | null => {
    if (onStack.has(key)) {
      return [...stack.slice(stack.indexOf(key)), key]; // Found cycle
    }

    if (visited.has(key)) {
      return null; // Already checked
    }

    visited.add(key);
    stack.push(key);
    onStack.add(key);

    for (const base of bases.get(key) ?? []) {
      const cycle = visit(base);
      if (cycle) {
        return cycle;
      }
    }

    stack.pop();
    onStack.delete(key);
    return null;
  };

  for (const key of order) {
    const cycle = visit(key);
    if (cycle) {
      const start = cycle[0] ?? key;
      return error(
        createDiagnostic(
          "SPM1001",
          "error",
          `Inheritance cycle detected: ${cycle.join(" -> ")}`,
          locationOf(start),
          "type",
          "A type cannot inherit from itself, directly or through its bases"
        )
      );
    }
  }

  return ok(undefined);
};
