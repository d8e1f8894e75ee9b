/**
 * Context creation and manipulation functions
 */

import type { TargetDeclaration } from "@semport/mapper";
import type { EmitterContext, EmitterOptions } from "./core.js";

export const createContext = (options: EmitterOptions = {}): EmitterContext => ({
  indentLevel: 0,
  options,
});

/**
 * Increase indentation level
 */
export const indent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: context.indentLevel + 1,
});

/**
 * Decrease indentation level
 */
export const dedent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: Math.max(0, context.indentLevel - 1),
});

export const withDeclaration = (
  context: EmitterContext,
  declaration: TargetDeclaration
): EmitterContext => ({
  ...context,
  declaration,
});

/**
 * Get indentation string for current level
 */
export const getIndent = (context: EmitterContext): string => {
  const spaces = context.options.indent ?? 4;
  return " ".repeat(spaces * context.indentLevel);
};

/**
 * Indent each line at the current level; blank lines stay empty
 */
export const indentLines = (
  lines: readonly string[],
  context: EmitterContext
): string[] => {
  const prefix = getIndent(context);
  return lines.map((line) => (line === "" ? "" : `${prefix}${line}`));
};
