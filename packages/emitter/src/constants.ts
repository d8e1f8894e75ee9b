/**
 * Shared constants for the Java emitter
 */

/**
 * Generate standard file header for emitted Java files
 *
 * @param sourceFile - Source unit the declaration came from
 * @returns Multi-line header string with trailing newline
 */
export const generateFileHeader = (
  sourceFile: string,
  options: {
    readonly includeTimestamp?: boolean;
    readonly timestamp?: string;
  } = {}
): string => {
  const lines: string[] = [];

  lines.push(`// Mapped from: ${sourceFile}`);

  if (options.includeTimestamp ?? true) {
    const timestamp = options.timestamp ?? new Date().toISOString();
    lines.push(`// Mapped at: ${timestamp}`);
  }

  lines.push("// WARNING: Do not modify this file manually");
  lines.push("");

  return lines.join("\n");
};

/** Boxed counterparts used where Java needs a reference type */
export const BOXED_PRIMITIVES = {
  boolean: "Boolean",
  byte: "Byte",
  char: "Character",
  short: "Short",
  int: "Integer",
  long: "Long",
  float: "Float",
  double: "Double",
} as const;

export const OBJECTS = "java.util.Objects";
