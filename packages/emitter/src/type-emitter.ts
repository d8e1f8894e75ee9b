/**
 * Type Emitter - target type references to Java types
 */

import type { TargetTypeRef } from "@semport/mapper";
import { BOXED_PRIMITIVES } from "./constants.js";
import { renderTypeFQN } from "./emitter-types/index.js";
import type { EmitterContext } from "./types.js";

/** `java.lang.Object` → `Object`; other packages stay qualified */
const shortenLibraryName = (name: string): string =>
  /^java\.lang\.[A-Z]\w*$/.test(name) ? name.slice("java.lang.".length) : name;

/**
 * Emit a Java type from a target type reference
 */
export const emitType = (type: TargetTypeRef, context: EmitterContext): string => {
  switch (type.kind) {
    case "void":
      return "void";
    case "primitive":
      return type.name;
    case "string":
      return "String";
    case "array":
      return `${emitType(type.element, context)}[]`;
    case "declared":
      return renderTypeFQN(type.name, context.options);
    case "library": {
      const name = shortenLibraryName(type.name);
      if (type.typeArguments.length === 0) {
        return name;
      }
      const args = type.typeArguments.map((arg) => emitTypeArgument(arg, context));
      return `${name}<${args.join(", ")}>`;
    }
    case "unknown":
      // No counterpart; kept reachable as a plain reference
      return "Object";
  }
};

/**
 * Emit a type in type-argument position, boxing primitives
 */
export const emitTypeArgument = (
  type: TargetTypeRef,
  context: EmitterContext
): string => {
  switch (type.kind) {
    case "primitive":
      return BOXED_PRIMITIVES[type.name];
    case "void":
      return "Void";
    default:
      return emitType(type, context);
  }
};

/**
 * Whether a value of this type may hold an `AutoCloseable`
 */
export const mayBeCloseable = (type: TargetTypeRef): boolean =>
  type.kind === "declared" || type.kind === "library" || type.kind === "unknown";
