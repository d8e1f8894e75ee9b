/**
 * Enum Emitter - one target enumeration to one Java enum
 */

import type { TargetEnum } from "@semport/mapper";
import {
  escapeJavaIdentifier,
  renderSimpleName,
} from "./emitter-types/index.js";
import { indent, indentLines, type EmitterContext } from "./types.js";

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

/**
 * `int` unless a value needs more than 32 bits
 */
const valueType = (enumeration: TargetEnum): "int" | "long" =>
  enumeration.constants.every((c) => c.value >= INT_MIN && c.value <= INT_MAX)
    ? "int"
    : "long";

/**
 * Constants first; with a value field, the field, its constructor and
 * `getValue()` follow
 */
export const emitEnumeration = (
  enumeration: TargetEnum,
  context: EmitterContext
): string[] => {
  const name = renderSimpleName(enumeration.name);
  const type = valueType(enumeration);
  const field =
    enumeration.valueField === undefined
      ? undefined
      : escapeJavaIdentifier(enumeration.valueField);
  const last = enumeration.constants.length - 1;

  const constants = enumeration.constants.map((constant, i) => {
    const argument =
      field === undefined
        ? ""
        : `(${constant.value}${type === "long" ? "L" : ""})`;
    const terminator = i < last ? "," : field === undefined ? "" : ";";
    return `${escapeJavaIdentifier(constant.name)}${argument}${terminator}`;
  });

  const nested = indent({ ...context, indentLevel: 0 });
  const body =
    field === undefined
      ? constants
      : [
          ...constants,
          "",
          `private final ${type} ${field};`,
          "",
          `${name}(${type} ${field}) {`,
          ...indentLines([`this.${field} = ${field};`], nested),
          "}",
          "",
          `public ${type} getValue() {`,
          ...indentLines([`return ${field};`], nested),
          "}",
        ];

  return [`public enum ${name} {`, ...indentLines(body, indent(context)), "}"];
};
