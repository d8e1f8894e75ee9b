/**
 * Construct classifier - assigns each member exactly one construct kind
 * from its static shape
 */

import type { FunctionSyntax, TypeDeclaration } from "../source/types.js";
import { parseOperatorName } from "./operators.js";
import type { ClassifiedMember } from "./types.js";

const DESTRUCTOR_MARKER = "~";

const classifyFunction = (
  syntax: FunctionSyntax,
  memberIndex: number,
  typeName: string
): ClassifiedMember => {
  if (
    syntax.name === `${DESTRUCTOR_MARKER}${typeName}` &&
    syntax.parameters.length === 0
  ) {
    return { kind: "destructor", memberIndex, syntax };
  }

  if (syntax.returnType === undefined && syntax.name === typeName) {
    return { kind: "constructor", memberIndex, syntax };
  }

  const operator = parseOperatorName(syntax.name);
  if (operator) {
    return {
      kind: "operatorOverload",
      memberIndex,
      syntax,
      token: operator.token,
      isConversion: operator.isConversion,
    };
  }

  if (syntax.isPureVirtual && !syntax.hasBody) {
    return { kind: "abstractMethod", memberIndex, syntax };
  }

  return { kind: "method", memberIndex, syntax };
};

/**
 * Classify all members of a type declaration
 */
export const classifyMembers = (
  declaration: TypeDeclaration
): readonly ClassifiedMember[] =>
  declaration.members.map((member, memberIndex): ClassifiedMember =>
    member.kind === "field"
      ? { kind: "field", memberIndex, syntax: member }
      : classifyFunction(member, memberIndex, declaration.name.simpleName)
  );
