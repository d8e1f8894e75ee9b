/**
 * Operator Desugaring Mapper
 *
 * Rewrites operator overloads into named methods following the
 * correspondence table; equality always travels with a hash over the same
 * fields. A type gets at most one equals/hashCode pair and one compareTo.
 */

import type { ClassifiedOperator, SourceParameter } from "@semport/frontend";
import {
  instanceFieldNames,
  isSelfType,
  mapParameters,
  mapType,
  type MappingContext,
  type MemberDraft,
} from "../context.js";
import { bestEffort, mapped, unmappable } from "../outcome.js";
import type {
  ArithmeticOperation,
  Capability,
  MappingNote,
  TargetMember,
  TargetMethod,
  TargetTypeRef,
} from "../types.js";
import { lookupOperator, type OperatorEntry } from "./table.js";

/** An operator read through its table entry */
type OperatorUse = {
  readonly member: ClassifiedOperator;
  readonly entry: OperatorEntry;
  /** Parameters after the receiver */
  readonly parameters: readonly SourceParameter[];
};

export type OperatorPlan = {
  readonly drafts: readonly MemberDraft[];
  readonly capabilities: readonly Capability[];
};

const OBJECT_TYPE: TargetTypeRef = {
  kind: "library",
  name: "java.lang.Object",
  typeArguments: [],
};

const synthesizedMethod = (
  fields: Omit<TargetMethod, "kind" | "isAbstract" | "isStatic" | "origin">
): TargetMethod => ({
  kind: "method",
  isAbstract: false,
  isStatic: false,
  origin: "synthesized",
  ...fields,
});

/** Fields an operator body compares, restricted to instance fields */
const comparedFields = (
  context: MappingContext,
  member: ClassifiedOperator
): readonly string[] => {
  const known = new Set(instanceFieldNames(context));
  return [...new Set(member.syntax.reads.filter((f) => known.has(f)))];
};

const equalityPair = (fields: readonly string[]): TargetMember[] => [
  synthesizedMethod({
    name: "equals",
    parameters: [{ name: "other", type: OBJECT_TYPE }],
    returnType: { kind: "primitive", name: "boolean" },
    isOverride: true,
    body: { kind: "equals", fields },
  }),
  synthesizedMethod({
    name: "hashCode",
    parameters: [],
    returnType: { kind: "primitive", name: "int" },
    isOverride: true,
    body: { kind: "hash", fields },
  }),
];

const partialEqualityNote = (
  context: MappingContext,
  member: ClassifiedOperator,
  fields: readonly string[]
): MappingNote[] => {
  const all = instanceFieldNames(context);
  const ignored = all.filter((f) => !fields.includes(f));
  if (ignored.length === 0) {
    return [];
  }
  return [
    {
      code: "SPM4002",
      message: `'${member.syntax.name}' compares ${
        fields.length === 0 ? "no fields" : fields.join(", ")
      } and ignores ${ignored.join(", ")}; hashCode uses the same fields`,
    },
  ];
};

const takesSelf = (
  context: MappingContext,
  parameter: SourceParameter | undefined
): boolean =>
  parameter !== undefined && isSelfType(context, mapType(context, parameter.type));

/**
 * Match an operator against the table. Member operators are tried first;
 * static operators and those with one parameter too many for the member
 * form are read as non-member operators whose first parameter is the
 * declaring type.
 */
const resolveOperator = (
  context: MappingContext,
  member: ClassifiedOperator
): OperatorUse | undefined => {
  if (member.isConversion) {
    return undefined;
  }
  const { parameters, isStatic } = member.syntax;
  const memberEntry = isStatic
    ? undefined
    : lookupOperator(member.token, parameters.length);
  if (memberEntry) {
    return { member, entry: memberEntry, parameters };
  }
  const [receiver, ...rest] = parameters;
  const nonMemberEntry = lookupOperator(
    member.token,
    parameters.length,
    "nonMember"
  );
  return nonMemberEntry && takesSelf(context, receiver)
    ? { member, entry: nonMemberEntry, parameters: rest }
    : undefined;
};

const mapEquality = (
  context: MappingContext,
  member: ClassifiedOperator
): MemberDraft => {
  const fields = comparedFields(context, member);
  return {
    member,
    outcome: bestEffort(
      equalityPair(fields),
      partialEqualityNote(context, member, fields)
    ),
  };
};

const mapInequality = (
  context: MappingContext,
  member: ClassifiedOperator
): MemberDraft => {
  const fields = comparedFields(context, member);
  return {
    member,
    outcome: bestEffort(equalityPair(fields), [
      {
        code: "SPM4003",
        message: `'${member.syntax.name}' has no matching operator==; equals and hashCode were derived from it`,
      },
      ...partialEqualityNote(context, member, fields),
    ]),
  };
};

/**
 * Settle every equality and inequality operator of a type. The first
 * self-typed `==` (or, lacking one, the first self-typed `!=`) yields the
 * only equals/hashCode pair.
 */
const mapEqualities = (
  context: MappingContext,
  uses: readonly OperatorUse[]
): MemberDraft[] => {
  const selfTyped = uses.filter((u) => takesSelf(context, u.parameters[0]));
  const primary =
    selfTyped.find((u) => u.entry.family === "equality") ?? selfTyped[0];

  return uses.map((use): MemberDraft => {
    const { member } = use;
    if (!selfTyped.includes(use)) {
      const [operand] = use.parameters;
      return {
        member,
        outcome: unmappable("operator-not-representable", {
          code: "SPM4001",
          message: `'${member.syntax.name}' compares against ${
            operand?.type ?? "nothing"
          }; equals(Object) only compares instances of the same type`,
          hint: "Replace the operator with a named method in the source",
        }),
      };
    }
    if (use === primary) {
      return use.entry.family === "equality"
        ? mapEquality(context, member)
        : mapInequality(context, member);
    }
    if (
      use.entry.family === "inequality" &&
      primary?.entry.family === "equality"
    ) {
      return { member, outcome: mapped([]) };
    }
    return {
      member,
      outcome: bestEffort<TargetMember>(
        [],
        [
          {
            code: "SPM4004",
            message: `'${member.syntax.name}' is folded into the equals and hashCode derived from an earlier '${
              primary?.member.syntax.name ?? "operator=="
            }'`,
          },
        ]
      ),
    };
  });
};

const mapComparison = (
  context: MappingContext,
  use: OperatorUse
): MemberDraft => {
  const { member } = use;
  const [operand] = mapParameters(context, use.parameters);
  const target = synthesizedMethod({
    name: "compareTo",
    parameters: operand ? [{ name: "other", type: operand.type }] : [],
    returnType: { kind: "primitive", name: "int" },
    isOverride: false,
    body: { kind: "compare", fields: comparedFields(context, member) },
  });
  return { member, outcome: mapped([target]) };
};

/**
 * The first self-typed comparison (or the first comparison) yields the
 * single compareTo; the others are covered by it
 */
const mapComparisons = (
  context: MappingContext,
  uses: readonly OperatorUse[]
): { drafts: MemberDraft[]; comparable: boolean } => {
  const primary =
    uses.find((u) => takesSelf(context, u.parameters[0])) ?? uses[0];
  return {
    drafts: uses.map((use) =>
      use === primary
        ? mapComparison(context, use)
        : { member: use.member, outcome: mapped([]) }
    ),
    comparable:
      primary !== undefined && takesSelf(context, primary.parameters[0]),
  };
};

const mapArithmetic = (
  context: MappingContext,
  use: OperatorUse,
  operation: ArithmeticOperation
): MemberDraft => {
  const { member } = use;
  const parameters = mapParameters(context, use.parameters);
  const returnType = mapType(context, member.syntax.returnType);
  const [operand] = parameters;
  const read = comparedFields(context, member);

  const body: TargetMethod["body"] = isSelfType(context, returnType)
    ? {
        kind: "arithmetic",
        operation,
        // A body summary without reads combines every instance field
        fields: read.length > 0 ? read : instanceFieldNames(context),
        operand:
          operand === undefined
            ? "none"
            : isSelfType(context, operand.type)
              ? "instance"
              : "scalar",
      }
    : member.syntax.body === undefined
      ? { kind: "source" }
      : { kind: "source", text: member.syntax.body };

  return {
    member,
    outcome: mapped([
      synthesizedMethod({
        name: operation,
        parameters,
        returnType,
        isOverride: false,
        body,
      }),
    ]),
  };
};

const notRepresentable = (member: ClassifiedOperator): MemberDraft => ({
  member,
  outcome: unmappable("operator-not-representable", {
    code: "SPM4001",
    message: member.isConversion
      ? `conversion '${member.syntax.name}' has no named-method equivalent`
      : `'operator${member.token}' with ${member.syntax.parameters.length} parameter(s) has no named-method equivalent`,
    hint: "Replace the operator with a named method in the source",
  }),
});

/**
 * Plan operator desugaring for one type
 */
export const planOperators = (context: MappingContext): OperatorPlan => {
  const operators = context.members.flatMap((m) =>
    m.kind === "operatorOverload" ? [m] : []
  );
  const uses = operators.flatMap((member) => {
    const use = resolveOperator(context, member);
    return use ? [use] : [];
  });
  const inFamily = (...families: OperatorEntry["family"][]): OperatorUse[] =>
    uses.filter((u) => families.includes(u.entry.family));

  const comparisons = mapComparisons(context, inFamily("comparison"));
  const settled = [
    ...mapEqualities(context, inFamily("equality", "inequality")),
    ...comparisons.drafts,
    ...uses.flatMap((use) =>
      use.entry.family === "arithmetic"
        ? [mapArithmetic(context, use, use.entry.operation)]
        : []
    ),
  ];
  const draftFor = new Map(settled.map((d) => [d.member, d]));

  return {
    drafts: operators.map(
      (member) => draftFor.get(member) ?? notRepresentable(member)
    ),
    capabilities: comparisons.comparable ? ["comparable"] : [],
  };
};
