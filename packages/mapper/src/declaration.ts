/**
 * Declaration assembly
 *
 * Runs the three mappers over one type, settles every construct in the
 * outcome ledger, and assembles the target declaration.
 */

import type {
  ClassifiedMember,
  ConstructKind,
  SymbolEntry,
  SymbolTable,
} from "@semport/frontend";
import { createMappingContext } from "./context.js";
import { planDispatch } from "./dispatch/mapper.js";
import { planLifecycle } from "./lifecycle/mapper.js";
import { resolveMemberNames } from "./naming.js";
import { planOperators } from "./operators/mapper.js";
import {
  bestEffort,
  createOutcomeLedger,
  outcomeTargets,
  unmappable,
} from "./outcome.js";
import type {
  Capability,
  ConstructRef,
  MappingOptions,
  MappingOutcome,
  MappingResult,
  MemberMappingResult,
  TargetDeclaration,
  TargetMember,
  TypeMappingResult,
} from "./types.js";

export type TypeMapping = {
  readonly type: TypeMappingResult;
  /** One result per member, in member order */
  readonly members: readonly MemberMappingResult[];
  /** Present unless the type is unmappable */
  readonly declaration?: TargetDeclaration;
};

export const typeConstructRef = (entry: SymbolEntry): ConstructRef => ({
  typeKey: entry.key,
  typeOrdinal: entry.ordinal,
  constructKind: "type",
  name: entry.key,
  location: entry.declaration.location,
});

const memberConstructRef = (
  entry: SymbolEntry,
  member: ClassifiedMember
): ConstructRef => {
  const constructKind: ConstructKind = member.kind;
  return {
    typeKey: entry.key,
    typeOrdinal: entry.ordinal,
    memberIndex: member.memberIndex,
    constructKind,
    name: `${entry.key}::${member.syntax.name}`,
    location: member.syntax.location,
  };
};

const MEMBER_ORDER: Readonly<Record<TargetMember["kind"], number>> = {
  field: 0,
  constructor: 1,
  method: 2,
};

const isSynthesizedField = (member: TargetMember): boolean =>
  member.kind === "field" && member.origin === "synthesized";

/**
 * Fields first (source before synthesized), then constructors, then methods,
 * each group in member order
 */
const orderMembers = (
  members: readonly TargetMember[]
): readonly TargetMember[] =>
  members
    .map((member, position) => ({ member, position }))
    .sort((a, b) => {
      const byKind = MEMBER_ORDER[a.member.kind] - MEMBER_ORDER[b.member.kind];
      if (byKind !== 0) return byKind;
      const aSynth = isSynthesizedField(a.member);
      const bSynth = isSynthesizedField(b.member);
      if (aSynth !== bSynth) return aSynth ? 1 : -1;
      return a.position - b.position;
    })
    .map(({ member }) => member);

/**
 * Map one type declaration. A pure function of its arguments.
 */
export const mapTypeDeclaration = (
  entry: SymbolEntry,
  table: SymbolTable,
  options: MappingOptions
): TypeMapping => {
  const ledger = createOutcomeLedger();
  const context = createMappingContext(entry, table, options);
  const typeRef = typeConstructRef(entry);

  ledger.classify(typeRef);
  for (const member of context.members) {
    ledger.classify(memberConstructRef(entry, member));
  }

  const dispatch = planDispatch(context);
  const lifecycle = planLifecycle(context, dispatch.superClassKey);
  const operators = planOperators(context);

  const drafts = resolveMemberNames(
    [...lifecycle.drafts, ...dispatch.methods, ...operators.drafts].sort(
      (a, b) => a.member.memberIndex - b.member.memberIndex
    )
  );

  const members = drafts.map((draft): MemberMappingResult => {
    const ref = memberConstructRef(entry, draft.member);
    ledger.settle(ref, draft.outcome);
    return { construct: ref, outcome: draft.outcome };
  });

  const capabilities: Capability[] = [
    ...lifecycle.capabilities,
    ...operators.capabilities,
  ];

  const [failure, ...furtherFailures] = [
    ...dispatch.failures,
    ...(lifecycle.failure ? [lifecycle.failure] : []),
  ];
  const outcome: MappingOutcome<TargetDeclaration> = failure
    ? unmappable(
        failure.reason,
        failure.note,
        furtherFailures.map((f) => f.note)
      )
    : bestEffort(
        [
          {
            name: entry.name,
            sourceName: entry.sourceName,
            kind: dispatch.kind,
            ...(dispatch.superClass ? { superClass: dispatch.superClass } : {}),
            interfaces: dispatch.interfaces,
            capabilities,
            members: orderMembers(
              drafts.flatMap((draft) => outcomeTargets(draft.outcome))
            ),
            location: entry.declaration.location,
          },
        ],
        dispatch.typeNotes
      );
  ledger.settle(typeRef, outcome);

  const [declaration] = outcomeTargets(outcome);
  return {
    type: { construct: typeRef, outcome },
    members,
    ...(declaration ? { declaration } : {}),
  };
};

/** Type result first, then member results */
export const typeMappingResults = (
  mapping: TypeMapping
): readonly MappingResult[] => [mapping.type, ...mapping.members];
