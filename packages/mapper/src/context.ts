/**
 * Per-type mapping context
 */

import {
  classifyMembers,
  qualifiedNamesEqual,
  type ClassifiedMember,
  type SourceParameter,
  type SymbolEntry,
  type SymbolTable,
  type TypeSpelling,
} from "@semport/frontend";
import { mapTypeSpelling, type TypeMappingContext } from "./type-mapping.js";
import type {
  MappingOptions,
  MappingOutcome,
  TargetMember,
  TargetParameter,
  TargetTypeRef,
} from "./types.js";

export type MappingContext = {
  readonly entry: SymbolEntry;
  readonly table: SymbolTable;
  readonly options: MappingOptions;
  readonly members: readonly ClassifiedMember[];
  readonly types: TypeMappingContext;
};

export const createMappingContext = (
  entry: SymbolEntry,
  table: SymbolTable,
  options: MappingOptions
): MappingContext => ({
  entry,
  table,
  options,
  members: classifyMembers(entry.declaration),
  types: { table, scope: entry.name.namespacePath },
});

/**
 * Outcome drafted for one classified member, before member naming
 */
export type MemberDraft = {
  readonly member: ClassifiedMember;
  readonly outcome: MappingOutcome<TargetMember>;
};

export const mapType = (
  context: MappingContext,
  spelling: TypeSpelling | undefined
): TargetTypeRef =>
  spelling === undefined
    ? { kind: "void" }
    : mapTypeSpelling(spelling, context.types);

export const mapParameters = (
  context: MappingContext,
  parameters: readonly SourceParameter[]
): readonly TargetParameter[] =>
  parameters.map((p) => ({ name: p.name, type: mapType(context, p.type) }));

/** Names of the type's instance fields, in declaration order */
export const instanceFieldNames = (context: MappingContext): readonly string[] =>
  context.members.flatMap((m) =>
    m.kind === "field" && !m.syntax.isStatic ? [m.syntax.name] : []
  );

export const isSelfType = (
  context: MappingContext,
  type: TargetTypeRef
): boolean =>
  type.kind === "declared" && qualifiedNamesEqual(type.name, context.entry.name);
