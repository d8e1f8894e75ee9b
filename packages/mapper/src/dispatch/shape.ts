/**
 * Type shape analysis shared by the dispatch checks
 */

import {
  classifyMembers,
  getBaseEntries,
  type ClassifiedMember,
  type SymbolEntry,
  type SymbolTable,
  type FunctionSyntax,
} from "@semport/frontend";
import type { TargetKind } from "../types.js";

/** `name/arity`, the unit of override matching */
export const methodSignature = (syntax: FunctionSyntax): string =>
  `${syntax.name}/${syntax.parameters.length}`;

const bearsImplementation = (member: ClassifiedMember): boolean => {
  switch (member.kind) {
    case "abstractMethod":
      return false;
    case "destructor":
      return !member.syntax.isDefaulted;
    default:
      return true;
  }
};

export const declaresAbstractMethods = (
  members: readonly ClassifiedMember[]
): boolean => members.some((m) => m.kind === "abstractMethod");

/**
 * Target kind of a symbol table entry. Depends only on the frozen table,
 * so every worker derives the same answer for a base.
 */
export const deriveTargetKind = (
  entry: SymbolEntry,
  table: SymbolTable
): TargetKind => {
  const members = classifyMembers(entry.declaration);
  const isAbstract =
    declaresAbstractMethods(members) || entry.declaration.isAbstract;

  if (!isAbstract) {
    return "concreteClass";
  }

  const onlyInterfaceBases = getBaseEntries(table, entry.key).every(
    (base) => deriveTargetKind(base, table) === "interface"
  );

  return !members.some(bearsImplementation) && onlyInterfaceBases
    ? "interface"
    : "abstractClass";
};

/**
 * Whether a type or its implementation chain declares state or behaviour.
 * Empty and abstract-only types carry none.
 */
export const carriesImplementation = (
  entry: SymbolEntry,
  table: SymbolTable
): boolean =>
  classifyMembers(entry.declaration).some(bearsImplementation) ||
  getBaseEntries(table, entry.key).some(
    (base) =>
      deriveTargetKind(base, table) !== "interface" &&
      carriesImplementation(base, table)
  );

export type BaseRoles = {
  /** The class base the target extends */
  readonly superclass?: SymbolEntry;
  readonly interfaces: readonly SymbolEntry[];
  /** Class bases carrying implementation; more than one cannot be mapped */
  readonly implementationBases: readonly SymbolEntry[];
  /** Class bases without implementation left out of the target hierarchy */
  readonly dropped: readonly SymbolEntry[];
};

/**
 * Split a type's resolved bases into the extended class, the implemented
 * interfaces, and class bases that carry nothing and are dropped
 */
export const classifyBases = (
  entry: SymbolEntry,
  table: SymbolTable
): BaseRoles => {
  const bases = getBaseEntries(table, entry.key);
  const interfaces = bases.filter(
    (base) => deriveTargetKind(base, table) === "interface"
  );
  const classBases = bases.filter((base) => !interfaces.includes(base));
  const implementationBases = classBases.filter((base) =>
    carriesImplementation(base, table)
  );
  const superclass = implementationBases[0] ?? classBases[0];
  return {
    ...(superclass ? { superclass } : {}),
    interfaces,
    implementationBases,
    dropped: classBases.filter(
      (base) => base !== superclass && !implementationBases.includes(base)
    ),
  };
};

export type PendingAbstract = {
  readonly signature: string;
  readonly declaredIn: string;
};

const concreteSignatures = (
  members: readonly ClassifiedMember[]
): ReadonlySet<string> =>
  new Set(
    members.flatMap((m) =>
      m.kind === "method" ? [methodSignature(m.syntax)] : []
    )
  );

/**
 * Abstract methods still unimplemented at the end of `entry`'s chain
 */
export const unimplementedAbstracts = (
  entry: SymbolEntry,
  table: SymbolTable
): readonly PendingAbstract[] => {
  const members = classifyMembers(entry.declaration);
  const implemented = concreteSignatures(members);

  const inherited = getBaseEntries(table, entry.key)
    .flatMap((base) => unimplementedAbstracts(base, table))
    .filter((pending) => !implemented.has(pending.signature));

  const own = members.flatMap((m) =>
    m.kind === "abstractMethod"
      ? [{ signature: methodSignature(m.syntax), declaredIn: entry.key }]
      : []
  );

  const seen = new Set<string>();
  return [...inherited, ...own].filter((pending) => {
    if (seen.has(pending.signature)) return false;
    seen.add(pending.signature);
    return true;
  });
};

/**
 * Every method signature declared anywhere above `entry`
 */
export const ancestorSignatures = (
  entry: SymbolEntry,
  table: SymbolTable
): ReadonlySet<string> => {
  const signatures = new Set<string>();
  const visit = (current: SymbolEntry): void => {
    for (const base of getBaseEntries(table, current.key)) {
      for (const member of classifyMembers(base.declaration)) {
        if (member.kind === "method" || member.kind === "abstractMethod") {
          signatures.add(methodSignature(member.syntax));
        }
      }
      visit(base);
    }
  };
  visit(entry);
  return signatures;
};
