/**
 * Resource Lifecycle Mapper
 *
 * Deterministic destruction becomes an explicit, idempotent release method.
 * Constructors keep their acquisition order and the release method walks it
 * backwards.
 */

import {
  lookupType,
  classifyMembers,
  type ClassifiedConstructor,
  type ClassifiedDestructor,
  type ClassifiedField,
  type ClassifiedMember,
  type SymbolEntry,
  type SymbolTable,
} from "@semport/frontend";
import {
  mapParameters,
  mapType,
  type MappingContext,
  type MemberDraft,
} from "../context.js";
import { classifyBases } from "../dispatch/shape.js";
import { bestEffort, mapped, unmappable } from "../outcome.js";
import type {
  Capability,
  MappingNote,
  TargetField,
  TargetMember,
  TargetMethod,
  TypeFailure,
} from "../types.js";

export type Ownership = {
  readonly field: string;
  readonly owned: boolean;
  /** Released by the synthesized release method */
  readonly released: boolean;
  readonly note?: MappingNote;
};

export type LifecyclePlan = {
  /** Drafts for fields, constructors and destructors */
  readonly drafts: readonly MemberDraft[];
  /** Resources in release order */
  readonly releaseOrder: readonly string[];
  readonly capabilities: readonly Capability[];
  /** Set when the type's destructor has no acquisition point */
  readonly failure?: TypeFailure;
};

const ACQUISITION_POINT_UNKNOWN = "acquisition-point-unknown";

const acquisitionOrder = (
  constructors: readonly ClassifiedConstructor[]
): readonly string[] => [
  ...new Set(constructors.flatMap((c) => c.syntax.acquires)),
];

const exposedFields = (
  members: readonly ClassifiedMember[]
): ReadonlySet<string> =>
  new Set(
    members.flatMap((m) =>
      m.kind === "method" || m.kind === "operatorOverload"
        ? m.syntax.exposes
        : []
    )
  );

const hasReleasingDestructor = (entry: SymbolEntry): boolean =>
  classifyMembers(entry.declaration).some(
    (m) => m.kind === "destructor" && !m.syntax.isDefaulted
  );

/**
 * Whether an implementation ancestor also maps its destructor to a release
 * method that this type's release must chain to
 */
export const inheritsRelease = (
  table: SymbolTable,
  superClassKey: string | undefined
): boolean => {
  let current = superClassKey ? lookupType(table, superClassKey) : undefined;
  while (current) {
    if (hasReleasingDestructor(current)) {
      return true;
    }
    current = classifyBases(current, table).superclass;
  }
  return false;
};

/**
 * Decide ownership of every field
 */
export const decideOwnership = (
  members: readonly ClassifiedMember[]
): readonly Ownership[] => {
  const constructors = members.flatMap((m) =>
    m.kind === "constructor" ? [m] : []
  );
  const destructor = members.find(
    (m): m is ClassifiedDestructor => m.kind === "destructor"
  );
  const acquired = new Set(acquisitionOrder(constructors));
  const releasedByDestructor = new Set(destructor?.syntax.releases ?? []);
  const exposed = exposedFields(members);

  return members.flatMap((m): Ownership[] => {
    if (m.kind !== "field") {
      return [];
    }
    const name = m.syntax.name;
    const released = releasedByDestructor.has(name);

    if (m.syntax.ownsResource !== undefined) {
      const owned = m.syntax.ownsResource;
      return [{ field: name, owned, released: released || owned }];
    }

    if (!released) {
      return [{ field: name, owned: false, released: false }];
    }

    if (acquired.has(name) && !exposed.has(name)) {
      return [{ field: name, owned: true, released: true }];
    }

    const why = exposed.has(name)
      ? "it is also handed out by a borrowing accessor"
      : "it is not acquired by any constructor";
    return [
      {
        field: name,
        owned: false,
        released: true,
        note: {
          code: "SPM2003",
          message: `ownership of '${name}' is ambiguous: the destructor releases it but ${why}; it is still released by the release method`,
          hint: "State ownership explicitly with 'ownsResource'",
        },
      },
    ];
  });
};

/**
 * Reverse acquisition order; released fields never acquired in a
 * constructor follow in destructor order
 */
export const releaseOrderFor = (
  acquisition: readonly string[],
  destructorOrder: readonly string[],
  releasable: readonly string[]
): readonly string[] => {
  const set = new Set(releasable);
  const acquired = [...acquisition].reverse().filter((f) => set.has(f));
  const rest = [
    ...destructorOrder.filter((f) => set.has(f) && !acquired.includes(f)),
    ...releasable.filter(
      (f) => !acquired.includes(f) && !destructorOrder.includes(f)
    ),
  ];
  return [...new Set([...acquired, ...rest])];
};

const mapField = (
  context: MappingContext,
  member: ClassifiedField,
  ownership: Ownership | undefined
): MemberDraft => {
  const target: TargetField = {
    kind: "field",
    name: member.syntax.name,
    type: mapType(context, member.syntax.type),
    isStatic: member.syntax.isStatic,
    isOwnedResource: ownership?.owned ?? false,
    origin: "source",
  };
  return {
    member,
    outcome: bestEffort([target], ownership?.note ? [ownership.note] : []),
  };
};

const mapConstructor = (
  context: MappingContext,
  member: ClassifiedConstructor
): MemberDraft => ({
  member,
  outcome: mapped<TargetMember>([
    {
      kind: "constructor",
      parameters: mapParameters(context, member.syntax.parameters),
      acquires: member.syntax.acquires,
      body:
        member.syntax.body === undefined
          ? { kind: "source" }
          : { kind: "source", text: member.syntax.body },
    },
  ]),
});

const releaseMethod = (
  context: MappingContext,
  chainsToSuper: boolean,
  body: TargetMethod["body"]
): TargetMethod => ({
  kind: "method",
  name: context.options.releaseMethodName,
  parameters: [],
  returnType: { kind: "void" },
  isAbstract: false,
  isOverride: chainsToSuper,
  isStatic: false,
  body,
  origin: "synthesized",
});

const guardField = (context: MappingContext): TargetField => ({
  kind: "field",
  name: context.options.releaseGuardName,
  type: { kind: "primitive", name: "boolean" },
  isStatic: false,
  isOwnedResource: false,
  origin: "synthesized",
});

const sameOrder = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((item, i) => item === b[i]);

const mapDestructor = (
  context: MappingContext,
  member: ClassifiedDestructor,
  hasConstructor: boolean,
  releaseOrder: readonly string[],
  chainsToSuper: boolean
): MemberDraft => {
  const { syntax } = member;

  if (syntax.isDefaulted && syntax.releases.length === 0) {
    return { member, outcome: mapped([]) };
  }

  if (!hasConstructor) {
    return {
      member,
      outcome: unmappable(ACQUISITION_POINT_UNKNOWN, {
        code: "SPM2002",
        message: `'${context.entry.name.simpleName}' has a destructor but no constructor, so the acquisition point of its resources is unknown`,
        hint: "Declare the constructor that acquires the released resources",
      }),
    };
  }

  if (releaseOrder.length === 0) {
    return {
      member,
      outcome: bestEffort<TargetMember>(
        [
          releaseMethod(context, chainsToSuper, {
            kind: "noopRelease",
            chainsToSuper,
          }),
        ],
        [
          {
            code: "SPM2001",
            message: `'${syntax.name}' releases no detected resource; mapped to a no-op ${context.options.releaseMethodName}()`,
          },
        ]
      ),
    };
  }

  const notes: MappingNote[] = [];
  const written = syntax.releases.filter((f) => releaseOrder.includes(f));
  const expected = releaseOrder.filter((f) => written.includes(f));
  if (!sameOrder(written, expected)) {
    notes.push({
      code: "SPM2004",
      message: `'${syntax.name}' releases ${written.join(", ")}; the release method uses reverse acquisition order ${releaseOrder.join(", ")}`,
    });
  }

  return {
    member,
    outcome: bestEffort<TargetMember>(
      [
        releaseMethod(context, chainsToSuper, {
          kind: "release",
          resources: releaseOrder,
          guard: context.options.releaseGuardName,
          chainsToSuper,
        }),
        guardField(context),
      ],
      notes
    ),
  };
};

/**
 * Plan lifecycle mapping for fields, constructors and destructors
 */
export const planLifecycle = (
  context: MappingContext,
  superClassKey: string | undefined
): LifecyclePlan => {
  const { members } = context;
  const constructors = members.flatMap((m) =>
    m.kind === "constructor" ? [m] : []
  );
  const destructor = members.find(
    (m): m is ClassifiedDestructor => m.kind === "destructor"
  );
  const ownership = decideOwnership(members);
  const ownershipByField = new Map(ownership.map((o) => [o.field, o]));

  const releaseOrder = releaseOrderFor(
    acquisitionOrder(constructors),
    destructor?.syntax.releases ?? [],
    ownership.filter((o) => o.released).map((o) => o.field)
  );
  const chainsToSuper = inheritsRelease(context.table, superClassKey);

  const drafts = members.flatMap((member): MemberDraft[] => {
    switch (member.kind) {
      case "field":
        return [
          mapField(context, member, ownershipByField.get(member.syntax.name)),
        ];
      case "constructor":
        return [mapConstructor(context, member)];
      case "destructor":
        return [
          mapDestructor(
            context,
            member,
            constructors.length > 0,
            releaseOrder,
            chainsToSuper
          ),
        ];
      default:
        return [];
    }
  });

  const releasable = drafts.some(
    (d) =>
      d.member.kind === "destructor" &&
      d.outcome.status !== "unmappable" &&
      d.outcome.targets.length > 0
  );

  const orphaned = drafts.some(
    (d) =>
      d.member.kind === "destructor" &&
      d.outcome.status === "unmappable" &&
      d.outcome.reason === ACQUISITION_POINT_UNKNOWN
  );

  return {
    drafts,
    releaseOrder,
    capabilities: releasable ? ["releasable"] : [],
    ...(orphaned
      ? {
          failure: {
            reason: ACQUISITION_POINT_UNKNOWN,
            note: {
              code: "SPM2002",
              message: `'${context.entry.key}' declares a destructor but no constructor; a type whose resources have no acquisition point cannot be mapped`,
              hint: "Declare the constructor that acquires the released resources",
            },
          },
        }
      : {}),
  };
};
