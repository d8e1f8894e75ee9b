/**
 * Dispatch Mapper
 *
 * Decides the target kind of a type, which bases it extends or implements,
 * and whether a concrete type overrides everything it inherits abstractly.
 * Also maps the type's plain and abstract methods.
 */

import {
  getBaseEntries,
  type ClassifiedAbstractMethod,
  type ClassifiedMethod,
  type QualifiedName,
  type SymbolEntry,
} from "@semport/frontend";
import {
  mapParameters,
  mapType,
  type MappingContext,
  type MemberDraft,
} from "../context.js";
import { bestEffort } from "../outcome.js";
import type {
  MappingNote,
  TargetKind,
  TargetMethod,
  TypeFailure,
} from "../types.js";
import {
  ancestorSignatures,
  classifyBases,
  deriveTargetKind,
  methodSignature,
  unimplementedAbstracts,
} from "./shape.js";

export type DispatchPlan = {
  readonly kind: TargetKind;
  readonly superClass?: QualifiedName;
  readonly superClassKey?: string;
  readonly interfaces: readonly QualifiedName[];
  /** Recovered problems reported on the type */
  readonly typeNotes: readonly MappingNote[];
  /** Every reason the type cannot be mapped, most fundamental first */
  readonly failures: readonly TypeFailure[];
  /** Drafts for `method` and `abstractMethod` members */
  readonly methods: readonly MemberDraft[];
};

const unresolvedBaseNotes = (context: MappingContext): MappingNote[] =>
  (context.table.unresolvedBases.get(context.entry.key) ?? []).map(
    (unresolved) => ({
      code: "SPM1002",
      message: `base '${unresolved.reference}' could not be resolved and was dropped`,
      hint: "Declare the base in one of the source units or remove it",
    })
  );

const collisionNotes = (context: MappingContext): MappingNote[] => {
  const collision = context.table.collisions.get(context.entry.key);
  if (!collision) {
    return [];
  }
  return [
    {
      code: "SPM1003",
      message: `'${collision.sourceKey}' is declared more than once; this declaration was renamed to '${collision.key}'`,
    },
  ];
};

const droppedBaseNotes = (
  dropped: readonly SymbolEntry[]
): MappingNote[] =>
  dropped.map((base) => ({
    code: "SPM3005",
    message: `base '${base.key}' declares no state or behaviour and was left out of the class hierarchy`,
    hint: "Give the base an abstract method to keep it as an interface",
  }));

const mapMethod = (
  context: MappingContext,
  member: ClassifiedMethod | ClassifiedAbstractMethod,
  overridable: ReadonlySet<string>,
  pending: ReadonlySet<string>,
  verifiable: boolean
): MemberDraft => {
  const { syntax } = member;
  const signature = methodSignature(syntax);
  const overridesSomething = overridable.has(signature);
  const notes: MappingNote[] = [];

  if (syntax.isOverride && !overridesSomething) {
    notes.push({
      code: "SPM3004",
      message: verifiable
        ? `'${syntax.name}' is marked override but no base declares ${signature}; the marker was dropped`
        : `'${syntax.name}' is marked override but a base could not be resolved; the marker was dropped`,
    });
  }

  if (
    member.kind === "method" &&
    !syntax.isOverride &&
    pending.has(signature)
  ) {
    notes.push({
      code: "SPM3003",
      message: `'${syntax.name}' implements an inherited abstract method without the override marker`,
      hint: "Add 'override' to the source declaration",
    });
  }

  const isAbstract = member.kind === "abstractMethod";
  const target: TargetMethod = {
    kind: "method",
    name: syntax.name,
    parameters: mapParameters(context, syntax.parameters),
    returnType: mapType(context, syntax.returnType),
    isAbstract,
    isOverride: overridesSomething,
    isStatic: syntax.isStatic,
    body: isAbstract
      ? { kind: "abstract" }
      : syntax.body === undefined
        ? { kind: "source" }
        : { kind: "source", text: syntax.body },
    origin: "source",
  };

  return { member, outcome: bestEffort([target], notes) };
};

/**
 * Plan dispatch for one type
 */
export const planDispatch = (context: MappingContext): DispatchPlan => {
  const { entry, table } = context;
  const kind = deriveTargetKind(entry, table);
  const roles = classifyBases(entry, table);

  const typeNotes = [
    ...unresolvedBaseNotes(context),
    ...collisionNotes(context),
    ...droppedBaseNotes(roles.dropped),
  ];
  const failures: TypeFailure[] = [];

  if (roles.implementationBases.length > 1) {
    const names = roles.implementationBases.map((b) => b.key).join(", ");
    failures.push({
      reason: "multiple-implementation-inheritance-unsupported",
      note: {
        code: "SPM3002",
        message: `'${entry.key}' inherits implementation from more than one base: ${names}`,
        hint: "Keep one implementation base and reduce the others to abstract-only interfaces",
      },
    });
  }

  // Abstract methods left open by the bases
  const inheritedPending = getBaseEntries(table, entry.key).flatMap((base) =>
    unimplementedAbstracts(base, table)
  );
  const pendingSignatures = new Set(inheritedPending.map((p) => p.signature));

  if (kind === "concreteClass") {
    const ownMethods = context.members.flatMap((m) =>
      m.kind === "method" ? [m.syntax] : []
    );
    const overriding = new Set(
      ownMethods.filter((m) => m.isOverride).map(methodSignature)
    );
    const unmarked = new Set(
      ownMethods.filter((m) => !m.isOverride).map(methodSignature)
    );
    const missing = inheritedPending.filter(
      (p) => !overriding.has(p.signature)
    );
    if (missing.length > 0) {
      const listed = [
        ...new Set(
          missing.map(
            (p) =>
              `${p.signature} (from ${p.declaredIn}${
                unmarked.has(p.signature) ? ", declared without override" : ""
              })`
          )
        ),
      ].join(", ");
      failures.push({
        reason: "incomplete-override",
        note: {
          code: "SPM3001",
          message: `'${entry.key}' does not override inherited abstract method(s): ${listed}`,
          hint: "Implement every inherited abstract method with the override marker or make the type abstract",
        },
      });
    }
  }

  const overridable = ancestorSignatures(entry, table);
  const verifiable = !table.unresolvedBases.has(entry.key);
  const methods = context.members.flatMap((member) =>
    member.kind === "method" || member.kind === "abstractMethod"
      ? [mapMethod(context, member, overridable, pendingSignatures, verifiable)]
      : []
  );

  const { superclass } = roles;
  return {
    kind,
    ...(superclass
      ? { superClass: superclass.name, superClassKey: superclass.key }
      : {}),
    interfaces: roles.interfaces.map((base) => base.name),
    typeNotes,
    failures,
    methods,
  };
};
