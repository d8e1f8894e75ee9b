/**
 * Enumeration mapping
 *
 * Enumerators keep their names and order. An enumerator without an
 * initializer takes the previous value plus one, starting at zero. When a
 * value differs from the constant's ordinal the source values are kept in
 * a synthesized field.
 */

import type {
  EnumEntry,
  EnumeratorSyntax,
  SymbolTable,
} from "@semport/frontend";
import { bestEffort, outcomeTargets } from "./outcome.js";
import type {
  ConstructRef,
  EnumMappingResult,
  MappingNote,
  TargetEnum,
  TargetEnumConstant,
} from "./types.js";

export type EnumMapping = {
  readonly result: EnumMappingResult;
  /** Present unless the enumeration is unmappable */
  readonly enumeration?: TargetEnum;
};

const VALUE_FIELD = "value";

export const enumConstructRef = (entry: EnumEntry): ConstructRef => ({
  typeKey: entry.key,
  typeOrdinal: entry.ordinal,
  constructKind: "enum",
  name: entry.key,
  location: entry.declaration.location,
});

export const enumeratorValues = (
  enumerators: readonly EnumeratorSyntax[]
): readonly TargetEnumConstant[] => {
  let next = 0;
  return enumerators.map((enumerator) => {
    const value = enumerator.value ?? next;
    next = value + 1;
    return { name: enumerator.name, value };
  });
};

const aliasNotes = (
  constants: readonly TargetEnumConstant[]
): MappingNote[] => {
  const firstByValue = new Map<number, string>();
  return constants.flatMap((constant): MappingNote[] => {
    const first = firstByValue.get(constant.value);
    if (first === undefined) {
      firstByValue.set(constant.value, constant.name);
      return [];
    }
    return [
      {
        code: "SPM5002",
        message: `'${constant.name}' shares the value ${constant.value} with '${first}' and becomes a distinct constant`,
        hint: "Compare the constants' values where the enumerators were used interchangeably",
      },
    ];
  });
};

const chooseValueField = (
  constants: readonly TargetEnumConstant[]
): { readonly name: string; readonly notes: readonly MappingNote[] } => {
  const taken = new Set(constants.map((c) => c.name));
  if (!taken.has(VALUE_FIELD)) {
    return { name: VALUE_FIELD, notes: [] };
  }
  for (let n = 2; ; n++) {
    const candidate = `${VALUE_FIELD}_${n}`;
    if (!taken.has(candidate)) {
      return {
        name: candidate,
        notes: [
          {
            code: "SPM5001",
            message: `synthesized field '${VALUE_FIELD}' collides with an enumerator and was renamed to '${candidate}'`,
          },
        ],
      };
    }
  }
};

const collisionNotes = (entry: EnumEntry, table: SymbolTable): MappingNote[] => {
  const collision = table.collisions.get(entry.key);
  return collision
    ? [
        {
          code: "SPM1003",
          message: `'${collision.sourceKey}' is declared more than once; this declaration was renamed to '${collision.key}'`,
        },
      ]
    : [];
};

/**
 * Map one enumeration. A pure function of its arguments.
 */
export const mapEnumDeclaration = (
  entry: EnumEntry,
  table: SymbolTable
): EnumMapping => {
  const constants = enumeratorValues(entry.declaration.enumerators);
  const valueField = constants.some((c, ordinal) => c.value !== ordinal)
    ? chooseValueField(constants)
    : undefined;

  const outcome = bestEffort(
    [
      {
        name: entry.name,
        sourceName: entry.sourceName,
        constants,
        ...(valueField ? { valueField: valueField.name } : {}),
        location: entry.declaration.location,
      },
    ],
    [
      ...collisionNotes(entry, table),
      ...aliasNotes(constants),
      ...(valueField?.notes ?? []),
    ]
  );

  const [enumeration] = outcomeTargets(outcome);
  return {
    result: { construct: enumConstructRef(entry), outcome },
    ...(enumeration ? { enumeration } : {}),
  };
};
