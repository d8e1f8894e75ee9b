/**
 * Mapping outcomes and the per-construct state ledger
 *
 * Every construct moves Pending -> Classified -> Mapped | BestEffort |
 * Unmappable exactly once.
 */

import type {
  ConstructRef,
  MappingNote,
  MappingOutcome,
  MappingStatus,
} from "./types.js";

export const mapped = <T>(targets: readonly T[]): MappingOutcome<T> => ({
  status: "mapped",
  targets,
});

export const bestEffort = <T>(
  targets: readonly T[],
  notes: readonly MappingNote[]
): MappingOutcome<T> =>
  notes.length === 0 ? mapped(targets) : { status: "bestEffort", targets, notes };

export const unmappable = <T>(
  reason: string,
  note: MappingNote,
  furtherNotes: readonly MappingNote[] = []
): MappingOutcome<T> => ({
  status: "unmappable",
  reason,
  note,
  ...(furtherNotes.length > 0 ? { furtherNotes } : {}),
});

/**
 * Targets produced by an outcome (none when unmappable)
 */
export const outcomeTargets = <T>(outcome: MappingOutcome<T>): readonly T[] =>
  outcome.status === "unmappable" ? [] : outcome.targets;

/**
 * Attach further notes; a mapped outcome becomes best-effort
 */
export const withNotes = <T>(
  outcome: MappingOutcome<T>,
  notes: readonly MappingNote[]
): MappingOutcome<T> => {
  if (notes.length === 0 || outcome.status === "unmappable") {
    return outcome;
  }
  const existing = outcome.status === "bestEffort" ? outcome.notes : [];
  return bestEffort(outcome.targets, [...existing, ...notes]);
};

/**
 * Replace the targets of a non-unmappable outcome
 */
export const withTargets = <T, U>(
  outcome: MappingOutcome<T>,
  targets: readonly U[]
): MappingOutcome<U> => {
  switch (outcome.status) {
    case "mapped":
      return mapped(targets);
    case "bestEffort":
      return bestEffort(targets, outcome.notes);
    case "unmappable":
      return outcome;
  }
};

export type ConstructState = "pending" | "classified" | MappingStatus;

export const constructId = (ref: ConstructRef): string =>
  ref.memberIndex === undefined
    ? ref.typeKey
    : `${ref.typeKey}#${ref.memberIndex}`;

export type OutcomeLedger = {
  readonly stateOf: (ref: ConstructRef) => ConstructState;
  readonly classify: (ref: ConstructRef) => void;
  readonly settle: <T>(ref: ConstructRef, outcome: MappingOutcome<T>) => void;
};

/**
 * Track construct states; a construct that reaches a terminal state is
 * never revisited
 */
export const createOutcomeLedger = (): OutcomeLedger => {
  const states = new Map<string, ConstructState>();

  const stateOf = (ref: ConstructRef): ConstructState =>
    states.get(constructId(ref)) ?? "pending";

  return {
    stateOf,
    classify: (ref) => {
      const state = stateOf(ref);
      if (state !== "pending") {
        throw new Error(
          `Construct ${constructId(ref)} cannot be classified from state '${state}'`
        );
      }
      states.set(constructId(ref), "classified");
    },
    settle: (ref, outcome) => {
      const state = stateOf(ref);
      if (state !== "classified") {
        throw new Error(
          `Construct ${constructId(ref)} cannot be settled from state '${state}'`
        );
      }
      states.set(constructId(ref), outcome.status);
    },
  };
};
