/**
 * Member naming
 *
 * Names the mappers introduce must not clash with a member of the same
 * signature. Source members keep their names; synthesized members are
 * renamed with a `_N` suffix in member order.
 */

import type { MemberDraft } from "./context.js";
import { withNotes, withTargets, outcomeTargets } from "./outcome.js";
import { typeRefKey } from "./type-mapping.js";
import type { TargetMember, TargetMethod } from "./types.js";

/**
 * Signature under which a member competes for its name; constructors take
 * the type's name and never compete
 */
export const memberSignature = (member: TargetMember): string | undefined => {
  switch (member.kind) {
    case "field":
      return `field:${member.name}`;
    case "constructor":
      return undefined;
    case "method":
      return `method:${member.name}(${member.parameters
        .map((p) => typeRefKey(p.type))
        .join(",")})`;
  }
};

const renamed = (member: TargetMember, name: string): TargetMember =>
  member.kind === "constructor" ? member : { ...member, name };

/** Point a release body at its guard's final name */
const retargetGuard = (
  member: TargetMember,
  from: string,
  to: string
): TargetMember => {
  if (member.kind !== "method" || member.body.kind !== "release") {
    return member;
  }
  if (member.body.guard !== from) {
    return member;
  }
  const method: TargetMethod = {
    ...member,
    body: { ...member.body, guard: to },
  };
  return method;
};

/**
 * Resolve synthesized name collisions across all drafts of one type
 */
export const resolveMemberNames = (
  drafts: readonly MemberDraft[]
): readonly MemberDraft[] => {
  const taken = new Set<string>();

  for (const draft of drafts) {
    for (const target of outcomeTargets(draft.outcome)) {
      const signature = memberSignature(target);
      if (
        target.kind !== "constructor" &&
        target.origin === "source" &&
        signature
      ) {
        taken.add(signature);
      }
    }
  }

  return drafts.map((draft) => {
    const targets = outcomeTargets(draft.outcome);
    const synthesizes = targets.some(
      (t) => t.kind !== "constructor" && t.origin === "synthesized"
    );
    if (!synthesizes) {
      return draft;
    }

    const notes: { code: "SPM5001"; message: string }[] = [];
    let next = targets.map((target) => {
      const signature = memberSignature(target);
      if (
        target.kind === "constructor" ||
        target.origin !== "synthesized" ||
        !signature
      ) {
        return target;
      }
      if (!taken.has(signature)) {
        taken.add(signature);
        return target;
      }
      for (let n = 2; ; n++) {
        const candidate = renamed(target, `${target.name}_${n}`);
        const candidateSignature = memberSignature(candidate);
        if (candidateSignature && !taken.has(candidateSignature)) {
          taken.add(candidateSignature);
          notes.push({
            code: "SPM5001",
            message: `synthesized member '${target.name}' collides with an existing member and was renamed to '${target.name}_${n}'`,
          });
          return candidate;
        }
      }
    });

    for (const [i, target] of targets.entries()) {
      const final = next[i];
      if (
        target.kind === "field" &&
        final?.kind === "field" &&
        final.name !== target.name
      ) {
        next = next.map((m) => retargetGuard(m, target.name, final.name));
      }
    }

    return {
      member: draft.member,
      outcome: withNotes(withTargets(draft.outcome, next), notes),
    };
  });
};
