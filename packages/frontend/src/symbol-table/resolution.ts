/**
 * Base type reference resolution
 */

import {
  NAMESPACE_SEPARATOR,
  parseQualifiedName,
  qualifiedNameKey,
} from "../source/qualified-name.js";
import type { NamespacePath } from "../source/types.js";

/**
 * Candidate keys for a reference written inside `scope`, innermost first.
 *
 * `::A::B` is absolute; anything else is looked up from the enclosing
 * namespace outward to the global namespace.
 */
export const candidateKeys = (
  reference: string,
  scope: NamespacePath
): readonly string[] => {
  const trimmed = reference.trim();
  const referenceKey = qualifiedNameKey(parseQualifiedName(trimmed));

  if (trimmed.startsWith(NAMESPACE_SEPARATOR)) {
    return [referenceKey];
  }

  const candidates: string[] = [];
  for (let depth = scope.length; depth >= 0; depth--) {
    candidates.push(
      [...scope.slice(0, depth), referenceKey].join(NAMESPACE_SEPARATOR)
    );
  }
  return candidates;
};

/**
 * Resolve a reference against a set of known keys
 */
export const resolveReference = (
  reference: string,
  scope: NamespacePath,
  isKnown: (key: string) => boolean
): string | undefined => candidateKeys(reference, scope).find(isKnown);
