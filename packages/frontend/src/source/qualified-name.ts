/**
 * Qualified name helpers
 */

import type { NamespacePath, QualifiedName } from "./types.js";

export const NAMESPACE_SEPARATOR = "::";

export const qualifiedName = (
  namespacePath: NamespacePath,
  simpleName: string
): QualifiedName => ({ namespacePath: [...namespacePath], simpleName });

/**
 * Split a namespace name that may use the compound `A::B` form
 */
export const splitNamespaceSegments = (name: string): readonly string[] =>
  name
    .split(NAMESPACE_SEPARATOR)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

/**
 * Parse `A::B::Name` (a leading `::` is ignored)
 */
export const parseQualifiedName = (text: string): QualifiedName => {
  const segments = splitNamespaceSegments(text);
  const simpleName = segments[segments.length - 1] ?? "";
  return qualifiedName(segments.slice(0, -1), simpleName);
};

/**
 * Stable string key, also the display form
 */
export const qualifiedNameKey = (name: QualifiedName): string =>
  [...name.namespacePath, name.simpleName].join(NAMESPACE_SEPARATOR);

export const qualifiedNamesEqual = (
  a: QualifiedName,
  b: QualifiedName
): boolean => qualifiedNameKey(a) === qualifiedNameKey(b);

export const withSimpleName = (
  name: QualifiedName,
  simpleName: string
): QualifiedName => qualifiedName(name.namespacePath, simpleName);
