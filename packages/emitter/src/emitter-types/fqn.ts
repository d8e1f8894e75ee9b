/**
 * Package and fully qualified name rendering
 *
 * Namespace paths become lower-case packages. Declared types are always
 * referenced by their fully qualified name, so emitted files need no imports.
 */

import type { QualifiedName } from "@semport/frontend";
import type { EmitterOptions } from "./core.js";
import { escapeJavaIdentifier } from "./identifiers.js";

/**
 * Package segments of a qualified name, root package first
 * e.g., (com.example, Geometry::Shapes::Shape) → ["com", "example", "geometry", "shapes"]
 */
export const packageSegments = (
  name: QualifiedName,
  options: EmitterOptions
): readonly string[] => {
  const root = (options.rootPackage ?? "")
    .split(".")
    .filter((segment) => segment !== "");
  return [
    ...root,
    ...name.namespacePath.map((segment) =>
      escapeJavaIdentifier(segment.toLowerCase())
    ),
  ];
};

/**
 * Package declaration name, undefined for the default package
 */
export const renderPackageName = (
  name: QualifiedName,
  options: EmitterOptions
): string | undefined => {
  const segments = packageSegments(name, options);
  return segments.length > 0 ? segments.join(".") : undefined;
};

export const renderSimpleName = (name: QualifiedName): string =>
  escapeJavaIdentifier(name.simpleName);

/**
 * Render a declared type by its fully qualified name
 * e.g., Geometry::Shapes::Shape → "geometry.shapes.Shape"
 */
export const renderTypeFQN = (
  name: QualifiedName,
  options: EmitterOptions
): string =>
  [...packageSegments(name, options), renderSimpleName(name)].join(".");

/**
 * Output path of a declaration relative to the output directory
 * e.g., Geometry::Shapes::Shape → "geometry/shapes/Shape.java"
 */
export const renderOutputPath = (
  name: QualifiedName,
  options: EmitterOptions
): string =>
  [...packageSegments(name, options), `${renderSimpleName(name)}.java`].join(
    "/"
  );
