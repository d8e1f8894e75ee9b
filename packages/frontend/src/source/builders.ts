/**
 * Builders for assembling source units programmatically
 *
 * Used by front-ends that produce units in memory instead of writing
 * documents, and by tests.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import { parseQualifiedName } from "./qualified-name.js";
import type {
  EnumDeclaration,
  EnumeratorSyntax,
  FieldSyntax,
  FunctionSyntax,
  MemberSyntax,
  NamespaceDeclaration,
  SourceUnit,
  TopLevelDeclaration,
  TypeDeclaration,
} from "./types.js";

const UNKNOWN_LOCATION: SourceLocation = {
  file: "<memory>",
  line: 1,
  column: 1,
};

export const sourceField = (
  name: string,
  type: string,
  options: Partial<Omit<FieldSyntax, "kind" | "name" | "type">> = {}
): FieldSyntax => ({
  kind: "field",
  name,
  type,
  ownsResource: options.ownsResource,
  isStatic: options.isStatic ?? false,
  location: options.location ?? UNKNOWN_LOCATION,
});

export const sourceFunction = (
  name: string,
  options: Partial<Omit<FunctionSyntax, "kind" | "name">> = {}
): FunctionSyntax => {
  const isPureVirtual = options.isPureVirtual ?? false;
  const isDefaulted = options.isDefaulted ?? false;
  return {
    kind: "function",
    name,
    parameters: options.parameters ?? [],
    returnType: options.returnType,
    isVirtual: options.isVirtual ?? isPureVirtual,
    isPureVirtual,
    isOverride: options.isOverride ?? false,
    isDefaulted,
    isStatic: options.isStatic ?? false,
    isConst: options.isConst ?? false,
    hasBody: options.hasBody ?? (!isPureVirtual && !isDefaulted),
    acquires: options.acquires ?? [],
    releases: options.releases ?? [],
    reads: options.reads ?? [],
    exposes: options.exposes ?? [],
    body: options.body,
    location: options.location ?? UNKNOWN_LOCATION,
  };
};

/**
 * Build a type declaration; `name` may be qualified (`Geometry::Shapes::Shape`)
 */
export const sourceType = (
  name: string,
  members: readonly MemberSyntax[],
  options: {
    readonly bases?: readonly string[];
    readonly isAbstract?: boolean;
    readonly location?: SourceLocation;
  } = {}
): TypeDeclaration => ({
  kind: "type",
  name: parseQualifiedName(name),
  bases: options.bases ?? [],
  members,
  isAbstract: options.isAbstract ?? false,
  location: options.location ?? UNKNOWN_LOCATION,
});

export const sourceEnumerator = (
  name: string,
  value?: number
): EnumeratorSyntax => ({
  name,
  ...(value === undefined ? {} : { value }),
  location: UNKNOWN_LOCATION,
});

/**
 * Build an enumeration; bare strings are enumerators without initializer
 */
export const sourceEnum = (
  name: string,
  enumerators: readonly (string | EnumeratorSyntax)[],
  options: { readonly location?: SourceLocation } = {}
): EnumDeclaration => ({
  kind: "enum",
  name: parseQualifiedName(name),
  enumerators: enumerators.map((e) =>
    typeof e === "string" ? sourceEnumerator(e) : e
  ),
  location: options.location ?? UNKNOWN_LOCATION,
});

export const sourceNamespace = (
  name: string,
  declarations: readonly TopLevelDeclaration[]
): NamespaceDeclaration => ({
  kind: "namespace",
  name,
  declarations,
  location: UNKNOWN_LOCATION,
});

export const sourceUnit = (
  file: string,
  declarations: readonly TopLevelDeclaration[]
): SourceUnit => ({ file, declarations });
