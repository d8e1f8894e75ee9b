/**
 * Normalized source model produced by the external C++ front-end
 */

import type { SourceLocation } from "../types/diagnostic.js";

export type NamespacePath = readonly string[];

export type QualifiedName = {
  readonly namespacePath: NamespacePath;
  readonly simpleName: string;
};

/**
 * A type spelling as written in the source (`const char*`, `std::string`,
 * `Vector2D&`)
 */
export type TypeSpelling = string;

export type SourceParameter = {
  readonly name: string;
  readonly type: TypeSpelling;
};

export type FieldSyntax = {
  readonly kind: "field";
  readonly name: string;
  readonly type: TypeSpelling;
  /** Explicit ownership claim; undefined leaves the decision to the lifecycle heuristic */
  readonly ownsResource?: boolean;
  readonly isStatic: boolean;
  readonly location: SourceLocation;
};

/**
 * Any function-shaped member: constructors, destructors, methods and
 * operators all arrive in this shape and are told apart by the classifier.
 *
 * Bodies are not parsed; the front-end summarizes what a body does to the
 * declaring type's fields.
 */
export type FunctionSyntax = {
  readonly kind: "function";
  readonly name: string;
  readonly parameters: readonly SourceParameter[];
  readonly returnType?: TypeSpelling;
  readonly isVirtual: boolean;
  readonly isPureVirtual: boolean;
  readonly isOverride: boolean;
  /** `= default` */
  readonly isDefaulted: boolean;
  readonly isStatic: boolean;
  readonly isConst: boolean;
  readonly hasBody: boolean;
  /** Fields acquired by this body, in acquisition order */
  readonly acquires: readonly string[];
  /** Fields released by this body, in release order */
  readonly releases: readonly string[];
  /** Fields read or compared by this body, in order */
  readonly reads: readonly string[];
  /** Fields handed out as borrowed pointers or references */
  readonly exposes: readonly string[];
  /** Untranslated body text, when the front-end keeps it */
  readonly body?: string;
  readonly location: SourceLocation;
};

export type MemberSyntax = FieldSyntax | FunctionSyntax;

export type TypeDeclaration = {
  readonly kind: "type";
  readonly name: QualifiedName;
  /** Base references exactly as written (`Animal`, `::Geometry::Shape`) */
  readonly bases: readonly string[];
  readonly members: readonly MemberSyntax[];
  readonly isAbstract: boolean;
  readonly location: SourceLocation;
};

export type EnumeratorSyntax = {
  readonly name: string;
  /** Explicit initializer; undefined continues from the previous enumerator */
  readonly value?: number;
  readonly location: SourceLocation;
};

/**
 * An unscoped or scoped enumeration with integral enumerators
 */
export type EnumDeclaration = {
  readonly kind: "enum";
  readonly name: QualifiedName;
  readonly enumerators: readonly EnumeratorSyntax[];
  readonly location: SourceLocation;
};

export type NamespaceDeclaration = {
  readonly kind: "namespace";
  readonly name: string;
  readonly declarations: readonly TopLevelDeclaration[];
  readonly location: SourceLocation;
};

export type TopLevelDeclaration =
  | NamespaceDeclaration
  | TypeDeclaration
  | EnumDeclaration;

export type SourceUnit = {
  readonly file: string;
  readonly declarations: readonly TopLevelDeclaration[];
};
