/**
 * Target model and mapping outcomes
 */

import type {
  ConstructKind,
  DiagnosticCode,
  QualifiedName,
  SourceLocation,
} from "@semport/frontend";

export type PrimitiveTypeName =
  | "boolean"
  | "byte"
  | "char"
  | "short"
  | "int"
  | "long"
  | "float"
  | "double";

export type TargetTypeRef =
  | { readonly kind: "void" }
  | { readonly kind: "primitive"; readonly name: PrimitiveTypeName }
  | { readonly kind: "string" }
  | { readonly kind: "array"; readonly element: TargetTypeRef }
  /** A type declared in the source units */
  | { readonly kind: "declared"; readonly name: QualifiedName }
  /** A library type of the target platform (`java.util.List`) */
  | {
      readonly kind: "library";
      readonly name: string;
      readonly typeArguments: readonly TargetTypeRef[];
    }
  /** A source type with no known counterpart, kept as written */
  | { readonly kind: "unknown"; readonly spelling: string };

export type TargetParameter = {
  readonly name: string;
  readonly type: TargetTypeRef;
};

export type ArithmeticOperation =
  | "add"
  | "subtract"
  | "multiply"
  | "divide"
  | "remainder"
  | "negate";

/**
 * What a target method does. Bodies the engine synthesizes are described
 * structurally; bodies carried over from the source stay untranslated.
 */
export type TargetBody =
  | { readonly kind: "source"; readonly text?: string }
  | { readonly kind: "abstract" }
  /**
   * Idempotent release of `resources` in order, guarded by `guard`;
   * `chainsToSuper` releases the superclass's resources afterwards
   */
  | {
      readonly kind: "release";
      readonly resources: readonly string[];
      readonly guard: string;
      readonly chainsToSuper: boolean;
    }
  | { readonly kind: "noopRelease"; readonly chainsToSuper: boolean }
  | { readonly kind: "equals"; readonly fields: readonly string[] }
  | { readonly kind: "hash"; readonly fields: readonly string[] }
  | {
      readonly kind: "arithmetic";
      readonly operation: ArithmeticOperation;
      readonly fields: readonly string[];
      readonly operand: "instance" | "scalar" | "none";
    }
  | { readonly kind: "compare"; readonly fields: readonly string[] };

export type MemberOrigin = "source" | "synthesized";

export type TargetField = {
  readonly kind: "field";
  readonly name: string;
  readonly type: TargetTypeRef;
  readonly isStatic: boolean;
  readonly isOwnedResource: boolean;
  readonly origin: MemberOrigin;
};

export type TargetConstructor = {
  readonly kind: "constructor";
  readonly parameters: readonly TargetParameter[];
  /** Fields acquired, in acquisition order */
  readonly acquires: readonly string[];
  readonly body: TargetBody;
};

export type TargetMethod = {
  readonly kind: "method";
  readonly name: string;
  readonly parameters: readonly TargetParameter[];
  readonly returnType: TargetTypeRef;
  readonly isAbstract: boolean;
  readonly isOverride: boolean;
  readonly isStatic: boolean;
  readonly body: TargetBody;
  readonly origin: MemberOrigin;
};

export type TargetMember = TargetField | TargetConstructor | TargetMethod;

export type TargetKind = "interface" | "abstractClass" | "concreteClass";

/**
 * Capabilities the target type advertises to callers
 * (`releasable` is scoped-acquisition compatible)
 */
export type Capability = "releasable" | "comparable";

export type TargetDeclaration = {
  readonly name: QualifiedName;
  readonly sourceName: QualifiedName;
  readonly kind: TargetKind;
  readonly superClass?: QualifiedName;
  readonly interfaces: readonly QualifiedName[];
  readonly capabilities: readonly Capability[];
  readonly members: readonly TargetMember[];
  readonly location: SourceLocation;
};

export type TargetEnumConstant = {
  readonly name: string;
  readonly value: number;
};

export type TargetEnum = {
  readonly name: QualifiedName;
  readonly sourceName: QualifiedName;
  readonly constants: readonly TargetEnumConstant[];
  /**
   * Field carrying each constant's source value; absent when every value
   * equals the constant's ordinal
   */
  readonly valueField?: string;
  readonly location: SourceLocation;
};

export type MappingNote = {
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly hint?: string;
};

export type MappingOutcome<T> =
  | { readonly status: "mapped"; readonly targets: readonly T[] }
  | {
      readonly status: "bestEffort";
      readonly targets: readonly T[];
      readonly notes: readonly MappingNote[];
    }
  | {
      readonly status: "unmappable";
      readonly reason: string;
      readonly note: MappingNote;
      /** Further reasons, each reported as its own error */
      readonly furtherNotes?: readonly MappingNote[];
    };

export type MappingStatus = MappingOutcome<unknown>["status"];

/** A reason the whole type cannot be mapped */
export type TypeFailure = {
  readonly reason: string;
  readonly note: MappingNote;
};

/**
 * Identity of a construct: a type declaration or one of its members
 */
export type ConstructRef = {
  readonly typeKey: string;
  readonly typeOrdinal: number;
  /** Undefined for the type declaration itself */
  readonly memberIndex?: number;
  readonly constructKind: ConstructKind;
  readonly name: string;
  readonly location: SourceLocation;
};

export type TypeMappingResult = {
  readonly construct: ConstructRef;
  readonly outcome: MappingOutcome<TargetDeclaration>;
};

export type MemberMappingResult = {
  readonly construct: ConstructRef;
  readonly outcome: MappingOutcome<TargetMember>;
};

export type EnumMappingResult = {
  readonly construct: ConstructRef;
  readonly outcome: MappingOutcome<TargetEnum>;
};

export type MappingResult =
  | TypeMappingResult
  | MemberMappingResult
  | EnumMappingResult;

export type MappingOptions = {
  /** Name of the synthesized release method */
  readonly releaseMethodName: string;
  /** Name of the synthesized release guard field */
  readonly releaseGuardName: string;
};

export const DEFAULT_MAPPING_OPTIONS: MappingOptions = {
  releaseMethodName: "close",
  releaseGuardName: "released",
};
