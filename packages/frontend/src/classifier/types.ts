/**
 * Classified member types
 */

import type { FieldSyntax, FunctionSyntax } from "../source/types.js";

type Classified<K extends string, S> = {
  readonly kind: K;
  /** Position of the member in its declaration */
  readonly memberIndex: number;
  readonly syntax: S;
};

export type ClassifiedField = Classified<"field", FieldSyntax>;
export type ClassifiedConstructor = Classified<"constructor", FunctionSyntax>;
export type ClassifiedDestructor = Classified<"destructor", FunctionSyntax>;
export type ClassifiedMethod = Classified<"method", FunctionSyntax>;
export type ClassifiedAbstractMethod = Classified<
  "abstractMethod",
  FunctionSyntax
>;

export type ClassifiedOperator = Classified<"operatorOverload", FunctionSyntax> & {
  /** Operator token (`==`, `+`, `[]`) or the target type of a conversion operator */
  readonly token: string;
  readonly isConversion: boolean;
};

export type ClassifiedMember =
  | ClassifiedField
  | ClassifiedConstructor
  | ClassifiedDestructor
  | ClassifiedMethod
  | ClassifiedAbstractMethod
  | ClassifiedOperator;

export type ClassifiedKind = ClassifiedMember["kind"];
