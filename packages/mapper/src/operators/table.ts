/**
 * Operator correspondence table
 *
 * Member operators take the receiver implicitly. Non-member (friend)
 * operators declared with the type take it as their first parameter.
 */

import type { ArithmeticOperation } from "../types.js";

export type OperatorFamily =
  | { readonly family: "equality" }
  | { readonly family: "inequality" }
  | { readonly family: "comparison" }
  | { readonly family: "arithmetic"; readonly operation: ArithmeticOperation };

export type OperatorForm = "member" | "nonMember";

export type OperatorEntry = OperatorFamily & {
  readonly token: string;
  readonly form: OperatorForm;
  /** Explicit parameters, the receiver included for the non-member form */
  readonly arity: number;
};

export const OPERATOR_TABLE: readonly OperatorEntry[] = [
  { token: "==", form: "member", arity: 1, family: "equality" },
  { token: "!=", form: "member", arity: 1, family: "inequality" },
  { token: "+", form: "member", arity: 1, family: "arithmetic", operation: "add" },
  { token: "-", form: "member", arity: 1, family: "arithmetic", operation: "subtract" },
  { token: "*", form: "member", arity: 1, family: "arithmetic", operation: "multiply" },
  { token: "/", form: "member", arity: 1, family: "arithmetic", operation: "divide" },
  { token: "%", form: "member", arity: 1, family: "arithmetic", operation: "remainder" },
  { token: "-", form: "member", arity: 0, family: "arithmetic", operation: "negate" },
  { token: "<", form: "member", arity: 1, family: "comparison" },
  { token: ">", form: "member", arity: 1, family: "comparison" },
  { token: "<=", form: "member", arity: 1, family: "comparison" },
  { token: ">=", form: "member", arity: 1, family: "comparison" },
  { token: "<=>", form: "member", arity: 1, family: "comparison" },

  { token: "==", form: "nonMember", arity: 2, family: "equality" },
  { token: "!=", form: "nonMember", arity: 2, family: "inequality" },
  { token: "+", form: "nonMember", arity: 2, family: "arithmetic", operation: "add" },
  { token: "-", form: "nonMember", arity: 2, family: "arithmetic", operation: "subtract" },
  { token: "*", form: "nonMember", arity: 2, family: "arithmetic", operation: "multiply" },
  { token: "/", form: "nonMember", arity: 2, family: "arithmetic", operation: "divide" },
  { token: "%", form: "nonMember", arity: 2, family: "arithmetic", operation: "remainder" },
  { token: "-", form: "nonMember", arity: 1, family: "arithmetic", operation: "negate" },
  { token: "<", form: "nonMember", arity: 2, family: "comparison" },
  { token: ">", form: "nonMember", arity: 2, family: "comparison" },
  { token: "<=", form: "nonMember", arity: 2, family: "comparison" },
  { token: ">=", form: "nonMember", arity: 2, family: "comparison" },
  { token: "<=>", form: "nonMember", arity: 2, family: "comparison" },
];

export const lookupOperator = (
  token: string,
  arity: number,
  form: OperatorForm = "member"
): OperatorEntry | undefined =>
  OPERATOR_TABLE.find(
    (e) => e.token === token && e.arity === arity && e.form === form
  );
