/**
 * Value semantics shared by synthesized bodies
 */

import type { ArithmeticOperation } from "@semport/mapper";
import { EvaluationError } from "./errors.js";

/**
 * Something that can be released; fields holding one are released by the
 * synthesized release method
 */
export type Releasable = {
  readonly release: () => void;
};

export const isReleasable = (value: unknown): value is Releasable =>
  typeof value === "object" &&
  value !== null &&
  "release" in value &&
  typeof value.release === "function";

/**
 * Value-level hooks of evaluated instances, so nested instances take part in
 * equality, hashing and comparison
 */
export type ValueHooks = {
  readonly equals: (a: object, b: unknown) => boolean | undefined;
  readonly hash: (value: object) => number | undefined;
  readonly compare: (a: object, b: unknown) => number | undefined;
};

const NO_HOOKS: ValueHooks = {
  equals: () => undefined,
  hash: () => undefined,
  compare: () => undefined,
};

/** 32-bit string hash (`s[0]*31^(n-1) + ... + s[n-1]`) */
export const stringHash = (text: string): number => {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0;
  }
  return hash;
};

export const combineHashes = (hashes: readonly number[]): number =>
  hashes.reduce((acc, h) => (Math.imul(31, acc) + h) | 0, 1);

export const valuesEqual = (
  a: unknown,
  b: unknown,
  hooks: ValueHooks = NO_HOOKS
): boolean => {
  if (Array.isArray(a) && Array.isArray(b)) {
    return (
      a.length === b.length && a.every((item, i) => valuesEqual(item, b[i], hooks))
    );
  }
  if (typeof a === "object" && a !== null) {
    return hooks.equals(a, b) ?? a === b;
  }
  return a === b;
};

export const hashValue = (value: unknown, hooks: ValueHooks = NO_HOOKS): number => {
  switch (typeof value) {
    case "undefined":
      return 0;
    case "boolean":
      return value ? 1231 : 1237;
    case "number":
      return Number.isInteger(value) ? value | 0 : stringHash(String(value));
    case "bigint":
      return stringHash(value.toString());
    case "string":
      return stringHash(value);
    case "object":
      if (value === null) return 0;
      if (Array.isArray(value)) {
        return combineHashes(value.map((item: unknown) => hashValue(item, hooks)));
      }
      return hooks.hash(value) ?? 0;
    default:
      return 0;
  }
};

const sign = (n: number): number => (n < 0 ? -1 : n > 0 ? 1 : 0);

export const compareValues = (
  a: unknown,
  b: unknown,
  hooks: ValueHooks = NO_HOOKS
): number => {
  if (typeof a === "number" && typeof b === "number") {
    return sign(a - b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  if (typeof a === "object" && a !== null) {
    const result = hooks.compare(a, b);
    if (result !== undefined) return result;
  }
  throw new EvaluationError(
    `Values of type ${typeof a} and ${typeof b} cannot be compared`
  );
};

export const applyArithmetic = (
  operation: ArithmeticOperation,
  left: unknown,
  right?: unknown
): number => {
  if (typeof left !== "number") {
    throw new EvaluationError(`Cannot ${operation} a ${typeof left}`);
  }
  if (operation === "negate") {
    return -left;
  }
  if (typeof right !== "number") {
    throw new EvaluationError(`Cannot ${operation} by a ${typeof right}`);
  }
  switch (operation) {
    case "add":
      return left + right;
    case "subtract":
      return left - right;
    case "multiply":
      return left * right;
    case "divide":
      return left / right;
    case "remainder":
      return left % right;
  }
};
