/**
 * In-process evaluation of target declarations
 *
 * Executes the bodies the mapper synthesizes (release, equality, hashing,
 * comparison, arithmetic) against plain field values. Untranslated source
 * bodies throw.
 */

import { qualifiedNameKey } from "@semport/frontend";
import type {
  TargetBody,
  TargetDeclaration,
  TargetField,
  TargetMethod,
} from "@semport/mapper";
import {
  EvaluationError,
  ReleaseFailedError,
  UntranslatedBodyError,
  type ReleaseFailure,
} from "./errors.js";
import {
  applyArithmetic,
  combineHashes,
  compareValues,
  hashValue,
  isReleasable,
  valuesEqual,
  type ValueHooks,
} from "./values.js";

export type FieldValues = Readonly<Record<string, unknown>>;

export type TargetInstance = {
  readonly declaration: TargetDeclaration;
  readonly get: (field: string) => unknown;
  readonly invoke: (method: string, ...args: readonly unknown[]) => unknown;
};

export type InstantiateOptions = {
  /** Superclass part, released after this instance when the release chains */
  readonly superclass?: TargetInstance;
};

type InstanceState = {
  readonly instance: TargetInstance;
  readonly fields: Map<string, unknown>;
  readonly options: InstantiateOptions;
};

const states = new WeakMap<object, InstanceState>();

const stateOf = (value: unknown): InstanceState | undefined =>
  typeof value === "object" && value !== null ? states.get(value) : undefined;

export const isTargetInstance = (value: unknown): value is TargetInstance =>
  stateOf(value) !== undefined;

const typeName = (declaration: TargetDeclaration): string =>
  qualifiedNameKey(declaration.name);

const findMethod = (
  declaration: TargetDeclaration,
  name: string,
  arity: number
): TargetMethod | undefined =>
  declaration.members.find(
    (m): m is TargetMethod =>
      m.kind === "method" && m.name === name && m.parameters.length === arity
  );

const hasMethod = (value: unknown, name: string, arity: number): boolean => {
  const state = stateOf(value);
  return (
    state !== undefined &&
    findMethod(state.instance.declaration, name, arity) !== undefined
  );
};

const hooks: ValueHooks = {
  equals: (a, b) =>
    hasMethod(a, "equals", 1) && isTargetInstance(a)
      ? a.invoke("equals", b) === true
      : undefined,
  hash: (value) => {
    if (!hasMethod(value, "hashCode", 0) || !isTargetInstance(value)) {
      return undefined;
    }
    const result = value.invoke("hashCode");
    return typeof result === "number" ? result : undefined;
  },
  compare: (a, b) => {
    if (!hasMethod(a, "compareTo", 1) || !isTargetInstance(a)) {
      return undefined;
    }
    const result = a.invoke("compareTo", b);
    return typeof result === "number" ? result : undefined;
  },
};

const sameType = (a: TargetDeclaration, b: TargetDeclaration): boolean =>
  typeName(a) === typeName(b);

const instanceFields = (
  declaration: TargetDeclaration
): readonly TargetField[] =>
  declaration.members.filter(
    (m): m is TargetField => m.kind === "field" && !m.isStatic
  );

const release = (
  state: InstanceState,
  method: TargetMethod,
  body: Extract<TargetBody, { kind: "release" }>
): void => {
  const { fields, instance } = state;
  if (fields.get(body.guard) === true) {
    return;
  }
  fields.set(body.guard, true);

  const failures: ReleaseFailure[] = [];
  for (const resource of body.resources) {
    const value = fields.get(resource);
    try {
      if (isReleasable(value)) {
        value.release();
      }
    } catch (e) {
      failures.push({ resource, error: e });
    }
    fields.set(resource, undefined);
  }

  failures.push(...releaseSuperclass(state, method, body.chainsToSuper));

  if (failures.length > 0) {
    throw new ReleaseFailedError(typeName(instance.declaration), failures);
  }
};

const releaseSuperclass = (
  state: InstanceState,
  method: TargetMethod,
  chainsToSuper: boolean
): readonly ReleaseFailure[] => {
  const { superclass } = state.options;
  if (!chainsToSuper || !superclass) {
    return [];
  }
  try {
    superclass.invoke(method.name);
    return [];
  } catch (e) {
    return e instanceof ReleaseFailedError
      ? e.failures
      : [{ resource: "super", error: e }];
  }
};

const fieldValuesOf = (state: InstanceState): Record<string, unknown> => {
  const values: Record<string, unknown> = {};
  for (const field of instanceFields(state.instance.declaration)) {
    if (field.origin === "source") {
      values[field.name] = state.fields.get(field.name);
    }
  }
  return values;
};

const evaluate = (
  state: InstanceState,
  method: TargetMethod,
  args: readonly unknown[]
): unknown => {
  const { instance, fields } = state;
  const { declaration } = instance;
  const { body } = method;
  const [operand] = args;

  switch (body.kind) {
    case "source":
    case "abstract":
      throw new UntranslatedBodyError(typeName(declaration), method.name);

    case "release":
      release(state, method, body);
      return undefined;

    case "noopRelease": {
      const failures = releaseSuperclass(state, method, body.chainsToSuper);
      if (failures.length > 0) {
        throw new ReleaseFailedError(typeName(declaration), failures);
      }
      return undefined;
    }

    case "equals": {
      if (operand === instance) return true;
      const other = stateOf(operand);
      if (!other || !sameType(other.instance.declaration, declaration)) {
        return false;
      }
      return body.fields.every((f) =>
        valuesEqual(fields.get(f), other.fields.get(f), hooks)
      );
    }

    case "hash":
      return combineHashes(
        body.fields.map((f) => hashValue(fields.get(f), hooks))
      );

    case "compare": {
      const other = stateOf(operand);
      if (!other) {
        throw new EvaluationError(
          `${typeName(declaration)}.${method.name} expects an instance`
        );
      }
      for (const f of body.fields) {
        const result = compareValues(fields.get(f), other.fields.get(f), hooks);
        if (result !== 0) return result;
      }
      return 0;
    }

    case "arithmetic": {
      const other = body.operand === "instance" ? stateOf(operand) : undefined;
      if (body.operand === "instance" && !other) {
        throw new EvaluationError(
          `${typeName(declaration)}.${method.name} expects an instance`
        );
      }
      const values = fieldValuesOf(state);
      for (const f of body.fields) {
        const right =
          body.operand === "instance"
            ? other?.fields.get(f)
            : body.operand === "scalar"
              ? operand
              : undefined;
        values[f] = applyArithmetic(body.operation, fields.get(f), right);
      }
      return instantiate(declaration, values, state.options);
    }
  }
};

/**
 * Create an evaluated instance of a concrete target declaration
 */
export const instantiate = (
  declaration: TargetDeclaration,
  fieldValues: FieldValues = {},
  options: InstantiateOptions = {}
): TargetInstance => {
  if (declaration.kind !== "concreteClass") {
    throw new EvaluationError(
      `Cannot instantiate ${declaration.kind} ${typeName(declaration)}`
    );
  }

  const declared = instanceFields(declaration);
  const known = new Set(declared.map((f) => f.name));
  const unknown = Object.keys(fieldValues).filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new EvaluationError(
      `${typeName(declaration)} has no field(s) ${unknown.join(", ")}`
    );
  }

  const fields = new Map<string, unknown>(
    declared.map((f) => [
      f.name,
      f.name in fieldValues
        ? fieldValues[f.name]
        : f.type.kind === "primitive" && f.type.name === "boolean"
          ? false
          : undefined,
    ])
  );

  const instance: TargetInstance = {
    declaration,
    get: (field) => {
      if (!known.has(field)) {
        throw new EvaluationError(
          `${typeName(declaration)} has no field ${field}`
        );
      }
      return fields.get(field);
    },
    invoke: (name, ...args) => {
      const method = findMethod(declaration, name, args.length);
      if (!method) {
        throw new EvaluationError(
          `${typeName(declaration)} has no method ${name}/${args.length}`
        );
      }
      return evaluate(state, method, args);
    },
  };

  const state: InstanceState = { instance, fields, options };
  states.set(instance, state);
  return instance;
};
