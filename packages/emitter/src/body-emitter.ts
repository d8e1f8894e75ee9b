/**
 * Body Emitter - synthesized and untranslated method bodies
 *
 * Returns body lines relative to the enclosing block; callers indent them.
 */

import { qualifiedNamesEqual } from "@semport/frontend";
import type {
  ArithmeticOperation,
  TargetBody,
  TargetConstructor,
  TargetDeclaration,
  TargetField,
  TargetMethod,
  TargetTypeRef,
} from "@semport/mapper";
import { BOXED_PRIMITIVES, OBJECTS } from "./constants.js";
import {
  escapeJavaIdentifier,
  renderSimpleName,
} from "./emitter-types/index.js";
import { mayBeCloseable } from "./type-emitter.js";
import { indent, indentLines, type EmitterContext } from "./types.js";

type BodyOf<K extends TargetBody["kind"]> = Extract<TargetBody, { kind: K }>;

/** One level deeper than the enclosing block */
const nested = (
  lines: readonly string[],
  context: EmitterContext
): string[] => indentLines(lines, indent({ ...context, indentLevel: 0 }));

const block = (
  head: string,
  body: readonly string[],
  context: EmitterContext
): string[] => [`${head} {`, ...nested(body, context), "}"];

const tryCatch = (
  attempt: readonly string[],
  handler: readonly string[],
  context: EmitterContext
): string[] => [
  "try {",
  ...nested(attempt, context),
  "} catch (Exception e) {",
  ...nested(handler, context),
  "}",
];

const field = (name: string): string => `this.${escapeJavaIdentifier(name)}`;

const member = (target: string, name: string): string =>
  `${target}.${escapeJavaIdentifier(name)}`;

const findField = (
  declaration: TargetDeclaration,
  name: string
): TargetField | undefined =>
  declaration.members.find(
    (m): m is TargetField => m.kind === "field" && m.name === name
  );

const sourceInstanceFields = (
  declaration: TargetDeclaration
): readonly TargetField[] =>
  declaration.members.filter(
    (m): m is TargetField =>
      m.kind === "field" && !m.isStatic && m.origin === "source"
  );

const parameterName = (method: TargetMethod): string =>
  escapeJavaIdentifier(method.parameters[0]?.name ?? "other");

const isSelf = (
  type: TargetTypeRef | undefined,
  declaration: TargetDeclaration
): boolean =>
  type?.kind === "declared" && qualifiedNamesEqual(type.name, declaration.name);

const unsupported = (message: string): string =>
  `throw new UnsupportedOperationException(${JSON.stringify(message)});`;

/**
 * Untranslated source text kept as a comment above a throwing stub
 */
export const emitUntranslatedBody = (
  text: string | undefined,
  description: string
): string[] => {
  const source =
    text === undefined || text.trim() === ""
      ? []
      : [
          "// Untranslated source body:",
          ...text
            .split(/\r?\n/)
            .map((line) => `// ${line.trim()}`.trimEnd()),
        ];
  return [...source, unsupported(`${description} is not translated`)];
};

const collectFailure = (
  typeName: string,
  context: EmitterContext
): string[] => [
  ...block(
    "if (failure == null)",
    [
      `failure = new IllegalStateException(${JSON.stringify(
        `Releasing ${typeName} failed`
      )});`,
    ],
    context
  ),
  "failure.addSuppressed(e);",
];

const emitRelease = (
  method: TargetMethod,
  body: BodyOf<"release">,
  declaration: TargetDeclaration,
  context: EmitterContext
): string[] => {
  const typeName = renderSimpleName(declaration.name);
  const guard = field(body.guard);
  const resources = body.resources.map((name) => ({
    name,
    type: findField(declaration, name)?.type,
  }));
  const closeable = (type: TargetTypeRef | undefined): boolean =>
    type === undefined || mayBeCloseable(type);
  const collects =
    body.chainsToSuper || resources.some((r) => closeable(r.type));

  const lines: string[] = [
    ...block(`if (${guard})`, ["return;"], context),
    `${guard} = true;`,
  ];
  if (collects) {
    lines.push("IllegalStateException failure = null;");
  }

  for (const resource of resources) {
    const target = field(resource.name);
    if (resource.type?.kind === "primitive") {
      lines.push(
        `// ${resource.name} holds a primitive value; nothing to close`
      );
      continue;
    }
    if (closeable(resource.type)) {
      lines.push(
        ...tryCatch(
          block(
            `if (${target} instanceof AutoCloseable)`,
            [`((AutoCloseable) ${target}).close();`],
            context
          ),
          collectFailure(typeName, context),
          context
        )
      );
    }
    lines.push(`${target} = null;`);
  }

  if (body.chainsToSuper) {
    lines.push(
      ...tryCatch(
        [`super.${escapeJavaIdentifier(method.name)}();`],
        collectFailure(typeName, context),
        context
      )
    );
  }

  if (collects) {
    lines.push(...block("if (failure != null)", ["throw failure;"], context));
  }
  return lines;
};

const emitNoopRelease = (
  method: TargetMethod,
  body: BodyOf<"noopRelease">
): string[] =>
  body.chainsToSuper
    ? [`super.${escapeJavaIdentifier(method.name)}();`]
    : ["// Nothing owned to release"];

const emitEquals = (
  method: TargetMethod,
  body: BodyOf<"equals">,
  declaration: TargetDeclaration,
  context: EmitterContext
): string[] => {
  const other = parameterName(method);
  const typeName = renderSimpleName(declaration.name);
  const lines = [
    ...block(`if (this == ${other})`, ["return true;"], context),
    ...block(
      `if (!(${other} instanceof ${typeName}))`,
      ["return false;"],
      context
    ),
  ];
  if (body.fields.length === 0) {
    return [...lines, "return true;"];
  }
  const comparisons = body.fields.map(
    (name) => `${OBJECTS}.equals(${field(name)}, ${member("that", name)})`
  );
  return [
    ...lines,
    `${typeName} that = (${typeName}) ${other};`,
    `return ${comparisons.join(" && ")};`,
  ];
};

const emitHash = (body: BodyOf<"hash">): string[] => [
  `return ${OBJECTS}.hash(${body.fields.map(field).join(", ")});`,
];

const compareExpression = (
  name: string,
  type: TargetTypeRef | undefined,
  other: string
): string => {
  const mine = field(name);
  const theirs = member(other, name);
  switch (type?.kind) {
    case "primitive":
      return `${BOXED_PRIMITIVES[type.name]}.compare(${mine}, ${theirs})`;
    case "string":
    case "declared":
      return `${mine}.compareTo(${theirs})`;
    default:
      return `((Comparable) ${mine}).compareTo(${theirs})`;
  }
};

const emitCompare = (
  method: TargetMethod,
  body: BodyOf<"compare">,
  declaration: TargetDeclaration,
  context: EmitterContext
): string[] => {
  const typeName = renderSimpleName(declaration.name);
  if (!isSelf(method.parameters[0]?.type, declaration)) {
    return [
      unsupported(
        `${typeName}.${method.name} compares against another type and is not translated`
      ),
    ];
  }
  const other = parameterName(method);
  const expressions = body.fields.map((name) =>
    compareExpression(name, findField(declaration, name)?.type, other)
  );
  const last = expressions.pop();
  if (last === undefined) {
    return ["return 0;"];
  }
  if (expressions.length === 0) {
    return [`return ${last};`];
  }
  return [
    "int result;",
    ...expressions.flatMap((expression) => [
      `result = ${expression};`,
      ...block("if (result != 0)", ["return result;"], context),
    ]),
    `return ${last};`,
  ];
};

const OPERATION_SYMBOLS: Readonly<Record<ArithmeticOperation, string>> = {
  add: "+",
  subtract: "-",
  multiply: "*",
  divide: "/",
  remainder: "%",
  negate: "-",
};

const emitArithmetic = (
  method: TargetMethod,
  body: BodyOf<"arithmetic">,
  declaration: TargetDeclaration
): string[] => {
  const typeName = renderSimpleName(declaration.name);
  const fields = sourceInstanceFields(declaration);
  const hasFieldwiseConstructor = declaration.members.some(
    (m): m is TargetConstructor =>
      m.kind === "constructor" && m.parameters.length === fields.length
  );
  if (!hasFieldwiseConstructor) {
    return [
      unsupported(
        `${typeName}.${method.name} needs a constructor taking every field`
      ),
    ];
  }

  const symbol = OPERATION_SYMBOLS[body.operation];
  const operand = parameterName(method);
  const args = fields.map(({ name }) => {
    const mine = field(name);
    if (!body.fields.includes(name)) {
      return mine;
    }
    switch (body.operand) {
      case "instance":
        return `${mine} ${symbol} ${member(operand, name)}`;
      case "scalar":
        return `${mine} ${symbol} ${operand}`;
      case "none":
        return `${symbol}${mine}`;
    }
  });
  return [`return new ${typeName}(${args.join(", ")});`];
};

/**
 * Emit the body lines of a method; undefined for abstract methods
 */
export const emitMethodBody = (
  method: TargetMethod,
  declaration: TargetDeclaration,
  context: EmitterContext
): string[] | undefined => {
  const { body } = method;
  switch (body.kind) {
    case "abstract":
      return undefined;
    case "source":
      return emitUntranslatedBody(
        body.text,
        `${renderSimpleName(declaration.name)}.${method.name}`
      );
    case "release":
      return emitRelease(method, body, declaration, context);
    case "noopRelease":
      return emitNoopRelease(method, body);
    case "equals":
      return emitEquals(method, body, declaration, context);
    case "hash":
      return emitHash(body);
    case "compare":
      return emitCompare(method, body, declaration, context);
    case "arithmetic":
      return emitArithmetic(method, body, declaration);
  }
};

/**
 * Emit the body lines of a constructor, noting the fields it acquires
 */
export const emitConstructorBody = (
  constructor: TargetConstructor,
  declaration: TargetDeclaration
): string[] => {
  const acquires =
    constructor.acquires.length > 0
      ? [`// Acquires: ${constructor.acquires.join(", ")}`]
      : [];
  const text =
    constructor.body.kind === "source" ? constructor.body.text : undefined;
  return [
    ...acquires,
    ...emitUntranslatedBody(
      text,
      `${renderSimpleName(declaration.name)} constructor`
    ),
  ];
};
