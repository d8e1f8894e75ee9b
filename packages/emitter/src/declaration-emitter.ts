/**
 * Declaration Emitter - one target declaration to one Java class or interface
 */

import type {
  TargetConstructor,
  TargetDeclaration,
  TargetField,
  TargetMethod,
  TargetParameter,
} from "@semport/mapper";
import { emitConstructorBody, emitMethodBody } from "./body-emitter.js";
import {
  escapeJavaIdentifier,
  renderSimpleName,
  renderTypeFQN,
} from "./emitter-types/index.js";
import { emitType } from "./type-emitter.js";
import {
  indent,
  indentLines,
  withDeclaration,
  type EmitterContext,
} from "./types.js";

const emitParameters = (
  parameters: readonly TargetParameter[],
  context: EmitterContext
): string =>
  parameters
    .map((p) => `${emitType(p.type, context)} ${escapeJavaIdentifier(p.name)}`)
    .join(", ");

/**
 * Supertypes the capabilities add: `AutoCloseable`, `Comparable<T>`
 */
const capabilityInterfaces = (declaration: TargetDeclaration): string[] =>
  declaration.capabilities.map((capability) =>
    capability === "releasable"
      ? "AutoCloseable"
      : `Comparable<${renderSimpleName(declaration.name)}>`
  );

/**
 * Emit the `class`/`interface` line
 */
export const emitTypeHeader = (
  declaration: TargetDeclaration,
  context: EmitterContext
): string => {
  const name = renderSimpleName(declaration.name);
  const interfaces = [
    ...declaration.interfaces.map((i) => renderTypeFQN(i, context.options)),
    ...capabilityInterfaces(declaration),
  ];

  if (declaration.kind === "interface") {
    const extendsClause =
      interfaces.length > 0 ? ` extends ${interfaces.join(", ")}` : "";
    return `public interface ${name}${extendsClause}`;
  }

  const modifiers =
    declaration.kind === "abstractClass" ? "public abstract class" : "public class";
  const extendsClause = declaration.superClass
    ? ` extends ${renderTypeFQN(declaration.superClass, context.options)}`
    : "";
  const implementsClause =
    interfaces.length > 0 ? ` implements ${interfaces.join(", ")}` : "";
  return `${modifiers} ${name}${extendsClause}${implementsClause}`;
};

const emitField = (field: TargetField, context: EmitterContext): string[] => {
  const name = escapeJavaIdentifier(field.name);
  const type = emitType(field.type, context);
  if (context.declaration?.kind === "interface") {
    // Interfaces carry no state
    return [`// field ${name} (${type}) cannot be declared on an interface`];
  }
  const visibility = field.origin === "source" ? "protected" : "private";
  return [
    `${visibility}${field.isStatic ? " static" : ""} ${type} ${name};`,
  ];
};

const emitConstructor = (
  constructor: TargetConstructor,
  declaration: TargetDeclaration,
  context: EmitterContext
): string[] => [
  `public ${renderSimpleName(declaration.name)}(${emitParameters(
    constructor.parameters,
    context
  )}) {`,
  ...indentLines(
    emitConstructorBody(constructor, declaration),
    indent({ ...context, indentLevel: 0 })
  ),
  "}",
];

const methodModifiers = (
  method: TargetMethod,
  declaration: TargetDeclaration,
  hasBody: boolean
): string => {
  if (declaration.kind === "interface") {
    if (method.isStatic) return "static ";
    return hasBody ? "default " : "";
  }
  return [
    "public",
    method.isStatic ? "static" : undefined,
    hasBody ? undefined : "abstract",
  ]
    .filter((m): m is string => m !== undefined)
    .map((m) => `${m} `)
    .join("");
};

const emitMethod = (
  method: TargetMethod,
  declaration: TargetDeclaration,
  context: EmitterContext
): string[] => {
  const body = emitMethodBody(method, declaration, context);
  const signature = `${methodModifiers(method, declaration, body !== undefined)}${emitType(
    method.returnType,
    context
  )} ${escapeJavaIdentifier(method.name)}(${emitParameters(
    method.parameters,
    context
  )})`;
  const annotation = method.isOverride ? ["@Override"] : [];
  if (body === undefined) {
    return [...annotation, `${signature};`];
  }
  return [
    ...annotation,
    `${signature} {`,
    ...indentLines(body, indent({ ...context, indentLevel: 0 })),
    "}",
  ];
};

/**
 * Emit a declaration's type body: fields first, then each constructor and
 * method separated by a blank line
 */
export const emitDeclaration = (
  declaration: TargetDeclaration,
  context: EmitterContext
): string[] => {
  const scoped = withDeclaration(context, declaration);
  const fields = declaration.members.flatMap((m) =>
    m.kind === "field" ? emitField(m, scoped) : []
  );
  const callables = declaration.members.flatMap((m) => {
    switch (m.kind) {
      case "field":
        return [];
      case "constructor":
        return [emitConstructor(m, declaration, scoped)];
      case "method":
        return [emitMethod(m, declaration, scoped)];
    }
  });

  const sections = [...(fields.length > 0 ? [fields] : []), ...callables];
  const body = sections.flatMap((section, i) =>
    i === 0 ? section : ["", ...section]
  );

  return [
    `${emitTypeHeader(declaration, scoped)} {`,
    ...indentLines(body, indent(scoped)),
    "}",
  ];
};
