/**
 * Main Java Emitter - Public API
 * One Java file per target declaration or enumeration
 */

import type { QualifiedName } from "@semport/frontend";
import type { TargetDeclaration, TargetEnum } from "@semport/mapper";
import { generateFileHeader } from "./constants.js";
import { emitDeclaration } from "./declaration-emitter.js";
import { emitEnumeration } from "./enum-emitter.js";
import {
  renderOutputPath,
  renderPackageName,
} from "./emitter-types/index.js";
import { createContext, type EmitterOptions, type JavaFile } from "./types.js";

const renderFile = (
  name: QualifiedName,
  sourceFile: string,
  body: readonly string[],
  options: EmitterOptions
): string => {
  const packageName = renderPackageName(name, options);
  const lines = [
    generateFileHeader(sourceFile, options),
    ...(packageName ? [`package ${packageName};`, ""] : []),
    ...body,
  ];
  return `${lines.join("\n")}\n`;
};

/**
 * Emit a complete Java file from a target declaration
 */
export const emitJavaFile = (
  declaration: TargetDeclaration,
  options: EmitterOptions = {}
): string =>
  renderFile(
    declaration.name,
    declaration.location.file,
    emitDeclaration(declaration, createContext(options)),
    options
  );

/**
 * Emit a complete Java file from a target enumeration
 */
export const emitEnumFile = (
  enumeration: TargetEnum,
  options: EmitterOptions = {}
): string =>
  renderFile(
    enumeration.name,
    enumeration.location.file,
    emitEnumeration(enumeration, createContext(options)),
    options
  );

/**
 * Emit every declaration with its output path
 */
export const emitJavaSources = (
  declarations: readonly TargetDeclaration[],
  options: EmitterOptions = {}
): readonly JavaFile[] =>
  declarations.map((declaration) => ({
    path: renderOutputPath(declaration.name, options),
    packageName: renderPackageName(declaration.name, options),
    code: emitJavaFile(declaration, options),
  }));

/**
 * Emit every enumeration with its output path
 */
export const emitEnumSources = (
  enumerations: readonly TargetEnum[],
  options: EmitterOptions = {}
): readonly JavaFile[] =>
  enumerations.map((enumeration) => ({
    path: renderOutputPath(enumeration.name, options),
    packageName: renderPackageName(enumeration.name, options),
    code: emitEnumFile(enumeration, options),
  }));

/**
 * Batch emit declarations, keyed by output path
 */
export const emitJavaFiles = (
  declarations: readonly TargetDeclaration[],
  options: EmitterOptions = {}
): Map<string, string> =>
  new Map(emitJavaSources(declarations, options).map((f) => [f.path, f.code]));
