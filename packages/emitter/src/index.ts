/**
 * semport emitter - Java source generator for target declarations and
 * enumerations
 */

export * from "./types.js";
export {
  escapeJavaIdentifier,
  isJavaKeyword,
  renderOutputPath,
  renderPackageName,
  renderTypeFQN,
} from "./emitter-types/index.js";
export { emitType, emitTypeArgument } from "./type-emitter.js";
export { emitDeclaration, emitTypeHeader } from "./declaration-emitter.js";
export { emitEnumeration } from "./enum-emitter.js";
export {
  emitEnumFile,
  emitEnumSources,
  emitJavaFile,
  emitJavaFiles,
  emitJavaSources,
} from "./emitter.js";
