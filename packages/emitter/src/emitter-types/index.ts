/**
 * Emitter types - Public API
 */

export type { EmitterOptions, EmitterContext, JavaFile } from "./core.js";
export {
  createContext,
  indent,
  dedent,
  withDeclaration,
  getIndent,
  indentLines,
} from "./context.js";
export {
  packageSegments,
  renderPackageName,
  renderSimpleName,
  renderTypeFQN,
  renderOutputPath,
} from "./fqn.js";
export { escapeJavaIdentifier, isJavaKeyword } from "./identifiers.js";
