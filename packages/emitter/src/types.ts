/**
 * Java Emitter Types
 * Main dispatcher - re-exports from emitter-types/ subdirectory
 */

export type {
  EmitterOptions,
  EmitterContext,
  JavaFile,
} from "./emitter-types/index.js";
export {
  createContext,
  indent,
  dedent,
  withDeclaration,
  getIndent,
  indentLines,
} from "./emitter-types/index.js";
