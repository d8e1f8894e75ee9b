/**
 * Construct classifier - Public API
 */

export type {
  ClassifiedMember,
  ClassifiedKind,
  ClassifiedField,
  ClassifiedConstructor,
  ClassifiedDestructor,
  ClassifiedMethod,
  ClassifiedAbstractMethod,
  ClassifiedOperator,
} from "./types.js";
export { classifyMembers } from "./classify.js";
export { parseOperatorName, type OperatorName } from "./operators.js";
