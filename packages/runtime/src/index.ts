/**
 * semport runtime - reference evaluator for mapped target declarations
 */

export {
  instantiate,
  isTargetInstance,
  type FieldValues,
  type TargetInstance,
  type InstantiateOptions,
} from "./instance.js";
export {
  EvaluationError,
  ReleaseFailedError,
  UntranslatedBodyError,
  type ReleaseFailure,
} from "./errors.js";
export {
  valuesEqual,
  hashValue,
  compareValues,
  stringHash,
  combineHashes,
  isReleasable,
  type Releasable,
} from "./values.js";
