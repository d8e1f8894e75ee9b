/**
 * Evaluation errors
 */

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

export type ReleaseFailure = {
  /** Field whose release threw */
  readonly resource: string;
  readonly error: unknown;
};

/**
 * Thrown once a release pass has attempted every resource and at least one
 * attempt failed. Carries every failure of the pass.
 */
export class ReleaseFailedError extends EvaluationError {
  readonly failures: readonly ReleaseFailure[];

  constructor(typeName: string, failures: readonly ReleaseFailure[]) {
    super(
      `Releasing ${typeName} failed for ${failures.length} resource(s): ${failures
        .map((f) => f.resource)
        .join(", ")}`
    );
    this.name = "ReleaseFailedError";
    this.failures = failures;
  }
}

export class UntranslatedBodyError extends EvaluationError {
  constructor(typeName: string, memberName: string) {
    super(`${typeName}.${memberName} has an untranslated body`);
    this.name = "UntranslatedBodyError";
  }
}
