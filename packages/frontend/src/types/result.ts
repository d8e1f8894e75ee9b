/**
 * Result type for functional error handling
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  result.ok ? result.value : defaultValue;

/**
 * Combine a list of results, keeping every error rather than the first one
 */
export const collectResults = <T, E>(
  results: readonly Result<T, readonly E[]>[]
): Result<readonly T[], readonly E[]> => {
  const values: T[] = [];
  const errors: E[] = [];

  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(...result.error);
    }
  }

  return errors.length > 0 ? error(errors) : ok(values);
};
