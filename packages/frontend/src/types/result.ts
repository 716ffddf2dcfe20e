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

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

/**
 * Combine element results, keeping every error in element order.
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
