/**
 * Result type for operations whose failures are expected values
 * (missing files, malformed documents) rather than exceptions.
 */

export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

/**
 * Chain a Result-returning step onto a successful result.
 */
export const andThen = <T1, T2, E>(
  result: Result<T1, E>,
  fn: (data: T1) => Result<T2, E>
): Result<T2, E> => {
  if (result.success) {
    return fn(result.data);
  }
  return result;
};
