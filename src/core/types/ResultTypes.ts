/**
 * Outcome of a fallible hub operation.
 *
 * Provider refreshes, widget renders, pushes and config loads all return
 * one; exceptions from fetch, sharp or fs are turned into `E` where they
 * are caught.
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Wrap a value; `success(undefined)` for operations with nothing to return
 */
export function success<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

/**
 * Wrap an error, usually one of the BaseError families
 */
export function failure<E = Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Narrow to the success branch
 */
export function isSuccess<T, E>(
  result: Result<T, E>,
): result is { success: true; data: T } {
  return result.success === true;
}

/**
 * Narrow to the failure branch
 */
export function isFailure<T, E>(
  result: Result<T, E>,
): result is { success: false; error: E } {
  return result.success === false;
}
