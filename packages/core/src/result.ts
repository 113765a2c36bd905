/**
 * Outcome of a fallible operation. Per-call failures travel as values;
 * only startup configuration errors are thrown.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const success = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const failure = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Run `fn` and capture anything it throws as a failure built by `toError`.
 */
export function tryCatch<T, E>(fn: () => T, toError: (cause: unknown) => E): Result<T, E> {
  try {
    return success(fn());
  } catch (cause) {
    return failure(toError(cause));
  }
}

/** Async counterpart of {@link tryCatch}. */
export async function tryCatchAsync<T, E>(
  fn: () => Promise<T>,
  toError: (cause: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return success(await fn());
  } catch (cause) {
    return failure(toError(cause));
  }
}
