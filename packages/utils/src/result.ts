/**
 * Result type for explicit error handling at collaborator boundaries.
 * Callers branch on `result.ok` instead of catching exceptions.
 */

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

// Constructor functions
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Normalize anything thrown into an Error instance.
 */
export const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

// Async try-catch wrapper
export const tryCatchAsync = async <T, E = Error>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await fn());
  } catch (e) {
    return err(mapError(e));
  }
};
