/**
 * Success/failure sum type used by the store's mutation pipeline.
 *
 * Remote calls are settled into a `Result` once, at the edge, so that the
 * reconciliation and rollback steps are plain functions of their inputs.
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Await a promise and capture its outcome, mapping a rejection through `mapError`.
 */
export async function settle<T, E>(
  promise: Promise<T>,
  mapError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (e) {
    return err(mapError(e));
  }
}
