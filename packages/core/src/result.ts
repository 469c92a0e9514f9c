export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };

/** Outcome of a boundary call whose failure the caller must handle explicitly. */
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/** Run an async operation and capture a rejection as an `Err`. */
export async function attempt<T, E>(
  operation: () => Promise<T>,
  mapError: (cause: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return ok(await operation());
  } catch (cause) {
    return err(mapError(cause));
  }
}
