/**
 * Discriminated union for operations that can fail expectedly.
 * Forces callers to handle both success and failure paths.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** Create a successful Result. */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Create a failed Result. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ─── Lookup ─────────────────────────────────────────────────────

/**
 * Outcome of a keyed lookup against a remote source.
 * "Not found" is an answer, not a failure, so it gets its own branch
 * instead of sharing one with transport problems.
 */
export type Lookup<T, E = Error> =
  | { readonly status: 'found'; readonly value: T }
  | { readonly status: 'not-found' }
  | { readonly status: 'transport-error'; readonly error: E };

export function found<T>(value: T): Lookup<T, never> {
  return { status: 'found', value };
}

export function notFound(): Lookup<never, never> {
  return { status: 'not-found' };
}

export function transportError<E>(error: E): Lookup<never, E> {
  return { status: 'transport-error', error };
}
