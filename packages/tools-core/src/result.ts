/**
 * Outcome of an operation that reports failure as a value instead of throwing.
 * Callers branch on `ok`, then on whatever tag the error type carries.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Reads the errno-style `code` of a thrown value, if it has one. */
export function errorCodeOf(e: unknown): string | undefined {
  if (e && typeof e === 'object' && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}

export function errorMessageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
