// Error utility functions

/**
 * Ensure a value is an Error instance.
 * Converts non-Error values to Error with String representation.
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Short human-readable description of a thrown value, following `cause` chains
 * (fetch wraps socket errors as `TypeError: fetch failed` with the real reason
 * in `cause`).
 */
export function describeError(error: unknown): string {
  const err = ensureError(error);
  const parts = [err.message];
  let cause: unknown = err.cause;
  while (cause !== undefined && parts.length < 4) {
    const next = ensureError(cause);
    if (next.message && !parts.includes(next.message)) {
      parts.push(next.message);
    }
    cause = next.cause;
  }
  return parts.join(': ');
}
