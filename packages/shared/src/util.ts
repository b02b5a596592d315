/**
 * Coerces an unknown error into a proper Error object.
 */
export const toError = (e: unknown): Error => {
  if (e instanceof Error) return e;
  if (typeof e === 'string') return new Error(e);
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return new Error(e.message);
  }
  try {
    return new Error(`Unknown error: ${JSON.stringify(e)}`);
  } catch {
    return new Error(`Unknown error: ${String(e)}`);
  }
};

/**
 * True when `e` is a node system error with the given errno code (ENOENT, EACCES, ...).
 */
export const hasErrorCode = (e: unknown, code: string): boolean =>
  e instanceof Error && 'code' in e && e.code === code;
