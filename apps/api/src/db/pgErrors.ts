import { isRecord } from '../lib/serviceClient';

const UNIQUE_VIOLATION = '23505';

/**
 * True when `err` (or an error it wraps) is a unique violation, optionally on
 * a specific constraint or index.
 */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && isRecord(current); depth++) {
    if (current.code === UNIQUE_VIOLATION) {
      return constraint === undefined || current.constraint === constraint;
    }
    current = current.cause;
  }
  return false;
}
