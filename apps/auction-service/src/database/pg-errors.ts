import { QueryFailedError } from 'typeorm';
import { ConcurrencyError, ConflictError } from '@gemhouse/shared';

export const PG_UNIQUE_VIOLATION = '23505';

/**
 * PostgreSQL error codes that signal transient contention:
 * - 40001: serialization_failure
 * - 40P01: deadlock_detected
 * - 55P03: lock_not_available
 */
export const CONTENTION_PG_CODES = new Set(['40001', '40P01', '55P03']);

export function pgErrorCode(err: unknown): string | null {
  const source = err instanceof QueryFailedError ? err.driverError : err;
  if (
    typeof source === 'object' &&
    source !== null &&
    'code' in source &&
    typeof source.code === 'string'
  ) {
    return source.code;
  }
  return null;
}

function constraintName(err: unknown): string | null {
  const source = err instanceof QueryFailedError ? err.driverError : err;
  if (
    typeof source === 'object' &&
    source !== null &&
    'constraint' in source &&
    typeof source.constraint === 'string'
  ) {
    return source.constraint;
  }
  return null;
}

/** Maps driver errors onto the domain taxonomy; anything else passes through. */
export function translateDriverError(err: unknown): unknown {
  const code = pgErrorCode(err);
  if (code === PG_UNIQUE_VIOLATION) {
    const constraint = constraintName(err);
    return new ConflictError(
      `Unique constraint violated${constraint ? `: ${constraint}` : ''}`,
      'UNIQUE_VIOLATION',
      { constraint },
    );
  }
  if (code !== null && CONTENTION_PG_CODES.has(code)) {
    return new ConcurrencyError('Concurrent update detected, retry the operation', {
      pg_code: code,
    });
  }
  return err;
}
