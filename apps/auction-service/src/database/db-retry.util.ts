import { Logger } from '@nestjs/common';
import { ConcurrencyError } from '@gemhouse/shared';
import { CONTENTION_PG_CODES, pgErrorCode } from './pg-errors';

const logger = new Logger('DbRetry');

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 100;

/**
 * Connection-level PostgreSQL codes worth another attempt:
 * - 08006: connection_failure
 * - 08001: sqlclient_unable_to_establish_sqlconnection
 * - 08004: sqlserver_rejected_establishment_of_sqlconnection
 * - 57P01: admin_shutdown (server restart)
 */
const RETRYABLE_CONNECTION_CODES = new Set(['08006', '08001', '08004', '57P01']);

const RETRYABLE_MESSAGES = [
  'connection reset',
  'connection terminated',
  'ECONNRESET',
  'ECONNREFUSED',
  'Connection terminated unexpectedly',
];

export function isRetryableError(err: unknown): boolean {
  if (err instanceof ConcurrencyError) return true;
  if (!(err instanceof Error)) return false;

  const code = pgErrorCode(err);
  if (code && (CONTENTION_PG_CODES.has(code) || RETRYABLE_CONNECTION_CODES.has(code))) {
    return true;
  }

  return RETRYABLE_MESSAGES.some((fragment) => err.message.includes(fragment));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  context?: string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Re-runs `fn` on contention (ConcurrencyError, deadlock, serialization
 * failure) and transient connection loss. Business errors and constraint
 * violations are rethrown on the first attempt.
 */
export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = options?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const context = options?.context ?? 'db_operation';
  const sleep =
    options?.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !isRetryableError(err)) {
        throw err;
      }

      // Exponential backoff with jitter
      const delay = baseDelayMs * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);

      logger.warn(
        JSON.stringify({
          event: 'db_retry',
          context,
          attempt: attempt + 1,
          max_retries: maxRetries,
          delay_ms: Math.round(delay),
          error_code: pgErrorCode(err),
          error_message: err instanceof Error ? err.message : String(err),
        }),
      );

      await sleep(delay);
    }
  }
}
