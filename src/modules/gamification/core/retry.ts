/**
 * Conflict retry for whole units of work.
 */

import { err, type Result } from 'neverthrow';

import { createConcurrencyConflictError, type GamificationError } from './errors.js';

import type { Logger } from 'pino';

export interface ConflictRetryOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Operation name used in logs */
  operation: string;
  logger: Logger;
}

/**
 * Re-runs `run` while it fails with ConcurrencyConflictError, up to `maxAttempts`
 * times. Any other outcome is returned as is.
 */
export async function withConflictRetry<T>(
  run: () => Promise<Result<T, GamificationError>>,
  options: ConflictRetryOptions
): Promise<Result<T, GamificationError>> {
  const { maxAttempts, operation, logger } = options;

  for (let attempt = 1; ; attempt++) {
    const result = await run();

    if (result.isOk() || result.error.type !== 'ConcurrencyConflictError') {
      return result;
    }

    if (attempt >= maxAttempts) {
      logger.error({ operation, attempts: attempt }, 'Write conflict persisted after retries');
      return err(
        createConcurrencyConflictError(
          `${operation} kept conflicting with concurrent updates after ${String(attempt)} attempts`,
          result.error
        )
      );
    }

    logger.warn({ operation, attempt, maxAttempts }, 'Write conflict, retrying operation');
  }
}
