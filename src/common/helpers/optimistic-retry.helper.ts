import { Logger } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { ConcurrentModificationError } from '../errors/betting.errors';

export interface OptimisticRetryOptions {
  operation: string;
  maxRetries: number;
  logger?: Logger;
  onConflict?: (attempt: number) => void;
}

/**
 * Runs `attempt` and re-runs it when it loses an optimistic version check.
 * The callback must re-read state and re-validate its guards on every call;
 * nothing from a failed attempt is carried over.
 */
export async function withOptimisticRetry<T>(
  options: OptimisticRetryOptions,
  attempt: (attemptNumber: number) => Promise<T>,
): Promise<T> {
  let attemptNumber = 0;

  for (;;) {
    attemptNumber++;
    try {
      return await attempt(attemptNumber);
    } catch (error) {
      if (!(error instanceof ConcurrentModificationError)) {
        throw error;
      }

      options.onConflict?.(attemptNumber);

      if (attemptNumber > options.maxRetries) {
        options.logger?.warn(
          `${options.operation}: giving up after ${attemptNumber} conflicting attempts`,
        );
        throw error;
      }

      options.logger?.debug(`${options.operation}: version conflict, retry ${attemptNumber}`);
    }
  }
}

/**
 * True when the driver rejected an insert because of a unique index (Postgres 23505).
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }

  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === '23505'
  );
}
