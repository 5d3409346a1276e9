/**
 * Bounded retries with exponential backoff for document-store calls: the
 * mutation applies on the write path and query executions on the read path.
 * Only `TransientBackendError` is retried.
 */

import { setTimeout as sleep } from 'timers/promises';
import { logger } from './logger';
import { RequestCancelledError, TransientBackendError, errorMessage } from './errors';

const BACKOFF_MULTIPLIER = 2;
const JITTER_FACTOR = 0.3;

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Spread each delay by up to 30% either way */
  jitter: boolean;
  operationName: string;
  /** Called after every failed attempt, retryable or not */
  onAttemptFailed?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
}

export type BackoffSettings = Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'jitter'>;

/**
 * Wait before the retry that follows failed attempt `attempt` (0-based).
 */
export function backoffDelay(attempt: number, settings: BackoffSettings): number {
  const base = Math.min(settings.initialDelayMs * BACKOFF_MULTIPLIER ** attempt, settings.maxDelayMs);
  const spread = settings.jitter ? (Math.random() * 2 - 1) * base * JITTER_FACTOR : 0;
  return Math.round(Math.max(0, base + spread));
}

async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error: unknown) {
    if (signal?.aborted) {
      throw new RequestCancelledError('Operation aborted');
    }
    throw error;
  }
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, operationName, signal } = options;

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) {
      throw new RequestCancelledError('Operation aborted');
    }

    try {
      return await fn(attempt);
    } catch (error: unknown) {
      options.onAttemptFailed?.(error, attempt);
      if (!(error instanceof TransientBackendError)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        logger.error({ operationName, attempts: attempt + 1, error: errorMessage(error) }, 'Retry budget exhausted');
        throw new RetryBudgetExceeded(operationName, attempt + 1, error);
      }

      const delayMs = backoffDelay(attempt, options);
      logger.warn({ operationName, attempt: attempt + 1, delayMs, error: errorMessage(error) }, 'Backend call failed, retrying');
      await pause(delayMs, signal);
    }
  }
}

/**
 * Thrown by `withRetry` once every attempt failed with a retryable error.
 * Callers translate it into their own `ExhaustedError` with a subject.
 */
export class RetryBudgetExceeded extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(operationName: string, attempts: number, lastError: unknown) {
    super(`${operationName} exhausted ${attempts} attempts: ${errorMessage(lastError)}`);
    this.name = 'RetryBudgetExceeded';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}
