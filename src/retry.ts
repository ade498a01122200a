/**
 * Retrying flaky async work with exponential backoff
 */

import logger from './logger';

export interface RetryOptions {
  maxRetries?: number; // Extra attempts after the first (default: 3)
  retryDelay?: number; // Delay before the first retry in ms, doubled each time (default: 1000)
  label?: string; // Names the operation in log lines
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

export function backoffDelay(retryDelay: number, attempt: number): number {
  return retryDelay * 2 ** (attempt - 1);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `fn` until it resolves, a non-retryable error is thrown or the
 * retries are used up. The last error is rethrown unchanged.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, retryDelay = 1000, label = 'operation', shouldRetry, onRetry } = options;
  const attempts = maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (caught) {
      const error = toError(caught);

      if (shouldRetry && !shouldRetry(error)) {
        logger.debug({ label, error: error.message }, 'Not retrying');
        throw error;
      }
      if (attempt >= attempts) {
        logger.error({ label, attempts, error: error.message }, 'Giving up after retries');
        throw error;
      }

      const delay = backoffDelay(retryDelay, attempt);
      logger.warn({ label, attempt, attempts, delay, error: error.message }, 'Retrying');
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
