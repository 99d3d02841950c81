/**
 * Exponential backoff for upstream calls
 */

import type { RetryConfig } from './types.js';
import { DEFAULT_RETRY_CONFIG } from './types.js';
import { createLogger } from './logger.js';

const logger = createLogger('retry');

export function backoffDelay(attempt: number, config: RetryConfig): number {
  return Math.min(
    config.baseDelay * Math.pow(config.backoffMultiplier, attempt),
    config.maxDelay
  );
}

/**
 * Runs `fn` until it resolves, retrying up to `config.maxRetries` times.
 * Errors rejected by `shouldRetry` are rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === config.maxRetries || !shouldRetry(error)) {
        break;
      }

      const delay = backoffDelay(attempt, config);

      logger.warn(`Retry attempt ${attempt + 1}/${config.maxRetries}`, {
        error: error instanceof Error ? error.message : String(error),
        nextRetryIn: delay,
      });

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
