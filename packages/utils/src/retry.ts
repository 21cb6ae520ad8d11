import { type Result, ok, err, toError } from './result.js';
import { createLogger } from './logger.js';

const logger = createLogger({ service: 'retry' });

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  // Fraction of the delay added or removed at random
  jitter: number;
  // Substrings of the error message or name worth another attempt; empty retries everything
  retryableErrors: readonly string[];
  random?: () => number;
}

export interface RetryError {
  type: 'retry_exhausted';
  message: string;
  attempts: number;
  lastError: Error;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before retry number `attempt` (1-based): exponential from
 * `initialDelayMs`, capped at `maxDelayMs`, then jittered.
 */
export function retryDelay(attempt: number, options: RetryOptions): number {
  const base = Math.min(
    options.initialDelayMs * Math.pow(options.multiplier, attempt - 1),
    options.maxDelayMs
  );
  const random = options.random ?? Math.random;
  const spread = base * options.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(base + spread));
}

export function isRetryable(error: Error, retryableErrors: readonly string[]): boolean {
  if (retryableErrors.length === 0) {
    return true;
  }
  const haystack = `${error.name} ${error.message}`.toLowerCase();
  return retryableErrors.some((needle) => haystack.includes(needle.toLowerCase()));
}

/**
 * Call `fn` until it resolves, an error is not retryable, or the attempts run
 * out. Never throws.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<Result<T, RetryError>> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError = new Error('No attempts made');
  let attempts = 0;

  while (attempts < maxAttempts) {
    attempts++;
    try {
      return ok(await fn());
    } catch (e) {
      lastError = toError(e);
      if (attempts >= maxAttempts || !isRetryable(lastError, options.retryableErrors)) {
        break;
      }
      const delayMs = retryDelay(attempts, options);
      logger.warn(
        { attempt: attempts, maxAttempts, delayMs, error: lastError.message },
        'Retrying after error'
      );
      await sleep(delayMs);
    }
  }

  return err({
    type: 'retry_exhausted',
    message: `Failed after ${attempts} attempt(s): ${lastError.message}`,
    attempts,
    lastError,
  });
}

// Transient errors get one extra attempt; the next scheduled sweep is the real retry
export const retryPresets = {
  mail: {
    maxAttempts: 2,
    initialDelayMs: 1000,
    maxDelayMs: 5000,
    multiplier: 2,
    jitter: 0.1,
    retryableErrors: ['timeout', 'ECONNRESET', 'ECONNREFUSED', '503', '429', '500'],
  },
  llm: {
    maxAttempts: 2,
    initialDelayMs: 2000,
    maxDelayMs: 10000,
    multiplier: 2,
    jitter: 0.2,
    retryableErrors: ['timeout', 'overloaded', 'rate_limit', '429', '503'],
  },
  embedding: {
    maxAttempts: 2,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    multiplier: 2,
    jitter: 0.2,
    retryableErrors: ['timeout', 'rate_limit', '429', '500', '503', 'ECONNRESET'],
  },
} as const satisfies Record<string, RetryOptions>;
