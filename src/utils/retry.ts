import { logger } from './logger';
import { TimeoutError, errorMessage } from './errors';

export interface RetryOptions {
  operation: string;
  attempts: number;
  baseDelayMs: number;
  shouldRetry: (error: unknown) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Runs `fn` up to `attempts` times with exponential backoff between retryable failures. */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown = new Error(`${options.operation} was not attempted`);

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= options.attempts || !options.shouldRetry(error)) {
        throw error;
      }

      const delay = options.baseDelayMs * Math.pow(2, attempt - 1);
      logger.warn(`${options.operation} failed, backing off`, {
        attempt,
        delay,
        error: errorMessage(error),
      });
      await sleep(delay);
    }
  }

  throw lastError;
}

/** Rejects with TimeoutError when `promise` has not settled within `timeoutMs`. */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
