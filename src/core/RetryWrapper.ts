import { JobLogger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/errors.js';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  minDelayMs?: number;
  maxDelayMs?: number;

  /**
   * Injected in tests so no real delay elapses
   */
  sleep?: (ms: number) => Promise<void>;

  label?: string;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Timeouts and connection failures are retried; everything else fails fast
 */
export function isTransientFailure(error: unknown): boolean {
  const message = toErrorMessage(error).toLowerCase();
  return message.includes('timeout') || message.includes('connection');
}

/**
 * Delay before the retry that follows the given (1-based) failed attempt
 */
export function backoffDelay(attempt: number, baseMs = 2000, minMs = 2000, maxMs = 10000): number {
  return Math.min(Math.max(baseMs * Math.pow(2, attempt - 1), minMs), maxMs);
}

/**
 * Retry with exponential backoff
 *
 * Up to maxAttempts calls (default 3), waiting 2s, 4s, 8s... capped at 10s
 * between them. The last error is rethrown once attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const sleep = options.sleep ?? defaultSleep;
  const logger = new JobLogger(`Retry:${options.label ?? 'extraction'}`);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransientFailure(error) || attempt >= maxAttempts) {
        throw error;
      }

      const waitMs = backoffDelay(attempt, options.baseDelayMs, options.minDelayMs, options.maxDelayMs);
      logger.warn(`Retry attempt ${attempt + 1}/${maxAttempts}`, {
        waitMs,
        error: toErrorMessage(error),
      });
      await sleep(waitMs);
    }
  }
}
