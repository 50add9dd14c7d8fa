import { isDomainError } from '@libs/core';
import { ZodError } from 'zod';
import { isRetryableHttpError } from './http.util';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Defaults to isTransientFeedError. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Transport failures are worth another attempt. Errors that already carry a domain meaning
 * (an unavailable feed, a malformed candle) and payloads that failed validation are final.
 */
export const isTransientFeedError = (error: unknown): boolean => {
  if (isDomainError(error) || error instanceof ZodError) return false;
  return isRetryableHttpError(error);
};

export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);

export const retry = async <T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> => {
  const { attempts, baseDelayMs, maxDelayMs = 30_000, shouldRetry = isTransientFeedError, onRetry } = options;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delayMs);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
};
