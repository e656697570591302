/**
 * Retry logic with linear backoff.
 */

import { logger } from "../../logger";
import { ProviderBudgetError, ProviderExhaustedError, isRetryableBudgetOrRateLimit } from "./errors";
import { BASE_DELAY_MS, MAX_ATTEMPTS } from "./types";

const log = logger.child("Retry");

export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Provider name used in errors and logs. */
  provider: string;
  /** Lowers the attempt bound; values above MAX_ATTEMPTS are capped. */
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Injected so tests do not wait. */
  sleep?: Sleep;
}

/**
 * Execute a function with retry logic and linear backoff (base * attempt).
 *
 * Budget and rate-limit errors are never retried: they surface at once as
 * ProviderBudgetError. Anything else is retried until maxAttempts, capped
 * at MAX_ATTEMPTS, then surfaces as ProviderExhaustedError.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.min(MAX_ATTEMPTS, Math.max(1, options.maxAttempts ?? MAX_ATTEMPTS));
  const baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (isRetryableBudgetOrRateLimit(error)) {
        log.warn(`${options.provider} hit a budget or rate limit, not retrying`, {
          error: error instanceof Error ? error.message : String(error),
        });
        throw new ProviderBudgetError(options.provider, error);
      }

      if (attempt >= maxAttempts) {
        log.error(`${options.provider}: all ${maxAttempts} attempts failed, giving up`);
        throw new ProviderExhaustedError(options.provider, attempt, error);
      }

      const delay = baseDelayMs * attempt;
      log.warn(`${options.provider} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delay);
    }
  }
}
