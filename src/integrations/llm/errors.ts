/**
 * Provider error classification.
 */

import { isRecord, numberOf } from "../../utils/json";

const BUDGET_STATUS_CODES = new Set([429, 402]);

const BUDGET_KEYWORDS = [
  "rate limit",
  "quota",
  "budget",
  "billing",
  "insufficient credits",
  "usage limit",
];

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

/** Budget or rate limit hit. Never retried; the orchestrator moves to the next tier. */
export class ProviderBudgetError extends ProviderError {
  constructor(provider: string, cause: unknown) {
    super(`${provider} budget or rate limit exceeded: ${messageOf(cause)}`, provider, { cause });
    this.name = "ProviderBudgetError";
  }
}

export class ProviderExhaustedError extends ProviderError {
  constructor(
    provider: string,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(`${provider} failed after ${attempts} attempts: ${messageOf(cause)}`, provider, { cause });
    this.name = "ProviderExhaustedError";
  }
}

export class ProviderResponseError extends ProviderError {
  constructor(provider: string, message: string) {
    super(`${provider} returned an unusable response: ${message}`, provider);
    this.name = "ProviderResponseError";
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP-style status carried by SDK errors (status, statusCode, or a numeric code).
 */
export function statusOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const code = error.code;
  return (
    numberOf(error.status) ??
    numberOf(error.statusCode) ??
    (typeof code === "number" ? code : undefined)
  );
}

/**
 * True when the error is a budget or rate-limit condition.
 *
 * Despite the name, a true result means "do not retry this provider":
 * the caller should fall back to the next tier immediately.
 */
export function isRetryableBudgetOrRateLimit(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined && BUDGET_STATUS_CODES.has(status)) {
    return true;
  }
  const message = messageOf(error).toLowerCase();
  return BUDGET_KEYWORDS.some((keyword) => message.includes(keyword));
}
