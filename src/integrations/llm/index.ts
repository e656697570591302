/**
 * AI provider integration: backend clients, the retrying gateway, prompts
 * and response parsing.
 *
 * Provider output is advisory. Callers treat any error thrown from here as
 * "tier unavailable" and move on to the next tier.
 */

export type {
  AnalysisProvider,
  CompletionOptions,
  ProviderKind,
  ProviderResponse,
  ProviderSet,
} from "./types";
export { BASE_DELAY_MS, DEFAULT_COMPLETION_OPTIONS, MAX_ATTEMPTS, estimateTokens } from "./types";

export {
  ProviderBudgetError,
  ProviderError,
  ProviderExhaustedError,
  ProviderResponseError,
  isRetryableBudgetOrRateLimit,
} from "./errors";

export { withRetry, sleep } from "./retry";
export type { RetryOptions, Sleep } from "./retry";

export { createProviderGateway } from "./gateway";
export type { GatewayOptions, GatewayResponse, ProviderGateway } from "./gateway";

export { createAnthropicProvider, createOpenAICompatibleProvider, createProviders } from "./client";
export type { ProviderSettings } from "./client";

export { buildFocusedPrompt, buildSecurityPrompt } from "./prompts";
export { extractJsonObject, parseTierVerdict } from "./parsing";
