/**
 * Analysis provider types and constants.
 */

// ============================================================================
// Providers
// ============================================================================

/**
 * Which AI tier a provider serves.
 */
export type ProviderKind = "primary" | "secondary";

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
}

export interface ProviderResponse {
  text: string;
  /** Total tokens reported by the backend, when it reports usage. */
  totalTokens?: number;
}

/**
 * Capability handle for one AI backend. Constructed only when its API key is set.
 */
export interface AnalysisProvider {
  readonly kind: ProviderKind;
  /** Display name, e.g. "Anthropic (claude-3-5-sonnet-20241022)". */
  readonly name: string;
  complete(prompt: string, options: CompletionOptions): Promise<ProviderResponse>;
}

export type ProviderSet = Partial<Record<ProviderKind, AnalysisProvider>>;

// ============================================================================
// Retry
// ============================================================================

/** Attempts per provider for transient errors */
export const MAX_ATTEMPTS = 3;

/** Base delay; attempt N waits BASE_DELAY_MS * N */
export const BASE_DELAY_MS = 2000;

export const DEFAULT_COMPLETION_OPTIONS: CompletionOptions = {
  maxTokens: 3000,
  temperature: 0.1,
};

/**
 * Rough token estimate for cost logging (about four characters per token).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
