/**
 * Uniform entry point to the configured AI providers, with retry and
 * error classification applied.
 */

import { logger, truncateForLog } from "../../logger";
import { ProviderError } from "./errors";
import { Sleep, withRetry } from "./retry";
import {
  BASE_DELAY_MS,
  CompletionOptions,
  DEFAULT_COMPLETION_OPTIONS,
  MAX_ATTEMPTS,
  ProviderKind,
  ProviderSet,
  estimateTokens,
} from "./types";

const log = logger.child("Gateway");

export interface GatewayOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  completion?: CompletionOptions;
  sleep?: Sleep;
}

export interface GatewayResponse {
  text: string;
  provider: string;
  /** Backend-reported usage when available, otherwise a character-count estimate. */
  estimatedTokens: number;
}

export interface ProviderGateway {
  has(kind: ProviderKind): boolean;
  providerName(kind: ProviderKind): string | undefined;
  /**
   * Send a prompt to the provider bound to `kind`.
   * Throws ProviderBudgetError, ProviderExhaustedError, or ProviderError when unbound.
   */
  invoke(prompt: string, kind: ProviderKind): Promise<GatewayResponse>;
}

export function createProviderGateway(providers: ProviderSet, options: GatewayOptions = {}): ProviderGateway {
  const completion = options.completion ?? DEFAULT_COMPLETION_OPTIONS;

  async function invoke(prompt: string, kind: ProviderKind): Promise<GatewayResponse> {
    const provider = providers[kind];
    if (!provider) {
      throw new ProviderError(`No ${kind} provider configured`, kind);
    }

    const estimated = estimateTokens(prompt);
    log.info(`Invoking ${provider.name}`, { estimatedTokens: estimated });
    log.debug("Prompt", { prompt: truncateForLog(prompt) });

    const response = await withRetry(() => provider.complete(prompt, completion), {
      provider: provider.name,
      maxAttempts: options.maxAttempts ?? MAX_ATTEMPTS,
      baseDelayMs: options.baseDelayMs ?? BASE_DELAY_MS,
      sleep: options.sleep,
    });

    log.debug("Response", { response: truncateForLog(response.text) });
    return {
      text: response.text,
      provider: provider.name,
      estimatedTokens: response.totalTokens ?? estimated,
    };
  }

  return {
    has: (kind) => providers[kind] !== undefined,
    providerName: (kind) => providers[kind]?.name,
    invoke,
  };
}
