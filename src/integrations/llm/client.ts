/**
 * AI backend clients: Anthropic for the primary tier, any OpenAI-compatible
 * chat completion endpoint (Groq by default) for the secondary tier.
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { ProviderResponseError } from "./errors";
import { SYSTEM_PROMPT } from "./prompts";
import { AnalysisProvider, CompletionOptions, ProviderResponse, ProviderSet } from "./types";

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
}

export interface OpenAICompatibleProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
}

/**
 * Primary provider on the Anthropic Messages API.
 * SDK retries are disabled; the gateway owns retry policy.
 */
export function createAnthropicProvider(options: AnthropicProviderOptions): AnalysisProvider {
  const client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  const name = `Anthropic (${options.model})`;

  return {
    kind: "primary",
    name,
    async complete(prompt: string, completion: CompletionOptions): Promise<ProviderResponse> {
      const message = await client.messages.create({
        model: options.model,
        max_tokens: completion.maxTokens,
        temperature: completion.temperature,
        system: SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
      });

      const text = message.content.map((block) => (block.type === "text" ? block.text : "")).join("");
      if (!text.trim()) {
        throw new ProviderResponseError(name, "empty content");
      }
      return {
        text,
        totalTokens: message.usage.input_tokens + message.usage.output_tokens,
      };
    },
  };
}

/**
 * Secondary provider on an OpenAI-compatible endpoint.
 */
export function createOpenAICompatibleProvider(options: OpenAICompatibleProviderOptions): AnalysisProvider {
  const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  const name = `OpenAI-compatible (${options.model})`;

  return {
    kind: "secondary",
    name,
    async complete(prompt: string, completion: CompletionOptions): Promise<ProviderResponse> {
      const response = await client.chat.completions.create({
        model: options.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature: completion.temperature,
        max_tokens: completion.maxTokens,
      });

      const text = response.choices[0]?.message?.content;
      if (!text || !text.trim()) {
        throw new ProviderResponseError(name, "empty content");
      }
      return { text, totalTokens: response.usage?.total_tokens };
    },
  };
}

export interface ProviderSettings {
  primary: { apiKey?: string; model: string };
  secondary: { apiKey?: string; baseUrl: string; model: string };
}

/**
 * Build the providers whose API keys are present. A missing key means the
 * tier is unavailable, not an error.
 */
export function createProviders(settings: ProviderSettings): ProviderSet {
  const providers: ProviderSet = {};
  if (settings.primary.apiKey) {
    providers.primary = createAnthropicProvider({ apiKey: settings.primary.apiKey, model: settings.primary.model });
  }
  if (settings.secondary.apiKey) {
    providers.secondary = createOpenAICompatibleProvider({
      apiKey: settings.secondary.apiKey,
      baseUrl: settings.secondary.baseUrl,
      model: settings.secondary.model,
    });
  }
  return providers;
}
