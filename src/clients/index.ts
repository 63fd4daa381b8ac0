/**
 * Client factory: one ProviderClient per provider name.
 */

import type { RunLogger } from "../logger.js";
import { AnthropicClient } from "./anthropicClient.js";
import { GeminiClient } from "./geminiClient.js";
import { OpenAIClient } from "./openaiClient.js";
import { OpenRouterClient } from "./openrouterClient.js";
import type { ProviderClient, ProviderClientFactory, ProviderClientOptions, ProviderName } from "./types.js";

export const SUPPORTED_PROVIDERS: readonly ProviderName[] = ["openai", "anthropic", "gemini", "openrouter"];

export function isSupportedProvider(provider: string): provider is ProviderName {
  return SUPPORTED_PROVIDERS.some((p) => p === provider);
}

export function createProviderClient(
  provider: string,
  credential: string,
  options: ProviderClientOptions = {}
): ProviderClient {
  const name = provider.toLowerCase();
  if (!isSupportedProvider(name)) {
    throw new Error(`Unsupported provider: ${provider}`);
  }
  switch (name) {
    case "openai":
      return new OpenAIClient(credential, options.logger);
    case "anthropic":
      return new AnthropicClient(credential, options.logger);
    case "gemini":
      return new GeminiClient(credential, options.logger);
    case "openrouter":
      return new OpenRouterClient(credential, options);
  }
}

/** Factory bound to fixed options; each call yields a fresh client with the caller's logger. */
export function providerClientFactory(options: Omit<ProviderClientOptions, "logger"> = {}): ProviderClientFactory {
  return (provider: string, credential: string, logger: RunLogger) =>
    createProviderClient(provider, credential, { ...options, logger });
}

export type { ApiResponse, CanonicalRequest, ChatMessage, ProviderClient, ProviderClientFactory } from "./types.js";
