/**
 * Provider client abstraction types.
 */

import type { RunLogger } from "../logger.js";

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/** Provider-neutral request, built once per rated output */
export interface CanonicalRequest {
  messages: ChatMessage[];
  model: string;
  temperature: number;
  maxTokens?: number;
  seed?: number;
  /** Extra provider parameters, passed through where the provider accepts them */
  extra?: Record<string, unknown>;
}

export interface ApiUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/** Normalized provider reply; content is always present on success */
export interface ApiResponse {
  content: string;
  usage?: ApiUsage;
  model: string;
  reasoning?: string;
}

/**
 * A configured client. invoke() resolves with a complete ApiResponse or
 * rejects with a ProviderError; clients keep no request-scoped state.
 */
export interface ProviderClient {
  readonly provider: string;
  invoke(req: CanonicalRequest): Promise<ApiResponse>;
}

export type ProviderName = "openai" | "anthropic" | "gemini" | "openrouter";

export interface ProviderClientOptions {
  /** OpenRouter HTTP-Referer header */
  siteUrl?: string;
  /** OpenRouter X-Title header */
  siteName?: string;
  /** Replaces global fetch (OpenRouter only) */
  fetch?: typeof fetch;
  logger?: RunLogger;
}

/** Builds one client per worker; the logger is that worker's channel */
export type ProviderClientFactory = (
  provider: string,
  credential: string,
  logger: RunLogger
) => ProviderClient;
