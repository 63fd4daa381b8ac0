/**
 * Anthropic client using the Messages API.
 * seed is not supported and is never sent; system turns go to the system parameter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { RunLogger } from "../logger.js";
import type { ProviderError } from "../errors.js";
import { providerErrorFromStatus, transportError, unknownError } from "./errorMapping.js";
import type { ApiResponse, CanonicalRequest, ProviderClient } from "./types.js";

const PROVIDER = "anthropic";
const DEFAULT_MAX_TOKENS = 64;

export function buildAnthropicParams(req: CanonicalRequest): Anthropic.MessageCreateParamsNonStreaming {
  const messages: Anthropic.MessageParam[] = [];
  const system: string[] = [];
  for (const m of req.messages) {
    if (m.role === "system") system.push(m.content);
    else messages.push({ role: m.role, content: m.content });
  }

  const params: Anthropic.MessageCreateParamsNonStreaming = {
    model: req.model,
    messages,
    temperature: req.temperature,
    max_tokens: req.maxTokens || DEFAULT_MAX_TOKENS,
  };
  if (system.length > 0) params.system = system.join("\n\n");
  if (req.extra) {
    const { seed: _seed, ...rest } = req.extra;
    Object.assign(params, rest);
  }
  return params;
}

export function toAnthropicProviderError(err: unknown): ProviderError {
  if (err instanceof Anthropic.APIConnectionError) {
    return transportError(PROVIDER, err.message, err);
  }
  if (err instanceof Anthropic.APIError) {
    return providerErrorFromStatus({
      provider: PROVIDER,
      message: `Anthropic API error: ${err.message}`,
      status: err.status,
      headers: err.headers,
      body: {
        error: {
          message: err.message,
          code: err.status ?? null,
          type: err.constructor.name,
          metadata: { raw: JSON.stringify(err.error ?? {}) },
        },
      },
      cause: err,
    });
  }
  return unknownError(PROVIDER, err);
}

export class AnthropicClient implements ProviderClient {
  readonly provider = PROVIDER;
  private readonly client: Anthropic;
  private readonly logger?: RunLogger;

  constructor(apiKey: string, logger?: RunLogger) {
    if (!apiKey || apiKey.trim() === "") {
      throw new Error("ANTHROPIC_API_KEY is required for AnthropicClient. Set it in your environment.");
    }
    this.client = new Anthropic({ apiKey });
    this.logger = logger;
  }

  async invoke(req: CanonicalRequest): Promise<ApiResponse> {
    const params = buildAnthropicParams(req);
    this.logger?.debug("Anthropic request parameters", {
      model: params.model,
      temperature: params.temperature,
      max_tokens: params.max_tokens,
      roles: params.messages.map((m) => m.role),
    });

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(params);
    } catch (error) {
      throw toAnthropicProviderError(error);
    }

    const textBlocks = response.content.filter((block) => block.type === "text");
    if (textBlocks.length === 0) {
      throw unknownError(PROVIDER, new Error(`Anthropic returned no text content for ${req.model}`));
    }
    const content = textBlocks.map((block) => ("text" in block ? block.text : "")).join("");

    return {
      content,
      model: req.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }
}
