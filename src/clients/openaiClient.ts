/**
 * OpenAI client using the official Chat Completions API.
 */

import OpenAI from "openai";
import type { RunLogger } from "../logger.js";
import type { ProviderError } from "../errors.js";
import { providerErrorFromStatus, transportError, unknownError } from "./errorMapping.js";
import type { ApiResponse, CanonicalRequest, ChatMessage, ProviderClient } from "./types.js";

const PROVIDER = "openai";

type ChatCompletionCreateParamsNonStreaming = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
type ChatCompletionMessageParam = OpenAI.Chat.ChatCompletionMessageParam;

/** Reasoning models reject temperature, max_tokens and seed. */
export const REASONING_MODEL_PREFIXES = ["o1", "o3", "o4"] as const;

export function isReasoningModel(model: string): boolean {
  return REASONING_MODEL_PREFIXES.some((prefix) => model === prefix || model.startsWith(`${prefix}-`));
}

function toMessageParam(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    case "user":
      return { role: "user", content: m.content };
  }
}

export function buildOpenAIParams(req: CanonicalRequest): ChatCompletionCreateParamsNonStreaming {
  const params: ChatCompletionCreateParamsNonStreaming = {
    model: req.model,
    messages: req.messages.map(toMessageParam),
  };
  if (isReasoningModel(req.model)) {
    if (req.extra) {
      const { temperature: _t, max_tokens: _m, seed: _s, ...rest } = req.extra;
      Object.assign(params, rest);
    }
    return params;
  }

  params.temperature = req.temperature;
  if (req.maxTokens != null) params.max_tokens = req.maxTokens;
  if (req.seed != null) params.seed = req.seed;
  if (req.extra) Object.assign(params, req.extra);
  return params;
}

export function toOpenAIProviderError(err: unknown): ProviderError {
  if (err instanceof OpenAI.APIConnectionError) {
    return transportError(PROVIDER, err.message, err);
  }
  if (err instanceof OpenAI.APIError) {
    return providerErrorFromStatus({
      provider: PROVIDER,
      message: `OpenAI API error: ${err.message}`,
      status: err.status,
      headers: err.headers,
      body: { error: { message: err.message, code: err.status ?? null, type: err.constructor.name } },
      cause: err,
    });
  }
  return unknownError(PROVIDER, err);
}

export class OpenAIClient implements ProviderClient {
  readonly provider = PROVIDER;
  private readonly client: OpenAI;
  private readonly logger?: RunLogger;

  constructor(apiKey: string, logger?: RunLogger) {
    if (!apiKey || apiKey.trim() === "") {
      throw new Error("OPENAI_API_KEY is required for OpenAIClient. Set it in your environment.");
    }
    this.client = new OpenAI({ apiKey });
    this.logger = logger;
  }

  async invoke(req: CanonicalRequest): Promise<ApiResponse> {
    const params = buildOpenAIParams(req);
    const { messages: _messages, ...loggable } = params;
    this.logger?.debug("OpenAI request parameters", loggable);

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(params);
    } catch (error) {
      throw toOpenAIProviderError(error);
    }

    const content = response.choices[0]?.message?.content;
    if (content == null) {
      throw unknownError(PROVIDER, new Error(`OpenAI returned no message content for ${req.model}`));
    }
    if (response.usage) {
      this.logger?.debug("Token usage", { usage: response.usage });
    }
    return {
      content,
      model: req.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }
}
