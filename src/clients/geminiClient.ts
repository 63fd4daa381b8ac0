/**
 * Gemini client via @google/genai.
 * The conversation is collapsed into one role-prefixed text block; no usage is reported.
 */

import { ApiError, GoogleGenAI } from "@google/genai";
import type { RunLogger } from "../logger.js";
import type { ProviderError } from "../errors.js";
import { providerErrorFromStatus, transportError, unknownError } from "./errorMapping.js";
import type { ApiResponse, CanonicalRequest, ChatMessage, ProviderClient } from "./types.js";

const PROVIDER = "gemini";
const DEFAULT_MAX_TOKENS = 64;

export function collapseConversation(messages: ChatMessage[]): string {
  return messages
    .map((m) => `${m.role === "user" ? "User: " : "Assistant: "}${m.content}`)
    .join("\n");
}

export function toGeminiProviderError(err: unknown): ProviderError {
  if (err instanceof ApiError) {
    return providerErrorFromStatus({
      provider: PROVIDER,
      message: `Gemini API error: ${err.message}`,
      status: err.status,
      body: { error: { message: err.message, code: err.status, metadata: { raw: err.message } } },
      cause: err,
    });
  }
  // fetch() rejects with TypeError when the request never reached the server
  if (err instanceof TypeError) {
    return transportError(PROVIDER, err.message, err);
  }
  return unknownError(PROVIDER, err);
}

export class GeminiClient implements ProviderClient {
  readonly provider = PROVIDER;
  private readonly client: GoogleGenAI;
  private readonly logger?: RunLogger;

  constructor(apiKey: string, logger?: RunLogger) {
    if (!apiKey || apiKey.trim() === "") {
      throw new Error("GEMINI_API_KEY is required for GeminiClient. Set it in your environment.");
    }
    this.client = new GoogleGenAI({ apiKey });
    this.logger = logger;
  }

  async invoke(req: CanonicalRequest): Promise<ApiResponse> {
    const conversation = collapseConversation(req.messages);
    const maxOutputTokens = req.maxTokens || DEFAULT_MAX_TOKENS;
    this.logger?.debug("Gemini request parameters", {
      model: req.model,
      temperature: req.temperature,
      max_tokens: maxOutputTokens,
    });

    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: req.model,
        contents: conversation,
        config: { temperature: req.temperature, maxOutputTokens },
      });
      text = response.text;
    } catch (error) {
      throw toGeminiProviderError(error);
    }

    if (text == null) {
      throw unknownError(PROVIDER, new Error(`Gemini returned an empty response for ${req.model}`));
    }
    return { content: text, model: req.model };
  }
}
