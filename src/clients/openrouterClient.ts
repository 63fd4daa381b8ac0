/**
 * OpenRouter client: raw HTTP POST to the chat completions endpoint with a
 * provider routing hint derived from the model name prefix.
 */

import { z } from "zod";
import type { RunLogger } from "../logger.js";
import { UnknownModelRoutingError } from "../errors.js";
import { providerErrorFromStatus, readErrorBody, transportError, unknownError } from "./errorMapping.js";
import type { ApiResponse, CanonicalRequest, ProviderClient, ProviderClientOptions } from "./types.js";

const PROVIDER = "openrouter";
export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

/** Model prefix → upstream provider pinned in the routing hint. */
const PROVIDER_ORDER_BY_PREFIX: ReadonlyArray<readonly [string, string]> = [
  ["google/gemini-", "Google AI Studio"],
  ["deepseek/deepseek-", "DeepInfra"],
  ["qwen/qwen-", "Alibaba"],
  ["x-ai/grok-", "xAI"],
  ["meta-llama/llama-", "Lambda"],
  ["mistralai/mistral-", "Mistral"],
  ["qwen/qwq-32b", "DeepInfra"],
  ["anthropic", "Anthropic"],
];

/** Models that reject max_tokens on OpenRouter */
const NO_MAX_TOKENS_MODELS = new Set(["deepseek/deepseek-r1"]);

export function getProviderOrder(model: string): string[] {
  for (const [prefix, upstream] of PROVIDER_ORDER_BY_PREFIX) {
    if (model.startsWith(prefix)) return [upstream];
  }
  throw new UnknownModelRoutingError(model);
}

const OpenRouterResponseSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z
              .object({
                content: z.string().nullable().optional(),
                reasoning: z.string().nullable().optional(),
              })
              .passthrough(),
          })
          .passthrough()
      )
      .min(1),
    usage: z
      .object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
      })
      .passthrough()
      .optional(),
    provider: z.string().optional(),
  })
  .passthrough();

export class OpenRouterClient implements ProviderClient {
  readonly provider = PROVIDER;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: RunLogger;

  constructor(apiKey: string, options: ProviderClientOptions = {}) {
    if (!apiKey || apiKey.trim() === "") {
      throw new Error("OPENROUTER_API_KEY is required for OpenRouterClient. Set it in your environment.");
    }
    this.headers = {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    };
    if (options.siteUrl) this.headers["HTTP-Referer"] = options.siteUrl;
    if (options.siteName) this.headers["X-Title"] = options.siteName;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
  }

  /** Request body; an unroutable model degrades to an empty order with a warning. */
  buildBody(req: CanonicalRequest): Record<string, unknown> {
    let order: string[];
    try {
      order = getProviderOrder(req.model);
    } catch (e) {
      if (!(e instanceof UnknownModelRoutingError)) throw e;
      this.logger?.warn(`Provider order not found for model ${req.model}: ${e.message}`);
      order = [];
    }

    const body: Record<string, unknown> = {
      model: req.model,
      messages: req.messages,
      temperature: req.temperature,
      provider: {
        order,
        allow_fallbacks: false,
        require_parameters: true,
      },
    };
    if (req.seed != null && !req.model.startsWith("anthropic")) body.seed = req.seed;
    for (const [k, v] of Object.entries(req.extra ?? {})) {
      if (v !== undefined && v !== null && k !== "seed") body[k] = v;
    }
    if (req.maxTokens != null && !NO_MAX_TOKENS_MODELS.has(req.model)) {
      body.max_tokens = req.maxTokens;
    }
    return body;
  }

  async invoke(req: CanonicalRequest): Promise<ApiResponse> {
    const url = `${OPENROUTER_BASE_URL}/chat/completions`;
    const body = this.buildBody(req);
    this.logger?.debug("OpenRouter API request", { url, params: { ...body, messages: undefined } });

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(body),
      });
    } catch (e) {
      throw transportError(PROVIDER, e instanceof Error ? e.message : String(e), e);
    }

    let text: string;
    try {
      text = await res.text();
    } catch (e) {
      throw transportError(PROVIDER, e instanceof Error ? e.message : String(e), e);
    }
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      this.logger?.error(`Failed to parse response as JSON: ${text.slice(0, 400)}`);
      if (!res.ok) {
        throw providerErrorFromStatus({
          provider: PROVIDER,
          message: `OpenRouter API error: HTTP ${res.status}`,
          status: res.status,
          headers: res.headers,
          cause: e,
        });
      }
      throw unknownError(PROVIDER, e);
    }
    this.logger?.debug(`Response: [${res.status}]`, { data });

    // OpenRouter may answer 200 with an error object; its code is the real status
    const errorInfo = readErrorBody(data);
    if (errorInfo) {
      let message = errorInfo.message ?? "Unknown error";
      if (errorInfo.nested?.message) message = `${message} - ${errorInfo.nested.message}`;
      const status = errorInfo.code ?? errorInfo.nested?.code ?? res.status;
      throw providerErrorFromStatus({
        provider: PROVIDER,
        message: `OpenRouter API error: ${message}`,
        status,
        headers: res.headers,
        body: data,
      });
    }
    if (!res.ok) {
      throw providerErrorFromStatus({
        provider: PROVIDER,
        message: `OpenRouter API error: HTTP ${res.status}`,
        status: res.status,
        headers: res.headers,
        body: data,
      });
    }

    const parsed = OpenRouterResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw unknownError(PROVIDER, new Error(`Unexpected OpenRouter response shape: ${parsed.error.message}`));
    }
    const { choices, usage, provider } = parsed.data;
    if (usage) this.logger?.debug("Token usage", { usage });
    if (provider) this.logger?.debug(`Provider used: ${provider}`);

    const message = choices[0].message;
    if (message.content == null) {
      throw unknownError(PROVIDER, new Error(`OpenRouter returned no message content for ${req.model}`));
    }
    return {
      content: message.content,
      model: req.model,
      usage: usage
        ? {
            inputTokens: usage.prompt_tokens,
            outputTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
      reasoning: message.reasoning ?? undefined,
    };
  }
}
