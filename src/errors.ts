/**
 * Error taxonomy for the rating pipeline.
 * Provider failures are normalized into ProviderError at each client boundary;
 * the retry handler only ever looks at ProviderError.kind and its status/body.
 */

/** Canonical provider failure kinds. */
export type ProviderErrorKind =
  | "rate_limited"
  | "service_unavailable"
  | "invalid_request"
  | "transport"
  | "unknown";

export interface ProviderErrorInit {
  provider: string;
  kind: ProviderErrorKind;
  status?: number;
  /** Raw Retry-After header value, when the provider sent one */
  retryAfter?: string;
  /** Provider JSON error body ({ error: { message, code, metadata? } }) */
  body?: unknown;
  cause?: unknown;
}

export class ProviderError extends Error {
  readonly provider: string;
  readonly kind: ProviderErrorKind;
  readonly status?: number;
  readonly retryAfter?: string;
  readonly body?: unknown;

  constructor(message: string, init: ProviderErrorInit) {
    super(message, init.cause !== undefined ? { cause: init.cause } : undefined);
    this.name = "ProviderError";
    this.provider = init.provider;
    this.kind = init.kind;
    this.status = init.status;
    this.retryAfter = init.retryAfter;
    this.body = init.body;
  }
}

const SERVICE_UNAVAILABLE_STATUSES = new Set([408, 500, 502, 503, 504]);

/**
 * Status → kind mapping shared by every client variant.
 * undefined status means the request never got an HTTP answer.
 */
export function kindForStatus(status: number | undefined): ProviderErrorKind {
  if (status === undefined) return "transport";
  if (status === 429) return "rate_limited";
  if (SERVICE_UNAVAILABLE_STATUSES.has(status)) return "service_unavailable";
  if (status >= 400 && status < 500) return "invalid_request";
  return "unknown";
}

/** Free-text answer matched none of the Likert phrases. Never retried. */
export class UnparsableResponseError extends Error {
  readonly rawResponse: string;

  constructor(rawResponse: string) {
    super(`Could not parse valid Likert response from: ${rawResponse}`);
    this.name = "UnparsableResponseError";
    this.rawResponse = rawResponse;
  }
}

/** OpenRouter model name has no known upstream provider prefix. */
export class UnknownModelRoutingError extends Error {
  readonly model: string;

  constructor(model: string) {
    super(`Unknown model: ${model}`);
    this.name = "UnknownModelRoutingError";
    this.model = model;
  }
}

/** portrait_id leading digit selects no template family. */
export class PromptRoutingError extends Error {
  readonly portraitId: number;

  constructor(portraitId: number, leadingDigit: string) {
    super(`Unexpected portrait_id prefix: ${leadingDigit}`);
    this.name = "PromptRoutingError";
    this.portraitId = portraitId;
  }
}

/** Prompt templates for a version could not be read. Fatal for that combination only. */
export class PromptTemplateError extends Error {
  readonly promptVersion: string;

  constructor(promptVersion: string, message: string, cause?: unknown) {
    super(`Prompt templates for ${promptVersion}: ${message}`, cause !== undefined ? { cause } : undefined);
    this.name = "PromptTemplateError";
    this.promptVersion = promptVersion;
  }
}

/** Malformed experiment file, dataset, or unknown experiment name. Aborts the run. */
export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "ConfigError";
  }
}
