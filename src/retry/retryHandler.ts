/**
 * Bounded retry with exponential backoff.
 *
 * attempt(n) → evaluate → backoff → attempt(n+1), ending in succeeded or exhausted.
 * At most maxRetries + 1 calls; on exhaustion the last error is rethrown as-is.
 * Retry decisions read only the canonical ProviderError (kind, status, body).
 */

import { ProviderError } from "../errors.js";
import type { ProviderErrorKind } from "../errors.js";
import { readErrorBody } from "../clients/errorMapping.js";
import type { RunLogger } from "../logger.js";

export interface RetryOptions {
  /** Attempts allowed after the first */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  exponentialBase: 2,
  jitter: true,
};

export interface RetryHandlerDeps {
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1); used for jitter */
  random?: () => number;
  logger?: RunLogger;
}

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set(["rate_limited", "service_unavailable", "transport"]);
const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);
const QUOTA_PATTERNS = ["quota", "resource exhausted"];
const JITTER_FRACTION = 0.1;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Status of a provider failure: the error's own status, else error.code in
 * the body, else the code of the JSON error nested in error.metadata.raw.
 */
export function extractStatusCode(error: unknown): number | undefined {
  if (!(error instanceof ProviderError)) return undefined;
  if (error.status !== undefined) return error.status;
  const info = readErrorBody(error.body);
  return info?.code ?? info?.nested?.code;
}

function bodyText(error: ProviderError): string {
  const info = readErrorBody(error.body);
  if (!info) return error.message;
  return [info.message, info.nested?.message, info.rawText].filter((s) => s != null).join(" ");
}

export function isRetryable(error: unknown): boolean {
  if (!(error instanceof ProviderError)) return false;
  if (RETRYABLE_KINDS.has(error.kind)) return true;
  const status = extractStatusCode(error);
  if (status !== undefined && RETRYABLE_STATUSES.has(status)) return true;
  const text = bodyText(error).toLowerCase();
  return QUOTA_PATTERNS.some((p) => text.includes(p));
}

/** Retry-After in seconds, when present and numeric */
export function getRetryAfterSeconds(error: unknown): number | undefined {
  if (!(error instanceof ProviderError) || error.retryAfter == null) return undefined;
  const raw = error.retryAfter.trim();
  if (raw === "") return undefined;
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export class RetryHandler {
  readonly options: RetryOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger?: RunLogger;

  constructor(options: Partial<RetryOptions> = {}, deps: RetryHandlerDeps = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger;
  }

  /** Delay before jitter: server hint when numeric, else base × exp^attempt; capped at maxDelayMs. */
  computeBaseDelayMs(attempt: number, retryAfterSeconds?: number): number {
    const { baseDelayMs, maxDelayMs, exponentialBase } = this.options;
    const delay =
      retryAfterSeconds !== undefined
        ? retryAfterSeconds * 1000
        : baseDelayMs * Math.pow(exponentialBase, attempt);
    return Math.min(maxDelayMs, delay);
  }

  computeDelayMs(attempt: number, retryAfterSeconds?: number): number {
    const delay = this.computeBaseDelayMs(attempt, retryAfterSeconds);
    if (!this.options.jitter) return delay;
    const spread = delay * JITTER_FRACTION;
    return Math.max(0, delay + (this.random() * 2 - 1) * spread);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const { maxRetries } = this.options;
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (attempt >= maxRetries || !isRetryable(err)) {
          this.logger?.error(`Final retry attempt failed or non-retryable error: ${err instanceof Error ? err.message : String(err)}`, {
            attempt: attempt + 1,
            state: "exhausted",
          });
          throw err;
        }
        const delayMs = this.computeDelayMs(attempt, getRetryAfterSeconds(err));
        this.logger?.warn(
          `Attempt ${attempt + 1}/${maxRetries + 1} failed: ${err instanceof Error ? err.message : String(err)}. Retrying in ${(delayMs / 1000).toFixed(2)} seconds...`,
          { status: extractStatusCode(err), state: "backoff" }
        );
        await this.sleep(delayMs);
      }
    }
  }
}
