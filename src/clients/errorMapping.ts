/**
 * Helpers for turning provider failures into ProviderError.
 * Every client variant funnels its failures through providerErrorFromStatus
 * so that kindForStatus stays the single mapping table.
 */

import { z } from "zod";
import { ProviderError, kindForStatus } from "../errors.js";

/** Reads a header from a fetch Headers object or a plain record (case-insensitive). */
export function readHeader(headers: unknown, name: string): string | undefined {
  if (headers == null || typeof headers !== "object") return undefined;
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === "string") return value;
  }
  return undefined;
}

export interface StatusErrorArgs {
  provider: string;
  message: string;
  status: number | undefined;
  headers?: unknown;
  body?: unknown;
  cause?: unknown;
}

export function providerErrorFromStatus(args: StatusErrorArgs): ProviderError {
  return new ProviderError(args.message, {
    provider: args.provider,
    kind: kindForStatus(args.status),
    status: args.status,
    retryAfter: readHeader(args.headers, "retry-after"),
    body: args.body ?? { error: { message: args.message, code: args.status ?? null } },
    cause: args.cause,
  });
}

export function transportError(provider: string, message: string, cause?: unknown): ProviderError {
  return new ProviderError(`Connection error: ${message}`, {
    provider,
    kind: "transport",
    cause,
  });
}

export function unknownError(provider: string, err: unknown): ProviderError {
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(message, { provider, kind: "unknown", cause: err });
}

const ErrorObjectSchema = z
  .object({
    message: z.string().optional(),
    code: z.union([z.number(), z.string()]).nullable().optional(),
    metadata: z.object({ raw: z.unknown().optional() }).passthrough().optional(),
  })
  .passthrough();

const ErrorBodySchema = z.object({ error: ErrorObjectSchema }).passthrough();

export interface ErrorBodyInfo {
  message?: string;
  code?: number;
  /** error.metadata.raw decoded one level, when it held a JSON error */
  nested?: { message?: string; code?: number };
  /** error.metadata.raw when it was not JSON */
  rawText?: string;
}

function toCode(code: number | string | null | undefined): number | undefined {
  if (typeof code === "number" && Number.isInteger(code)) return code;
  if (typeof code === "string" && /^\d+$/.test(code.trim())) return parseInt(code, 10);
  return undefined;
}

/**
 * Reads a provider error body of the shape
 * { error: { message, code, metadata?: { raw: "<JSON-encoded { error: { message, code } }>" } } }.
 * Returns undefined when the body has no error object.
 */
export function readErrorBody(body: unknown): ErrorBodyInfo | undefined {
  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) return undefined;
  const err = parsed.data.error;
  const info: ErrorBodyInfo = { message: err.message, code: toCode(err.code) };

  const raw = err.metadata?.raw;
  if (typeof raw === "string") {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      info.rawText = raw;
      return info;
    }
    const inner = ErrorBodySchema.safeParse(decoded);
    if (inner.success) {
      info.nested = { message: inner.data.error.message, code: toCode(inner.data.error.code) };
    }
  }
  return info;
}
