/**
 * Run settings: env-based getters with safe parsing and clamped defaults.
 * Values are read once per run by the caller and passed down by value.
 */

import type { RetryOptions } from "./retry/retryHandler.js";

type Env = Record<string, string | undefined>;

function parseIntEnv(env: Env, key: string, defaultVal: number, min: number, max: number): number {
  const raw = env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function parseFloatEnv(env: Env, key: string, defaultVal: number, min: number, max: number): number {
  const raw = env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseFloat(raw);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function parseBoolEnv(env: Env, key: string, defaultVal: boolean): boolean {
  const raw = env[key]?.toLowerCase();
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  return defaultVal;
}

export interface RequestDefaults {
  temperature: number;
  maxTokens: number;
  seed: number;
}

export interface RunSettings {
  /** Fraction of available parallelism used for the worker pool. Default 0.75 */
  workerFraction: number;
  retry: RetryOptions;
  request: RequestDefaults;
  openRouter: { siteUrl?: string; siteName?: string };
}

export function loadRunSettings(env: Env = process.env): RunSettings {
  return {
    workerFraction: parseFloatEnv(env, "RATER_WORKER_FRACTION", 0.75, 0.01, 1),
    retry: {
      maxRetries: parseIntEnv(env, "RATER_MAX_RETRIES", 2, 0, 20),
      baseDelayMs: parseIntEnv(env, "RATER_BASE_DELAY_MS", 3000, 0, 600_000),
      maxDelayMs: parseIntEnv(env, "RATER_MAX_DELAY_MS", 5000, 0, 600_000),
      exponentialBase: 2,
      jitter: parseBoolEnv(env, "RATER_JITTER", true),
    },
    request: {
      temperature: 0,
      maxTokens: parseIntEnv(env, "RATER_MAX_TOKENS", 64, 1, 32_768),
      seed: parseIntEnv(env, "RATER_SEED", 42, 0, 2_147_483_647),
    },
    openRouter: {
      siteUrl: env.OPENROUTER_SITE_URL || undefined,
      siteName: env.OPENROUTER_SITE_NAME || undefined,
    },
  };
}

/** <PROVIDER>_API_KEY, trimmed; undefined when unset or blank. */
export function getProviderCredential(provider: string, env: Env = process.env): string | undefined {
  const val = env[`${provider.toUpperCase()}_API_KEY`];
  return val && val.trim() !== "" ? val.trim() : undefined;
}
