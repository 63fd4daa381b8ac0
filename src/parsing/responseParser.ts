/**
 * Likert response normalization: free text → canonical category → 1..6.
 * Pure and deterministic.
 */

import { UnparsableResponseError } from "../errors.js";

export const LIKERT_CATEGORIES = [
  "very much like me",
  "like me",
  "somewhat like me",
  "a little like me",
  "not like me",
  "not like me at all",
] as const;

export type LikertCategory = (typeof LIKERT_CATEGORIES)[number];

/** Canonical phrase plus known paraphrases per category */
export const LIKERT_VARIANTS: Readonly<Record<LikertCategory, readonly string[]>> = {
  "very much like me": ["very much like me", "likes me very much", "like me very much"],
  "like me": ["like me", "likes me"],
  "somewhat like me": ["somewhat like me", "somewhat likes me", "some what like me", "some what likes me"],
  "a little like me": ["a little like me", "little like me"],
  "not like me": ["not like me", "does not like me", "doesn't like me", "is not like me"],
  "not like me at all": ["not like me at all", "not at all like me", "does not like me at all", "isn't like me at all"],
};

export const LIKERT_SCORES: Readonly<Record<LikertCategory, number>> = {
  "very much like me": 6,
  "like me": 5,
  "somewhat like me": 4,
  "a little like me": 3,
  "not like me": 2,
  "not like me at all": 1,
};

/** Lower-case and collapse runs of whitespace */
export function normalizeResponse(text: string): string {
  return text.toLowerCase().split(/\s+/).filter(Boolean).join(" ");
}

interface VariantEntry {
  category: LikertCategory;
  variant: string;
}

const VARIANT_TABLE: readonly VariantEntry[] = LIKERT_CATEGORIES.flatMap((category) =>
  LIKERT_VARIANTS[category].map((v) => ({ category, variant: normalizeResponse(v) }))
);

/**
 * Exact match first; otherwise the category whose contained variant is
 * longest ("not like me at all" beats "not like me" beats "like me").
 * Equal-length matches keep table order.
 */
export function parseLikertResponse(rawResponse: string): LikertCategory {
  const normalized = normalizeResponse(rawResponse);

  const exact = VARIANT_TABLE.find((e) => e.variant === normalized);
  if (exact) return exact.category;

  let best: VariantEntry | undefined;
  for (const entry of VARIANT_TABLE) {
    if (!normalized.includes(entry.variant)) continue;
    if (!best || entry.variant.length > best.variant.length) best = entry;
  }
  if (best) return best.category;

  throw new UnparsableResponseError(rawResponse);
}

export function mapResponseToNumeric(category: LikertCategory): number {
  return LIKERT_SCORES[category];
}
