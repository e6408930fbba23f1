/**
 * Rating parser: turns free-text analyst ratings into the canonical scale.
 *
 * Analysts write things like "Excellent: revenue grew 18% YoY". Only the
 * first token carries the rating. The phrase "not enough information"
 * anywhere in the text marks the value as missing, whatever the first token.
 */

import type { Rating, Tier } from "./types";

const MISSING_MARKER = "not enough information";

const RATING_VALUES: Record<string, number> = {
  excellent: 5,
  good: 4,
  neutral: 3,
  bad: 2,
  horrible: 1,
};

const RATING_BY_TOKEN: Record<string, Rating> = {
  excellent: "Excellent",
  good: "Good",
  neutral: "Neutral",
  bad: "Bad",
  horrible: "Horrible",
};

export function isMissing(text: string | null | undefined): boolean {
  return !text || !text.trim() || text.toLowerCase().includes(MISSING_MARKER);
}

/** First whitespace-separated token, or "" for blank text. */
export function firstToken(text: string): string {
  return text.trim().split(/\s+/)[0] ?? "";
}

/** "gOOD" → "Good" */
export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Map a single word onto the canonical scale, or null if it is not one of
 * the five rating words.
 */
export function toRating(word: string): Rating | null {
  return RATING_BY_TOKEN[word.toLowerCase()] ?? null;
}

/**
 * Parse a metric rating string.
 * Returns null for empty text, the missing marker, or an unknown first token.
 */
export function parseMetricRating(text: string | null | undefined): Rating | null {
  if (!text || isMissing(text)) return null;
  return toRating(firstToken(text));
}

/** Ordinal value 5 (Excellent) … 1 (Horrible), or null. */
export function parseMetricRatingValue(
  text: string | null | undefined
): number | null {
  const rating = parseMetricRating(text);
  return rating ? ratingValue(rating) : null;
}

export function ratingValue(rating: Rating): number {
  return RATING_VALUES[rating.toLowerCase()];
}

/**
 * Extract X from "X/8".
 * Any single digit is accepted as-is - "9/8" parses to 9.
 */
export function parseStrengthScore(text: string | null | undefined): number | null {
  if (!text || isMissing(text)) return null;
  const match = text.match(/(\d)\/8/);
  return match ? parseInt(match[1], 10) : null;
}

export function ratingTier(rating: Rating): Tier {
  switch (rating) {
    case "Excellent":
    case "Good":
      return "positive";
    case "Neutral":
      return "neutral";
    case "Bad":
    case "Horrible":
      return "negative";
  }
}
