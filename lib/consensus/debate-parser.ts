/**
 * Debate marker parser: pulls structured stances out of participant text.
 *
 * Participants are asked to end review rounds with "UPDATED RATING: <word>"
 * and the final round with "FINAL RATING: <word>". Markdown bold around the
 * word (e.g. **Good**) is tolerated. Anything that is not one of the five
 * rating words counts as no marker.
 */

import type { FinalRating, Rating } from "./types";
import { COMPLEX } from "./types";
import { toRating } from "./rating-parser";

function extractMarker(text: string, marker: RegExp): Rating | null {
  if (!text) return null;
  const match = text.match(marker);
  return match ? toRating(match[1]) : null;
}

/** Rating from "UPDATED RATING: X", or null. */
export function extractUpdatedRating(text: string): Rating | null {
  return extractMarker(text, /UPDATED\s+RATING:\s*\**\s*(\w+)/i);
}

/** Rating from "FINAL RATING: X", or null. */
export function extractFinalRating(text: string): Rating | null {
  return extractMarker(text, /FINAL\s+RATING:\s*\**\s*(\w+)/i);
}

/**
 * Majority over final votes (case-insensitive).
 *
 * A rating wins when it occurs more than once and strictly more often than
 * any other. Anything else, such as three different votes or no votes at all,
 * is COMPLEX and needs human review.
 */
export function resolveMajority(votes: string[]): FinalRating {
  const counts = new Map<string, number>();
  for (const vote of votes) {
    if (!vote) continue;
    const key = vote.toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const ranked = [...counts.entries()].sort(([, a], [, b]) => b - a);
  if (ranked.length === 0) return COMPLEX;

  const [topKey, topCount] = ranked[0];
  const runnerUp = ranked[1]?.[1] ?? 0;
  if (topCount <= 1 || topCount === runnerUp) return COMPLEX;

  return toRating(topKey) ?? COMPLEX;
}

/** Error placeholder recorded for a failed participant call. */
export function errorPlaceholder(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `[Error: ${message}]`;
}
