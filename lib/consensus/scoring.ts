/**
 * Score recalculation and verdict mapping.
 *
 * Simple scale: per analyst, how many of the eight metrics are Good or
 * Excellent (0–8). Extended scale: +2/+1/0/−1/−2 per metric summed over
 * the final ratings (−16..+16), which the verdict is read from.
 */

import type { Analysis, FinalRating, Metric, Verdict } from "./types";
import { METRICS } from "./types";
import { firstToken } from "./rating-parser";

const POSITIVE_TOKENS = new Set(["good", "excellent"]);

const EXTENDED_POINTS: Record<string, number> = {
  excellent: 2,
  good: 1,
  neutral: 0,
  bad: -1,
  horrible: -2,
  complex: 0,
};

/** Inclusive upper bounds, checked in order. */
const VERDICT_THRESHOLDS: Array<[number, Verdict]> = [
  [-11, "Extremely Risky"],
  [-4, "Risky"],
  [3, "Neutral"],
  [10, "Safe"],
];

/**
 * Count Good/Excellent metrics per analyst.
 */
export function recalculateStrengthScores(analyses: Analysis[]): number[] {
  return analyses.map(
    (analysis) =>
      METRICS.filter((metric) =>
        POSITIVE_TOKENS.has(firstToken(analysis.ratings[metric] ?? "").toLowerCase())
      ).length
  );
}

export function extendedPoints(rating: FinalRating | string | null): number {
  if (!rating) return 0;
  return EXTENDED_POINTS[rating.toLowerCase()] ?? 0;
}

/**
 * Sum of extended points; missing metrics count as 0.
 */
export function calculateExtendedScore(
  ratings: Partial<Record<Metric, FinalRating | string | null>>
): number {
  return METRICS.reduce((total, metric) => total + extendedPoints(ratings[metric] ?? null), 0);
}

export function getVerdict(score: number): Verdict {
  for (const [upper, verdict] of VERDICT_THRESHOLDS) {
    if (score <= upper) return verdict;
  }
  return "Extremely Safe";
}

/** "+5", "0", "-3" */
export function formatScore(score: number): string {
  return score > 0 ? `+${score}` : String(score);
}
