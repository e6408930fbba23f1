/**
 * Consensus filler: fills one analyst's missing rating when every other
 * analyst gave the same one.
 *
 * Ambiguity is preserved: two or more missing values, or any disagreement
 * among the rest, leaves the metric untouched.
 */

import type { Analysis, Metric } from "./types";
import { METRICS } from "./types";
import { capitalize, firstToken, parseMetricRating } from "./rating-parser";

export function consensusFillReason(value: string): string {
  return `[Filled by consensus: ${value}]`;
}

export function cloneAnalysis(analysis: Analysis): Analysis {
  return {
    ratings: { ...analysis.ratings },
    reasons: { ...analysis.reasons },
    financialStrength: analysis.financialStrength,
    overallSummary: analysis.overallSummary,
  };
}

/**
 * The shared capitalized first token of the present ratings, or null
 * when they disagree.
 */
function unanimousValue(ratings: string[]): string | null {
  const tokens = ratings.map((r) => capitalize(firstToken(r)));
  const first = tokens[0];
  return tokens.every((t) => t === first) ? first : null;
}

/** Mutates the given (already copied) analyses. */
function fillMetric(analyses: Analysis[], metric: Metric): boolean {
  const missingIdx: number[] = [];
  const present: string[] = [];

  analyses.forEach((a, i) => {
    const text = a.ratings[metric];
    if (parseMetricRating(text) === null) {
      missingIdx.push(i);
    } else {
      present.push(text);
    }
  });

  if (missingIdx.length !== 1 || present.length === 0) {
    return false;
  }

  const value = unanimousValue(present);
  if (value === null) return false;

  const target = analyses[missingIdx[0]];
  target.ratings[metric] = value;
  target.reasons[metric] = consensusFillReason(value);
  return true;
}

/**
 * Fill gaps where the remaining analysts are unanimous.
 * Returns new analyses; the input is left as it was.
 */
export function fillMissingWithConsensus(analyses: Analysis[]): Analysis[] {
  const filled = analyses.map(cloneAnalysis);
  for (const metric of METRICS) {
    fillMetric(filled, metric);
  }
  return filled;
}
