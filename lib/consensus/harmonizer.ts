/**
 * Tier harmonizer: decides, per metric, between "already aligned",
 * "harmonize to the majority label" and "send to debate".
 *
 * Tiers: positive {Excellent, Good}, negative {Bad, Horrible},
 * neutral {Neutral}. Disagreement inside one tier is settled by majority.
 * Any Neutral, or positive against negative, goes to debate.
 */

import type {
  Analysis,
  HarmonizationRecord,
  HarmonizationResult,
  Metric,
  Rating,
  Tier,
} from "./types";
import { METRICS } from "./types";
import { parseMetricRating, ratingTier, ratingValue } from "./rating-parser";
import { cloneAnalysis } from "./consensus-filler";

const HARMONIZED_TAG = "[Harmonized to ";

export function harmonizationNote(majority: Rating): string {
  return `${HARMONIZED_TAG}${majority} by majority]`;
}

/** Distance from Neutral on the 1–5 scale; smaller is milder. */
function severity(rating: Rating): number {
  return Math.abs(ratingValue(rating) - 3);
}

/**
 * Most frequent rating. Ties go to the milder label (Good over Excellent,
 * Bad over Horrible), then to the higher rating.
 */
export function getMajorityRating(ratings: Rating[]): Rating | null {
  if (ratings.length === 0) return null;

  const counts = new Map<Rating, number>();
  for (const r of ratings) {
    counts.set(r, (counts.get(r) ?? 0) + 1);
  }

  const ranked = [...counts.entries()].sort(([a, ca], [b, cb]) => {
    if (cb !== ca) return cb - ca;
    if (severity(a) !== severity(b)) return severity(a) - severity(b);
    return ratingValue(b) - ratingValue(a);
  });

  return ranked[0][0];
}

function tiersOf(ratings: Rating[]): Set<Tier> {
  return new Set(ratings.map(ratingTier));
}

function annotate(reason: string, majority: Rating): string {
  if (reason.includes(HARMONIZED_TAG)) return reason;
  const note = harmonizationNote(majority);
  return reason ? `${reason} ${note}` : note;
}

/**
 * Classify one metric and, when same-tier, harmonize the given analyses
 * in place. Callers pass copies.
 */
function harmonizeMetric(
  analyses: Analysis[],
  metric: Metric
): HarmonizationRecord {
  const ratings = analyses.map((a) => parseMetricRating(a.ratings[metric]));
  const present = ratings.filter((r): r is Rating => r !== null);

  if (present.length < 2) {
    return { metric, action: "skipped", ratings, reason: "insufficient_data" };
  }

  if (present.every((r) => r === present[0])) {
    return { metric, action: "already_aligned", ratings, result: present[0] };
  }

  const tiers = tiersOf(present);

  if (tiers.has("neutral")) {
    return { metric, action: "debate", ratings, reason: "neutral_present" };
  }

  if (tiers.has("positive") && tiers.has("negative")) {
    return { metric, action: "debate", ratings, reason: "cross_tier_conflict" };
  }

  const majority = getMajorityRating(present);
  if (majority === null) {
    return { metric, action: "skipped", ratings, reason: "insufficient_data" };
  }

  analyses.forEach((analysis, i) => {
    if (ratings[i] === null) return;
    analysis.ratings[metric] = majority;
    analysis.reasons[metric] = annotate(analysis.reasons[metric] ?? "", majority);
  });

  return { metric, action: "harmonized", ratings, result: majority };
}

/**
 * Harmonize same-tier disagreement and collect the metrics that need a
 * debate. Input analyses are not modified.
 */
export function harmonizeAndCheckDebates(
  analyses: Analysis[]
): HarmonizationResult {
  const harmonizedAnalyses = analyses.map(cloneAnalysis);
  const harmonizationLog: HarmonizationRecord[] = [];
  const metricsToDebate: Metric[] = [];

  for (const metric of METRICS) {
    const record = harmonizeMetric(harmonizedAnalyses, metric);
    harmonizationLog.push(record);
    if (record.action === "debate") {
      metricsToDebate.push(metric);
    }
  }

  return { harmonizedAnalyses, metricsToDebate, harmonizationLog };
}

export function summarizeHarmonization(
  log: HarmonizationRecord[]
): Record<HarmonizationRecord["action"], number> {
  const summary = { already_aligned: 0, harmonized: 0, debate: 0, skipped: 0 };
  for (const record of log) {
    summary[record.action]++;
  }
  return summary;
}
