/**
 * Agreement analyzer: diagnostic spread between analysts.
 *
 * The debate level computed here only feeds logging. Whether a debate
 * actually runs is decided per metric by the tier harmonizer.
 */

import type {
  AgreementInfo,
  Analysis,
  DebateLevel,
  Metric,
  MetricComparisonRow,
} from "./types";
import { METRICS } from "./types";
import {
  parseMetricRating,
  parseMetricRatingValue,
  parseStrengthScore,
} from "./rating-parser";

/** Metric ordinal spread at or above which a metric counts as disputed. */
const METRIC_DISAGREEMENT_SPREAD = 2;

export function classifyDebateLevel(spread: number): DebateLevel {
  if (spread < 2) return "none";
  if (spread === 2) return "small";
  return "large";
}

function spreadOf(values: number[]): number {
  return Math.max(...values) - Math.min(...values);
}

/**
 * Metrics whose parsed ratings differ by two or more ordinal steps.
 */
export function findMetricDisagreements(analyses: Analysis[]): Metric[] {
  const disagreements: Metric[] = [];

  for (const metric of METRICS) {
    const values: number[] = [];
    for (const analysis of analyses) {
      const value = parseMetricRatingValue(analysis.ratings[metric]);
      if (value !== null) values.push(value);
    }

    if (values.length >= 2 && spreadOf(values) >= METRIC_DISAGREEMENT_SPREAD) {
      disagreements.push(metric);
    }
  }

  return disagreements;
}

/**
 * Analyze agreement between analysts' composite "X/8" scores.
 */
export function calculateAgreement(analyses: Analysis[]): AgreementInfo {
  const scores: number[] = [];
  let missingData = false;

  for (const analysis of analyses) {
    const score = parseStrengthScore(analysis.financialStrength);
    if (score !== null) {
      scores.push(score);
    } else {
      missingData = true;
    }
  }

  const info = calculateAgreementFromScores(scores);

  return {
    ...info,
    missingData: missingData || info.missingData,
    metricDisagreements: findMetricDisagreements(analyses),
  };
}

/**
 * Same spread logic over already-numeric scores, e.g. the 0–8 counts
 * recalculated after harmonization.
 */
export function calculateAgreementFromScores(scores: number[]): AgreementInfo {
  const hasSpread = scores.length >= 2;
  const scoreSpread = hasSpread ? spreadOf(scores) : 0;

  return {
    debateLevel: classifyDebateLevel(scoreSpread),
    scoreSpread,
    scores: [...scores],
    metricDisagreements: [],
    missingData: !hasSpread,
  };
}

/**
 * Side-by-side table of each analyst's parsed rating per metric.
 */
export function getMetricComparison(analyses: Analysis[]): MetricComparisonRow[] {
  return METRICS.map((metric) => {
    const ratings = analyses.map((a) => parseMetricRating(a.ratings[metric]));
    const values = analyses
      .map((a) => parseMetricRatingValue(a.ratings[metric]))
      .filter((v): v is number => v !== null);

    return {
      metric,
      ratings,
      spread: values.length >= 2 ? spreadOf(values) : null,
    };
  });
}

/** Plain-text rendering of the comparison table for session logs. */
export function formatMetricComparison(
  rows: MetricComparisonRow[],
  analystNames: string[]
): string {
  const header = ["metric", ...analystNames].join(" | ");
  const lines = rows.map((row) =>
    [row.metric, ...row.ratings.map((r) => r ?? "-")].join(" | ")
  );
  return [header, ...lines].join("\n");
}
