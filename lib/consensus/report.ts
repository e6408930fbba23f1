/**
 * Consensus report: the data behind the final write-up and its Markdown
 * rendering.
 *
 * Clear metrics are those the harmonizer settled (aligned or harmonized).
 * Complex metrics are the ones sent to debate, shown with their ratings
 * before debate and the debate outcome.
 */

import type {
  Analysis,
  DebateOutcome,
  FinalRating,
  HarmonizationRecord,
  Metric,
  Rating,
  Verdict,
} from "./types";
import { COMPLEX } from "./types";
import { METRIC_LABELS } from "./prompts";
import { parseMetricRating } from "./rating-parser";
import { calculateExtendedScore, formatScore, getVerdict } from "./scoring";

const REASON_MAX_CHARS = 200;

/** Shown for a debated metric when no debate outcome was supplied. */
export const PENDING = "Pending" as const;

export type ReportRating = FinalRating | typeof PENDING;

export interface ReportMetric {
  metric: Metric;
  label: string;
  rating: ReportRating;
  reason: string;
  /** Lower-cased rating, e.g. "good", "complex" */
  ratingClass: string;
}

export interface DebatedReportMetric extends ReportMetric {
  beforeRatings: (Rating | null)[];
  isComplex: boolean;
}

export interface ConsensusReport {
  ticker: string;
  generatedAt: Date;
  score: number;
  scoreDisplay: string;
  verdict: Verdict;
  verdictClass: string;
  clearMetrics: ReportMetric[];
  complexMetrics: DebatedReportMetric[];
  strengths: ReportMetric[];
  watch: ReportMetric[];
  concerns: ReportMetric[];
  unresolved: DebatedReportMetric[];
  numExperts: number;
  numDebates: number;
  numResolved: number;
}

// ---------------------------------------------------------------------------
// Report data
// ---------------------------------------------------------------------------

function truncateReason(reason: string): string {
  return reason.length > REASON_MAX_CHARS
    ? `${reason.slice(0, REASON_MAX_CHARS)}...`
    : reason;
}

/**
 * Reason of the first analyst whose rating matches, else the first
 * non-empty reason for the metric.
 */
export function findMatchingReason(
  metric: Metric,
  rating: Rating,
  analyses: Analysis[]
): string {
  const match = analyses.find((a) => parseMetricRating(a.ratings[metric]) === rating);
  if (match) return match.reasons[metric] ?? "";

  return analyses.find((a) => a.reasons[metric])?.reasons[metric] ?? "";
}

function isRating(rating: ReportRating | undefined): rating is Rating {
  return rating !== undefined && rating !== COMPLEX && rating !== PENDING;
}

/**
 * Assemble the report from the harmonization log, the analysts' original
 * output and (when a debate ran) its outcome.
 */
export function buildConsensusReport(
  ticker: string,
  harmonizationLog: HarmonizationRecord[],
  originalAnalyses: Analysis[],
  debate: DebateOutcome | null,
  generatedAt: Date = new Date()
): ConsensusReport {
  const debateResults: Partial<Record<Metric, FinalRating>> = debate?.debateResults ?? {};

  const clearMetrics: ReportMetric[] = [];
  const complexMetrics: DebatedReportMetric[] = [];
  const allRatings: Partial<Record<Metric, FinalRating>> = {};

  for (const record of harmonizationLog) {
    const { metric } = record;

    if (
      (record.action === "already_aligned" || record.action === "harmonized") &&
      record.result
    ) {
      allRatings[metric] = record.result;
      clearMetrics.push({
        metric,
        label: METRIC_LABELS[metric],
        rating: record.result,
        reason: truncateReason(findMatchingReason(metric, record.result, originalAnalyses)),
        ratingClass: record.result.toLowerCase(),
      });
    } else if (record.action === "debate") {
      const finalRating: ReportRating = debateResults[metric] ?? PENDING;
      if (finalRating !== PENDING) allRatings[metric] = finalRating;

      complexMetrics.push({
        metric,
        label: METRIC_LABELS[metric],
        rating: finalRating,
        beforeRatings: record.ratings,
        reason: isRating(finalRating)
          ? truncateReason(findMatchingReason(metric, finalRating, originalAnalyses))
          : "",
        ratingClass: finalRating.toLowerCase(),
        isComplex: finalRating === COMPLEX,
      });
    }
  }

  const score = calculateExtendedScore(allRatings);
  const verdict = getVerdict(score);
  const rated: ReportMetric[] = [...clearMetrics, ...complexMetrics];
  const unresolved = complexMetrics.filter((m) => m.isComplex);

  return {
    ticker,
    generatedAt,
    score,
    scoreDisplay: formatScore(score),
    verdict,
    verdictClass: verdict.toLowerCase().replace(/ /g, "-"),
    clearMetrics,
    complexMetrics,
    strengths: rated.filter((m) => m.ratingClass === "excellent" || m.ratingClass === "good"),
    watch: rated.filter((m) => m.ratingClass === "neutral"),
    concerns: rated.filter((m) => m.ratingClass === "bad" || m.ratingClass === "horrible"),
    unresolved,
    numExperts: originalAnalyses.length,
    numDebates: complexMetrics.length,
    numResolved: complexMetrics.length - unresolved.length,
  };
}

// ---------------------------------------------------------------------------
// Markdown
// ---------------------------------------------------------------------------

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\s*\n\s*/g, " ");
}

function labels(metrics: ReportMetric[]): string {
  return metrics.length > 0 ? metrics.map((m) => m.label).join(", ") : "None";
}

/**
 * Render the report as Markdown. Dates are UTC.
 */
export function formatConsensusReport(report: ConsensusReport): string {
  const iso = report.generatedAt.toISOString();
  const lines: string[] = [
    `# ${report.ticker} Financial Report`,
    "",
    `Generated ${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`,
    "",
    `**Verdict:** ${report.verdict} (score ${report.scoreDisplay} on a scale of -16 to +16)`,
    "",
    `Experts: ${report.numExperts} | Debates: ${report.numDebates} | Resolved: ${report.numResolved}`,
    "",
    "## Summary",
    "",
    `- **Strengths:** ${labels(report.strengths)}`,
    `- **Watch:** ${labels(report.watch)}`,
    `- **Concerns:** ${labels(report.concerns)}`,
    `- **Requires human review:** ${labels(report.unresolved)}`,
  ];

  if (report.clearMetrics.length > 0) {
    lines.push("", "## Clear metrics", "", "| Metric | Rating | Reason |", "| --- | --- | --- |");
    for (const m of report.clearMetrics) {
      lines.push(`| ${m.label} | ${m.rating} | ${cell(m.reason)} |`);
    }
  }

  if (report.complexMetrics.length > 0) {
    lines.push(
      "",
      "## Debated metrics",
      "",
      "| Metric | Before debate | Final | Reason |",
      "| --- | --- | --- | --- |"
    );
    for (const m of report.complexMetrics) {
      const before = m.beforeRatings.map((r) => r ?? "-").join(" / ");
      const reason = m.isComplex ? "No consensus, requires human review" : cell(m.reason);
      lines.push(`| ${m.label} | ${before} | ${m.rating} | ${reason} |`);
    }
  }

  return lines.join("\n") + "\n";
}
