/**
 * Core type definitions for the Equity Consensus consensus pipeline.
 *
 * Pipeline:
 *   Analysts       → independent per-metric ratings for a ticker
 *   Fill           → consensus-fill a single missing rating
 *   Harmonize      → collapse same-tier disagreement, flag the rest
 *   Debate         → multi-round negotiation on flagged metrics
 *   Score/Verdict  → extended score and verdict label
 */

// ---------------------------------------------------------------------------
// Metrics & Ratings
// ---------------------------------------------------------------------------

export type Metric =
  | "revenue"
  | "net_income"
  | "gross_margin"
  | "operational_costs"
  | "cash_flow"
  | "quarterly_growth"
  | "total_assets"
  | "total_debt";

export const METRICS: readonly Metric[] = [
  "revenue",
  "net_income",
  "gross_margin",
  "operational_costs",
  "cash_flow",
  "quarterly_growth",
  "total_assets",
  "total_debt",
] as const;

/** Build a record with one entry per metric. */
export function metricRecord<T>(fn: (metric: Metric) => T): Record<Metric, T> {
  return {
    revenue: fn("revenue"),
    net_income: fn("net_income"),
    gross_margin: fn("gross_margin"),
    operational_costs: fn("operational_costs"),
    cash_flow: fn("cash_flow"),
    quarterly_growth: fn("quarterly_growth"),
    total_assets: fn("total_assets"),
    total_debt: fn("total_debt"),
  };
}

export type Rating = "Excellent" | "Good" | "Neutral" | "Bad" | "Horrible";

/** Canonical order, best first. */
export const RATINGS: readonly Rating[] = [
  "Excellent",
  "Good",
  "Neutral",
  "Bad",
  "Horrible",
] as const;

export const COMPLEX = "COMPLEX" as const;

/** A debated metric ends in a rating or in an unresolved three-way split. */
export type FinalRating = Rating | typeof COMPLEX;

export type Tier = "positive" | "neutral" | "negative";

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

/**
 * One analyst's assessment of a ticker, as free text.
 * Downstream stages copy it; they never mutate it in place.
 */
export interface Analysis {
  ratings: Record<Metric, string>;
  reasons: Record<Metric, string>;
  /** "X/8" composite strength */
  financialStrength: string;
  overallSummary: string;
}

export interface AnalystResult {
  analyst: string;
  analysis: Analysis;
  responseTimeMs: number;
}

export interface AnalystFailure {
  analyst: string;
  error: string;
}

// ---------------------------------------------------------------------------
// Agreement
// ---------------------------------------------------------------------------

export type DebateLevel = "none" | "small" | "large";

export interface AgreementInfo {
  debateLevel: DebateLevel;
  scoreSpread: number;
  scores: number[];
  metricDisagreements: Metric[];
  missingData: boolean;
}

export interface MetricComparisonRow {
  metric: Metric;
  ratings: (Rating | null)[];
  spread: number | null;
}

// ---------------------------------------------------------------------------
// Harmonization
// ---------------------------------------------------------------------------

export type HarmonizationAction =
  | "already_aligned"
  | "harmonized"
  | "debate"
  | "skipped";

export type HarmonizationReason =
  | "insufficient_data"
  | "neutral_present"
  | "cross_tier_conflict";

export interface HarmonizationRecord {
  metric: Metric;
  action: HarmonizationAction;
  /** Per-analyst ratings before harmonization (null = missing) */
  ratings: (Rating | null)[];
  result?: Rating;
  reason?: HarmonizationReason;
}

export interface HarmonizationResult {
  harmonizedAnalyses: Analysis[];
  metricsToDebate: Metric[];
  harmonizationLog: HarmonizationRecord[];
}

// ---------------------------------------------------------------------------
// Debate
// ---------------------------------------------------------------------------

export interface DebatePosition {
  participant: string;
  rating: Rating | null;
  reason: string;
  history: string[];
  conversationId: string;
}

export type DebateRound = number | "final";

export interface TranscriptEntry {
  round: DebateRound;
  metric: Metric;
  participant: string;
  content: string;
  failed: boolean;
}

export interface PositionChange {
  participant: string;
  metric: Metric;
  from: Rating | null;
  to: Rating;
}

export interface FinalVote {
  participant: string;
  rating: Rating | null;
  fallback: boolean;
}

export interface MetricDebateResult {
  metric: Metric;
  finalRating: FinalRating;
  votes: FinalVote[];
  transcript: TranscriptEntry[];
  changes: PositionChange[];
}

export interface DebateOutcome {
  results: MetricDebateResult[];
  debateResults: Partial<Record<Metric, FinalRating>>;
  positionChanges: PositionChange[];
  transcript: TranscriptEntry[];
}

// ---------------------------------------------------------------------------
// Consensus Result
// ---------------------------------------------------------------------------

export type Verdict =
  | "Extremely Risky"
  | "Risky"
  | "Neutral"
  | "Safe"
  | "Extremely Safe";

export interface ConsensusResult {
  ticker: string;
  /** null = skipped for insufficient data */
  finalRatings: Record<Metric, FinalRating | null>;
  strengthScores: number[];
  extendedScore: number;
  verdict: Verdict;
  complexMetrics: Metric[];
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

export interface InvocationContext {
  /** Scopes conversational memory; never shared across metric debates */
  conversationId: string;
  signal?: AbortSignal;
}

/** Anything that turns a prompt into text: analysts and debaters alike. */
export interface TextCapability {
  name: string;
  invoke(prompt: string, context: InvocationContext): Promise<string>;
  /** Drop any turns remembered for the conversation. */
  release?(conversationId: string): void;
}

export interface Analyst {
  name: string;
  analyze(ticker: string, context: string): Promise<Analysis>;
}

// ---------------------------------------------------------------------------
// Progress Events
// ---------------------------------------------------------------------------

export type ConsensusEventType =
  | "analysts_start"
  | "analyst_complete"
  | "analyst_failed"
  | "agreement_complete"
  | "harmonization_complete"
  | "debate_triggered"
  | "debate_metric_start"
  | "position_changed"
  | "debate_metric_complete"
  | "complete"
  | "error";

export interface ConsensusEvent<T = unknown> {
  type: ConsensusEventType;
  message: string;
  data?: T;
}

export type EmitFn = (event: ConsensusEvent) => void;
