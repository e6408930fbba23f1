/**
 * Prompt templates for analysts and debate participants.
 *
 * The debate prompts embed the "UPDATED RATING:" and "FINAL RATING:"
 * markers that debate-parser.ts extracts.
 */

import type { DebatePosition, Metric } from "./types";
import { METRICS } from "./types";

export const METRIC_LABELS: Record<Metric, string> = {
  revenue: "Revenue",
  net_income: "Net income",
  gross_margin: "Gross margin",
  operational_costs: "Operational costs",
  cash_flow: "Cash flow",
  quarterly_growth: "Quarterly growth",
  total_assets: "Total assets",
  total_debt: "Total debt",
};

const RATING_SCALE = "Excellent, Good, Neutral, Bad, Horrible";

function formatRating(rating: string | null): string {
  return rating ?? "Not rated";
}

// ---------------------------------------------------------------------------
// Analyst Prompt
// ---------------------------------------------------------------------------

export interface AnalystPromptInput {
  ticker: string;
  context: string;
}

/**
 * Ask an analyst for a structured quarterly assessment.
 */
export function buildAnalystPrompt(input: AnalystPromptInput): string {
  const fields = METRICS.map(
    (m) => `  "${m}": "<rating> — <short justification>",\n  "${m}_reason": "<evidence>"`
  ).join(",\n");

  const context = input.context.trim()
    ? input.context.trim()
    : "No filing excerpts were retrieved.";

  return `Analyze ${input.ticker}'s quarterly financial performance. Look for: revenue, net income, gross margin, operational costs, cash flow, quarterly growth, total assets, and total debt.

FILING EXCERPTS:
${context}

Rate every metric on this scale: ${RATING_SCALE}.
Start each rating with the rating word. If the excerpts do not support a rating, write "Not enough information" instead.

Count the metrics rated Good or Excellent and report it as "X/8" in financial_strength.

Reply with ONLY a JSON object in this exact shape:
{
${fields},
  "financial_strength": "X/8",
  "overall_summary": "<two or three sentences>"
}`;
}

// ---------------------------------------------------------------------------
// Debate Prompts
// ---------------------------------------------------------------------------

export interface DebatePromptInput {
  ticker: string;
  metric: Metric;
  position: DebatePosition;
}

export interface Round1PromptInput extends DebatePromptInput {
  /** Participants seated for this metric */
  panelSize: number;
}

/**
 * Round 1: state and defend the initial position.
 */
export function buildDebateRound1Prompt(input: Round1PromptInput): string {
  const { ticker, metric, position, panelSize } = input;

  return `You are a financial analyst on a ${panelSize}-member panel reviewing ${ticker}.
The panel disagrees on one metric: ${METRIC_LABELS[metric]}.

YOUR RATING: ${formatRating(position.rating)}
YOUR REASONING: ${position.reason || "No reason provided"}

State your position on ${METRIC_LABELS[metric]} for ${ticker}. Explain the evidence behind your rating in a short paragraph. The scale is: ${RATING_SCALE}.`;
}

export interface ReviewPromptInput extends DebatePromptInput {
  others: DebatePosition[];
  excerptChars: number;
}

/**
 * Review rounds: see the other panelists' positions and optionally move.
 */
export function buildDebateReviewPrompt(input: ReviewPromptInput): string {
  const { ticker, metric, position, others, excerptChars } = input;

  const othersText = others
    .map((o) => {
      let line = `- ${o.participant}: ${formatRating(o.rating)} - ${o.reason || "No reason provided"}`;
      const latest = o.history[o.history.length - 1];
      if (latest) {
        line += `\n  Their latest argument: ${latest.slice(0, excerptChars)}...`;
      }
      return line;
    })
    .join("\n");

  return `Debate on ${METRIC_LABELS[metric]} for ${ticker}.

YOUR CURRENT RATING: ${formatRating(position.rating)}
YOUR REASONING: ${position.reason || "No reason provided"}

OTHER PANELISTS:
${othersText}

Weigh their arguments against yours. You may keep your rating or change it.
If you change it, include this line exactly:
UPDATED RATING: <${RATING_SCALE.split(", ").join("|")}>`;
}

export interface FinalPromptInput extends DebatePromptInput {
  excerptChars: number;
}

/**
 * Final round: commit to one rating.
 */
export function buildDebateFinalPrompt(input: FinalPromptInput): string {
  const { ticker, metric, position, excerptChars } = input;

  const recent = position.history.slice(-2);
  const historySummary =
    recent.length > 0
      ? recent
          .map((entry, i) => `Round ${i + 1}: ${entry.slice(0, excerptChars)}...`)
          .join("\n")
      : "No prior debate rounds.";

  return `Final round of the debate on ${METRIC_LABELS[metric]} for ${ticker}.

YOUR CURRENT RATING: ${formatRating(position.rating)}

YOUR DEBATE SO FAR:
${historySummary}

Commit to your final stance. End your response with this line exactly:
FINAL RATING: <${RATING_SCALE.split(", ").join("|")}>`;
}
