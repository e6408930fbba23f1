/**
 * Analysis parser: extracts the analyst's JSON object from free text.
 *
 * Providers differ in how they wrap structured output:
 *   '{"revenue": "Good ...", ...}'
 *   "Returning structured response: {'revenue': 'Good ...', ...}"
 * The first flat {...} block is taken, parsed as JSON, and failing that
 * as a single-quoted literal. The result is validated with Zod.
 */

import { z } from "zod";
import type { Analysis } from "./types";
import { METRICS, metricRecord } from "./types";

const STRUCTURED_PREFIX = "Returning structured response:";

const metricFields = Object.fromEntries(
  METRICS.flatMap((m) => [
    [m, z.string().default("")],
    [`${m}_reason`, z.string().default("")],
  ])
);

export const AnalystOutputSchema = z
  .object({
    ...metricFields,
    financial_strength: z.string(),
    overall_summary: z.string().default(""),
  })
  .passthrough();

/** Convert a single-quoted object literal into parseable JSON. */
export function singleQuotedToJson(literal: string): string {
  return literal.replace(/'((?:[^'\\]|\\.)*)'/g, (_, inner: string) =>
    JSON.stringify(inner.replace(/\\'/g, "'"))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Locate and parse the structured object. Returns null when nothing in the
 * text parses as an object.
 */
export function extractStructuredData(text: string): Record<string, unknown> | null {
  if (!text) return null;
  const content = text.replace(STRUCTURED_PREFIX, "").trim();

  const objectMatch = content.match(/\{[^}]+\}/);
  const candidates = objectMatch
    ? [objectMatch[0], singleQuotedToJson(objectMatch[0]), content]
    : [content];

  for (const candidate of candidates) {
    const parsed = tryParseJson(candidate);
    if (isRecord(parsed)) return parsed;
  }
  return null;
}

export type AnalysisParseResult =
  | { success: true; analysis: Analysis }
  | { success: false; error: string };

function readField(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  return typeof value === "string" ? value : "";
}

/**
 * Turn an analyst's raw reply into an Analysis.
 */
export function parseAnalysis(text: string): AnalysisParseResult {
  const data = extractStructuredData(text);
  if (!data) {
    return { success: false, error: "no JSON object found in response" };
  }

  const parsed = AnalystOutputSchema.safeParse(data);
  if (!parsed.success) {
    return {
      success: false,
      error: parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; "),
    };
  }

  const out: Record<string, unknown> = parsed.data;

  return {
    success: true,
    analysis: {
      ratings: metricRecord((metric) => readField(out, metric)),
      reasons: metricRecord((metric) => readField(out, `${metric}_reason`)),
      financialStrength: readField(out, "financial_strength"),
      overallSummary: readField(out, "overall_summary"),
    },
  };
}
