/**
 * Shared builders for the consensus tests.
 */

import type {
  Analysis,
  InvocationContext,
  Metric,
  TextCapability,
} from "@/lib/consensus/types";
import { METRICS, metricRecord } from "@/lib/consensus/types";

export function makeAnalysis(
  ratings: Partial<Record<Metric, string>> = {},
  options: {
    reasons?: Partial<Record<Metric, string>>;
    financialStrength?: string;
    overallSummary?: string;
  } = {}
): Analysis {
  return {
    ratings: metricRecord((m) => ratings[m] ?? "Good"),
    reasons: metricRecord((m) => options.reasons?.[m] ?? `Reason for ${m}`),
    financialStrength: options.financialStrength ?? "8/8",
    overallSummary: options.overallSummary ?? "Steady quarter.",
  };
}

/** The JSON object an analyst is asked to return. */
export function analystJson(
  ratings: Partial<Record<Metric, string>> = {},
  financialStrength = "8/8"
): string {
  const fields: Record<string, string> = {};
  for (const m of METRICS) {
    fields[m] = ratings[m] ?? "Good";
    fields[`${m}_reason`] = `Reason for ${m}`;
  }
  fields.financial_strength = financialStrength;
  fields.overall_summary = "Steady quarter.";
  return JSON.stringify(fields);
}

export interface RecordedCall {
  prompt: string;
  conversationId: string;
  signal?: AbortSignal;
}

export type FakeCapability = TextCapability & {
  calls: RecordedCall[];
  released: string[];
};

export function fakeCapability(
  name: string,
  reply: (prompt: string, context: InvocationContext) => string | Promise<string>
): FakeCapability {
  const calls: RecordedCall[] = [];
  const released: string[] = [];
  return {
    name,
    calls,
    released,
    async invoke(prompt, context) {
      calls.push({ prompt, conversationId: context.conversationId, signal: context.signal });
      return reply(prompt, context);
    },
    release(conversationId) {
      released.push(conversationId);
    },
  };
}

export type DebateStage = "round1" | "review" | "final";

export function debateStage(prompt: string): DebateStage {
  if (prompt.startsWith("Final round")) return "final";
  if (prompt.includes("OTHER PANELISTS")) return "review";
  return "round1";
}

/**
 * A participant answering each debate stage from a script. An Error in the
 * script makes that stage fail.
 */
export function debater(
  name: string,
  script: {
    round1?: string | Error;
    review?: string | Error;
    final: string | Error;
  }
): FakeCapability {
  return fakeCapability(name, (prompt) => {
    const stage = debateStage(prompt);
    const answer =
      stage === "final"
        ? script.final
        : stage === "review"
          ? (script.review ?? "I keep my rating.")
          : (script.round1 ?? `${name} states its case.`);
    if (answer instanceof Error) throw answer;
    return answer;
  });
}
