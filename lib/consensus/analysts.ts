/**
 * Analysts: fan out the initial assessment to every analyst in parallel.
 *
 * Uses Promise.allSettled so one provider's failure doesn't block others.
 * At least one valid analysis is needed to continue.
 */

import type {
  Analysis,
  Analyst,
  AnalystFailure,
  AnalystResult,
  EmitFn,
  TextCapability,
} from "./types";
import { buildAnalystPrompt } from "./prompts";
import { parseAnalysis } from "./analysis-parser";
import { invokeWithTimeout } from "./openrouter";
import { AllAnalystsFailedError, AnalysisParseError, errorMessage } from "./errors";
import type { SessionLog } from "./session-log";

export interface CollectedAnalyses {
  results: AnalystResult[];
  failures: AnalystFailure[];
  elapsedMs: number;
}

/**
 * Wrap a text capability as an analyst: prompt, reply, structured parse.
 * Replies without a valid analysis throw AnalysisParseError.
 */
export function createLlmAnalyst(
  capability: TextCapability,
  options: { timeoutMs: number }
): Analyst {
  return {
    name: capability.name,
    async analyze(ticker: string, context: string): Promise<Analysis> {
      const conversationId = `analysis_${ticker}_${capability.name}_${crypto.randomUUID()}`;
      let reply: string;
      try {
        reply = await invokeWithTimeout(
          capability,
          buildAnalystPrompt({ ticker, context }),
          conversationId,
          options.timeoutMs
        );
      } finally {
        capability.release?.(conversationId);
      }

      const parsed = parseAnalysis(reply);
      if (!parsed.success) {
        throw new AnalysisParseError(capability.name, parsed.error);
      }
      return parsed.analysis;
    },
  };
}

/**
 * Query every analyst concurrently and keep whatever succeeded.
 *
 * @throws AllAnalystsFailedError when no analyst produced a valid analysis
 */
export async function collectAnalyses(
  ticker: string,
  context: string,
  analysts: Analyst[],
  options: { log?: SessionLog; emit?: EmitFn } = {}
): Promise<CollectedAnalyses> {
  const { log, emit } = options;
  const start = Date.now();

  emit?.({
    type: "analysts_start",
    message: "Analysts are reviewing the financial data...",
    data: { analysts: analysts.map((a) => a.name) },
  });

  const settled = await Promise.allSettled(
    analysts.map(async (analyst) => {
      const callStart = Date.now();
      const analysis = await analyst.analyze(ticker, context);
      return { analysis, responseTimeMs: Date.now() - callStart };
    })
  );

  const elapsedMs = Date.now() - start;
  const results: AnalystResult[] = [];
  const failures: AnalystFailure[] = [];

  settled.forEach((outcome, i) => {
    const analyst = analysts[i].name;
    if (outcome.status === "fulfilled") {
      results.push({ analyst, ...outcome.value });
      emit?.({
        type: "analyst_complete",
        message: `${analyst} says: ${outcome.value.analysis.financialStrength}`,
        data: { analyst },
      });
    } else {
      const error = errorMessage(outcome.reason);
      failures.push({ analyst, error });
      log?.warn("analysts", `${analyst} failed: ${error}`);
      emit?.({
        type: "analyst_failed",
        message: `${analyst} did not return an analysis`,
        data: { analyst, error },
      });
    }
  });

  log?.info(
    "analysts",
    `${results.length}/${analysts.length} analysts responded in ${(elapsedMs / 1000).toFixed(2)}s (parallel)`
  );

  if (results.length === 0) {
    throw new AllAnalystsFailedError(ticker, failures);
  }

  return { results, failures, elapsedMs };
}
