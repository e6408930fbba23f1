/**
 * Consensus pipeline - Agreement → Fill → Harmonize → Debate → Score
 *
 * runConsensus takes already-validated analyses for one ticker and returns
 * the consensus result together with every intermediate artifact.
 * researchTicker adds the analyst fan-out in front of it.
 */

import type {
  AgreementInfo,
  Analysis,
  Analyst,
  AnalystFailure,
  AnalystResult,
  ConsensusResult,
  DebateOutcome,
  EmitFn,
  FinalRating,
  HarmonizationRecord,
  HarmonizationResult,
  Metric,
  TextCapability,
} from "./types";
import { COMPLEX, METRICS, metricRecord } from "./types";
import type { ConsensusConfig } from "./config";
import { DEFAULT_CONSENSUS_CONFIG, resolveConsensusConfig } from "./config";
import {
  calculateAgreement,
  calculateAgreementFromScores,
  formatMetricComparison,
  getMetricComparison,
} from "./agreement";
import { cloneAnalysis, fillMissingWithConsensus } from "./consensus-filler";
import { harmonizeAndCheckDebates, summarizeHarmonization } from "./harmonizer";
import { runDebate } from "./debate";
import {
  calculateExtendedScore,
  formatScore,
  getVerdict,
  recalculateStrengthScores,
} from "./scoring";
import type { ConsensusReport } from "./report";
import { buildConsensusReport } from "./report";
import type { PersistenceSink } from "./persistence";
import { archiveSession } from "./persistence";
import type { CollectedAnalyses } from "./analysts";
import { collectAnalyses, createLlmAnalyst } from "./analysts";
import { createOpenRouterCapability } from "./openrouter";
import { AllAnalystsFailedError, errorMessage } from "./errors";
import { SessionLog } from "./session-log";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConsensusOptions {
  /** Debate participants; participant i argues analyst i's position */
  participants: TextCapability[];
  /** Display names for the analyses, in the same order */
  analystNames?: string[];
  config?: Partial<ConsensusConfig>;
  log?: SessionLog;
  emit?: EmitFn;
  sink?: PersistenceSink;
  /** Analysts that failed before the pipeline ran; archived with the session */
  failures?: AnalystFailure[];
  threadSuffix?: () => string;
  now?: () => Date;
}

export interface ConsensusRun {
  sessionId: string;
  result: ConsensusResult;
  agreement: AgreementInfo;
  harmonization: HarmonizationResult;
  debate: DebateOutcome | null;
  /** Harmonized analyses with resolved debate ratings applied */
  resolvedAnalyses: Analysis[];
  recalculatedAgreement: AgreementInfo;
  report: ConsensusReport;
  /** false when there was no sink or it failed */
  archived: boolean;
}

export type ResearchOutcome =
  | {
      status: "complete";
      ticker: string;
      analysts: AnalystResult[];
      failures: AnalystFailure[];
      run: ConsensusRun;
    }
  | {
      status: "all_failed";
      ticker: string;
      message: string;
      failures: AnalystFailure[];
    };

export const ALL_FAILED_MESSAGE = "All analyst calls failed. Please try again later.";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

function finalRatingFor(
  record: HarmonizationRecord,
  debateResults: Partial<Record<Metric, FinalRating>>
): FinalRating | null {
  switch (record.action) {
    case "already_aligned":
    case "harmonized":
      return record.result ?? null;
    case "debate":
      return debateResults[record.metric] ?? COMPLEX;
    case "skipped":
      return null;
  }
}

/**
 * Copy the analyses with every resolved (non-COMPLEX) debate rating written
 * into each analyst's rating for that metric.
 */
export function applyDebateResults(
  analyses: Analysis[],
  debateResults: Partial<Record<Metric, FinalRating>>
): Analysis[] {
  return analyses.map((analysis) => {
    const copy = cloneAnalysis(analysis);
    for (const metric of METRICS) {
      const rating = debateResults[metric];
      if (rating && rating !== COMPLEX) {
        copy.ratings[metric] = rating;
      }
    }
    return copy;
  });
}

// ---------------------------------------------------------------------------
// Consensus
// ---------------------------------------------------------------------------

/**
 * Run the consensus pipeline on one ticker's analyses.
 *
 * @throws AllAnalystsFailedError when no analyses are given
 */
export async function runConsensus(
  ticker: string,
  analyses: Analysis[],
  options: ConsensusOptions
): Promise<ConsensusRun> {
  const symbol = normalizeTicker(ticker);
  const now = options.now ?? (() => new Date());
  const log = options.log ?? new SessionLog(symbol, { now });
  const { emit } = options;

  if (analyses.length === 0) {
    throw new AllAnalystsFailedError(symbol, options.failures ?? []);
  }

  const config = resolveConsensusConfig(options.config);
  const names = options.analystNames ?? analyses.map((_, i) => `Analyst ${i + 1}`);

  // --- Agreement (diagnostic) ---
  const agreement = calculateAgreement(analyses);
  log.info(
    "agreement",
    `Score spread ${agreement.scoreSpread} (debate level: ${agreement.debateLevel})` +
      (agreement.missingData ? ", missing data" : ""),
    agreement
  );
  emit?.({
    type: "agreement_complete",
    message: `Analysts' scores: ${agreement.scores.map((s) => `${s}/8`).join(", ") || "none parsed"}`,
    data: agreement,
  });
  log.info(
    "comparison",
    `Before filling\n${formatMetricComparison(getMetricComparison(analyses), names)}`
  );

  // --- Fill ---
  const filled = fillMissingWithConsensus(analyses);
  log.info(
    "comparison",
    `After filling\n${formatMetricComparison(getMetricComparison(filled), names)}`
  );

  // --- Harmonize ---
  const harmonization = harmonizeAndCheckDebates(filled);
  const counts = summarizeHarmonization(harmonization.harmonizationLog);
  log.info(
    "harmonization",
    `${counts.already_aligned} aligned, ${counts.harmonized} harmonized, ${counts.debate} to debate, ${counts.skipped} skipped`,
    harmonization.harmonizationLog
  );
  emit?.({
    type: "harmonization_complete",
    message: `${counts.harmonized} metric(s) harmonized, ${counts.debate} need debate`,
    data: counts,
  });

  // --- Debate ---
  let debate: DebateOutcome | null = null;
  if (harmonization.metricsToDebate.length > 0) {
    const message = `Debate triggered on: ${harmonization.metricsToDebate.join(", ")}`;
    log.info("debate", message);
    emit?.({
      type: "debate_triggered",
      message,
      data: { metrics: harmonization.metricsToDebate },
    });

    debate = await runDebate({
      ticker: symbol,
      metricsToDebate: harmonization.metricsToDebate,
      analyses: harmonization.harmonizedAnalyses,
      participants: options.participants,
      rounds: config.debateRounds,
      timeoutMs: config.timeoutMs,
      reviewExcerptChars: config.reviewExcerptChars,
      finalExcerptChars: config.finalExcerptChars,
      log,
      emit,
      threadSuffix: options.threadSuffix,
    });
  }

  // --- Score ---
  const debateResults: Partial<Record<Metric, FinalRating>> = debate?.debateResults ?? {};
  const byMetric = new Map(harmonization.harmonizationLog.map((r) => [r.metric, r]));
  const finalRatings = metricRecord((metric) => {
    const record = byMetric.get(metric);
    return record ? finalRatingFor(record, debateResults) : null;
  });

  const resolvedAnalyses = applyDebateResults(harmonization.harmonizedAnalyses, debateResults);
  const strengthScores = recalculateStrengthScores(resolvedAnalyses);
  const recalculatedAgreement = calculateAgreementFromScores(strengthScores);
  const extendedScore = calculateExtendedScore(finalRatings);
  const verdict = getVerdict(extendedScore);

  const result: ConsensusResult = {
    ticker: symbol,
    finalRatings,
    strengthScores,
    extendedScore,
    verdict,
    complexMetrics: METRICS.filter((m) => finalRatings[m] === COMPLEX),
  };

  log.info(
    "score",
    `Recalculated scores ${strengthScores.map((s) => `${s}/8`).join(", ")}; ` +
      `extended score ${formatScore(extendedScore)} → ${verdict}`
  );
  emit?.({
    type: "complete",
    message: `${symbol}: ${verdict} (${formatScore(extendedScore)})`,
    data: result,
  });

  const report = buildConsensusReport(
    symbol,
    harmonization.harmonizationLog,
    analyses,
    debate,
    now()
  );

  let archived = false;
  if (options.sink) {
    archived = await archiveSession(
      options.sink,
      {
        sessionId: log.sessionId,
        ticker: symbol,
        startedAt: log.startedAt,
        completedAt: now(),
        analysts: names,
        failures: options.failures ?? [],
        originalAnalyses: analyses,
        harmonizationLog: harmonization.harmonizationLog,
        transcript: debate?.transcript ?? [],
        positionChanges: debate?.positionChanges ?? [],
        result,
        logEntries: log.getEntries(),
      },
      log
    );
  }

  return {
    sessionId: log.sessionId,
    result,
    agreement,
    harmonization,
    debate,
    resolvedAnalyses,
    recalculatedAgreement,
    report,
    archived,
  };
}

// ---------------------------------------------------------------------------
// Research Session
// ---------------------------------------------------------------------------

export interface ResearchOptions extends Omit<ConsensusOptions, "analystNames" | "failures"> {
  analysts: Analyst[];
}

/**
 * Collect analyses for a ticker and run the consensus pipeline on them.
 * Total analyst failure is an outcome, not an exception.
 */
export async function researchTicker(
  ticker: string,
  context: string,
  options: ResearchOptions
): Promise<ResearchOutcome> {
  const symbol = normalizeTicker(ticker);
  const log = options.log ?? new SessionLog(symbol, { now: options.now });
  const { emit } = options;

  let collected: CollectedAnalyses;
  try {
    collected = await collectAnalyses(symbol, context, options.analysts, { log, emit });
  } catch (error) {
    if (!(error instanceof AllAnalystsFailedError)) throw error;
    log.error("analysts", errorMessage(error), error.failures);
    emit?.({ type: "error", message: ALL_FAILED_MESSAGE, data: error.failures });
    return {
      status: "all_failed",
      ticker: symbol,
      message: ALL_FAILED_MESSAGE,
      failures: error.failures,
    };
  }

  const run = await runConsensus(
    symbol,
    collected.results.map((r) => r.analysis),
    {
      ...options,
      log,
      analystNames: collected.results.map((r) => r.analyst),
      failures: collected.failures,
    }
  );

  return {
    status: "complete",
    ticker: symbol,
    analysts: collected.results,
    failures: collected.failures,
    run,
  };
}

/**
 * Analysts and debate participants backed by OpenRouter, one per configured
 * model.
 */
export function createOpenRouterPanel(
  config: ConsensusConfig = DEFAULT_CONSENSUS_CONFIG,
  env: NodeJS.ProcessEnv = process.env
): { analysts: Analyst[]; participants: TextCapability[] } {
  return {
    analysts: config.analystModels.map((model) =>
      createLlmAnalyst(createOpenRouterCapability(model, { env }), {
        timeoutMs: config.timeoutMs,
      })
    ),
    participants: config.debaterModels.map((model) =>
      createOpenRouterCapability(model, { env })
    ),
  };
}
