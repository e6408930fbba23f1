/**
 * Debate - Round 1 → Review (rounds 2..N-1) → Final → Majority
 *
 * Resolves metrics the harmonizer could not settle. Each participant is
 * seeded with one analyst's (harmonized) rating and reasoning, argues its
 * case, sees the others' positions, may move, and finally commits.
 *
 * Metrics are debated one at a time. Inside a round all participants are
 * queried in parallel and the round waits for every call to settle. A failed
 * call becomes an "[Error: ...]" transcript entry; it never aborts the round.
 *
 * Two or more matching final votes win. Anything else is COMPLEX.
 */

import type {
  Analysis,
  DebateOutcome,
  DebatePosition,
  DebateRound,
  EmitFn,
  FinalRating,
  FinalVote,
  Metric,
  MetricDebateResult,
  PositionChange,
  Rating,
  TextCapability,
  TranscriptEntry,
} from "./types";
import { DEFAULT_CONSENSUS_CONFIG } from "./config";
import { invokeWithTimeout } from "./openrouter";
import { parseMetricRating } from "./rating-parser";
import {
  errorPlaceholder,
  extractFinalRating,
  extractUpdatedRating,
  resolveMajority,
} from "./debate-parser";
import {
  buildDebateFinalPrompt,
  buildDebateReviewPrompt,
  buildDebateRound1Prompt,
} from "./prompts";
import type { SessionLog } from "./session-log";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DebateParams {
  ticker: string;
  metricsToDebate: Metric[];
  /** Harmonized analyses; analysis i seeds participant i */
  analyses: Analysis[];
  participants: TextCapability[];
  rounds?: number;
  timeoutMs?: number;
  reviewExcerptChars?: number;
  finalExcerptChars?: number;
  log?: SessionLog;
  emit?: EmitFn;
  /** Overrides the random suffix of conversation ids */
  threadSuffix?: () => string;
}

interface RoundResponse {
  content: string;
  failed: boolean;
}

interface DebateSettings {
  rounds: number;
  timeoutMs: number;
  reviewExcerptChars: number;
  finalExcerptChars: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function randomThreadSuffix(): string {
  return crypto.randomUUID().replace(/-/g, "").slice(0, 8);
}

export function debateThreadId(ticker: string, metric: Metric, suffix: string): string {
  return `debate_${ticker}_${metric}_${suffix}`;
}

/**
 * Seed one position per participant from the analyst at the same index.
 * Conversation ids are unique per (ticker, metric, participant).
 */
export function initializePositions(
  ticker: string,
  metric: Metric,
  analyses: Analysis[],
  participants: TextCapability[],
  suffix: string
): DebatePosition[] {
  const threadId = debateThreadId(ticker, metric, suffix);

  return participants.map((participant, i) => {
    const analysis = analyses[i];
    return {
      participant: participant.name,
      rating: parseMetricRating(analysis.ratings[metric]),
      reason: analysis.reasons[metric] || "No reason provided",
      history: [],
      conversationId: `${threadId}_${participant.name}`,
    };
  });
}

/**
 * Query every participant in parallel and wait for all of them.
 */
async function runRound(
  positions: DebatePosition[],
  participants: TextCapability[],
  prompts: string[],
  timeoutMs: number,
  log?: SessionLog
): Promise<RoundResponse[]> {
  const settled = await Promise.allSettled(
    participants.map((participant, i) =>
      invokeWithTimeout(participant, prompts[i], positions[i].conversationId, timeoutMs)
    )
  );

  return settled.map((result, i) => {
    if (result.status === "fulfilled") {
      return { content: result.value, failed: false };
    }
    const content = errorPlaceholder(result.reason);
    log?.warn("debate", `${positions[i].participant} failed: ${content}`);
    return { content, failed: true };
  });
}

function transcriptEntry(
  round: DebateRound,
  metric: Metric,
  position: DebatePosition,
  response: RoundResponse
): TranscriptEntry {
  return {
    round,
    metric,
    participant: position.participant,
    content: response.content,
    failed: response.failed,
  };
}

// ---------------------------------------------------------------------------
// Single Metric
// ---------------------------------------------------------------------------

/**
 * Debate one metric to completion.
 */
export async function debateSingleMetric(
  ticker: string,
  metric: Metric,
  analyses: Analysis[],
  participants: TextCapability[],
  settings: DebateSettings,
  options: { log?: SessionLog; emit?: EmitFn; suffix: string }
): Promise<MetricDebateResult> {
  const { log, emit } = options;
  const positions = initializePositions(
    ticker,
    metric,
    analyses,
    participants,
    options.suffix
  );

  try {
    const transcript: TranscriptEntry[] = [];
    const changes: PositionChange[] = [];

    log?.info(
      "debate",
      `Starting debate on ${metric}: ${positions
        .map((p) => `${p.participant}=${p.rating ?? "missing"}`)
        .join(", ")}`
    );

    // --- Round 1: state positions ---
    const round1 = await runRound(
      positions,
      participants,
      positions.map((position) =>
        buildDebateRound1Prompt({ ticker, metric, position, panelSize: positions.length })
      ),
      settings.timeoutMs,
      log
    );
    round1.forEach((response, i) => {
      positions[i].history.push(response.content);
      transcript.push(transcriptEntry(1, metric, positions[i], response));
    });

    // --- Rounds 2..N-1: review ---
    for (let roundNum = 2; roundNum < settings.rounds; roundNum++) {
      const prompts = positions.map((position, i) =>
        buildDebateReviewPrompt({
          ticker,
          metric,
          position,
          others: positions.filter((_, j) => j !== i),
          excerptChars: settings.reviewExcerptChars,
        })
      );
      const responses = await runRound(
        positions,
        participants,
        prompts,
        settings.timeoutMs,
        log
      );

      responses.forEach((response, i) => {
        const position = positions[i];
        const updated = response.failed ? null : extractUpdatedRating(response.content);

        if (updated && updated !== position.rating) {
          const change: PositionChange = {
            participant: position.participant,
            metric,
            from: position.rating,
            to: updated,
          };
          changes.push(change);
          position.rating = updated;
          log?.info(
            "debate",
            `${position.participant} changed ${metric}: ${change.from ?? "missing"} → ${updated}`
          );
          emit?.({
            type: "position_changed",
            message: `${position.participant} moved ${metric} from ${change.from ?? "missing"} to ${updated}`,
            data: change,
          });
        }

        position.history.push(response.content);
        transcript.push(transcriptEntry(roundNum, metric, position, response));
      });
    }

    // --- Final round: commit ---
    const finals = await runRound(
      positions,
      participants,
      positions.map((position) =>
        buildDebateFinalPrompt({
          ticker,
          metric,
          position,
          excerptChars: settings.finalExcerptChars,
        })
      ),
      settings.timeoutMs,
      log
    );

    const votes: FinalVote[] = finals.map((response, i) => {
      const position = positions[i];
      const extracted = response.failed ? null : extractFinalRating(response.content);
      transcript.push(transcriptEntry("final", metric, position, response));
      return {
        participant: position.participant,
        rating: extracted ?? position.rating,
        fallback: extracted === null,
      };
    });

    const finalRating: FinalRating = resolveMajority(
      votes.map((v) => v.rating).filter((r): r is Rating => r !== null)
    );

    log?.info(
      "debate",
      `Consensus on ${metric}: ${finalRating} (${votes
        .map((v) => `${v.participant}=${v.rating ?? "none"}${v.fallback ? " (fallback)" : ""}`)
        .join(", ")})`
    );

    return { metric, finalRating, votes, transcript, changes };
  } finally {
    // Conversations end with the vote
    participants.forEach((participant, i) =>
      participant.release?.(positions[i].conversationId)
    );
  }
}

// ---------------------------------------------------------------------------
// Full Debate
// ---------------------------------------------------------------------------

/**
 * Debate every flagged metric, one after the other.
 */
export async function runDebate(params: DebateParams): Promise<DebateOutcome> {
  const {
    ticker,
    metricsToDebate,
    analyses,
    log,
    emit,
    threadSuffix = randomThreadSuffix,
  } = params;

  const settings: DebateSettings = {
    rounds: params.rounds ?? DEFAULT_CONSENSUS_CONFIG.debateRounds,
    timeoutMs: params.timeoutMs ?? DEFAULT_CONSENSUS_CONFIG.timeoutMs,
    reviewExcerptChars:
      params.reviewExcerptChars ?? DEFAULT_CONSENSUS_CONFIG.reviewExcerptChars,
    finalExcerptChars:
      params.finalExcerptChars ?? DEFAULT_CONSENSUS_CONFIG.finalExcerptChars,
  };

  if (settings.rounds < 2) {
    throw new Error(`Debate requires at least 2 rounds, got ${settings.rounds}.`);
  }

  // Participant i argues analyst i's position
  const seatCount = Math.min(params.participants.length, analyses.length);
  const participants = params.participants.slice(0, seatCount);
  if (metricsToDebate.length > 0 && participants.length < 2) {
    throw new Error(
      `Debate requires at least 2 participants with analyses, got ${participants.length}.`
    );
  }

  const results: MetricDebateResult[] = [];

  for (const metric of metricsToDebate) {
    emit?.({
      type: "debate_metric_start",
      message: `Debating ${metric}...`,
      data: { metric },
    });

    const result = await debateSingleMetric(
      ticker,
      metric,
      analyses,
      participants,
      settings,
      { log, emit, suffix: threadSuffix() }
    );
    results.push(result);

    emit?.({
      type: "debate_metric_complete",
      message:
        result.finalRating === "COMPLEX"
          ? `${metric}: COMPLEX (no consensus, requires human review)`
          : `${metric}: ${result.finalRating}`,
      data: { metric, finalRating: result.finalRating },
    });
  }

  const debateResults: Partial<Record<Metric, FinalRating>> = {};
  for (const r of results) {
    debateResults[r.metric] = r.finalRating;
  }

  return {
    results,
    debateResults,
    positionChanges: results.flatMap((r) => r.changes),
    transcript: results.flatMap((r) => r.transcript),
  };
}
