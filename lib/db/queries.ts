/**
 * Database repository functions.
 *
 * All database access goes through these functions: no raw queries
 * elsewhere in the codebase. Grouped by domain entity.
 */

import { eq, desc, asc } from "drizzle-orm";
import { db } from "./index";
import {
  researchSessions,
  harmonizationRecords,
  debateTranscripts,
  positionChanges,
} from "./schema";
import type { SessionArchive } from "@/lib/consensus/persistence";
import type {
  HarmonizationRecord,
  PositionChange,
  TranscriptEntry,
} from "@/lib/consensus/types";

type Transaction = Parameters<Parameters<typeof db.transaction>[0]>[0];

// ---------------------------------------------------------------------------
// Child rows
// ---------------------------------------------------------------------------

async function saveHarmonizationRecords(
  tx: Transaction,
  sessionId: string,
  records: HarmonizationRecord[]
) {
  if (records.length === 0) return;
  await tx.insert(harmonizationRecords).values(
    records.map((r, position) => ({
      sessionId,
      position,
      metric: r.metric,
      action: r.action,
      ratings: r.ratings,
      result: r.result ?? null,
      reason: r.reason ?? null,
    }))
  );
}

async function saveDebateTranscript(
  tx: Transaction,
  sessionId: string,
  transcript: TranscriptEntry[]
) {
  if (transcript.length === 0) return;
  await tx.insert(debateTranscripts).values(
    transcript.map((t, position) => ({
      sessionId,
      position,
      metric: t.metric,
      round: String(t.round),
      participant: t.participant,
      content: t.content,
      failed: t.failed,
    }))
  );
}

async function savePositionChanges(
  tx: Transaction,
  sessionId: string,
  changes: PositionChange[]
) {
  if (changes.length === 0) return;
  await tx.insert(positionChanges).values(
    changes.map((c, position) => ({
      sessionId,
      position,
      metric: c.metric,
      participant: c.participant,
      fromRating: c.from,
      toRating: c.to,
    }))
  );
}

// ---------------------------------------------------------------------------
// Research Sessions
// ---------------------------------------------------------------------------

/**
 * Save a finished session: the session row and its child rows, in one
 * transaction.
 */
export async function saveResearchSession(archive: SessionArchive) {
  const { result } = archive;

  return db.transaction(async (tx) => {
    const [session] = await tx
      .insert(researchSessions)
      .values({
        id: archive.sessionId,
        ticker: archive.ticker,
        analysts: archive.analysts,
        failures: archive.failures,
        originalAnalyses: archive.originalAnalyses,
        finalRatings: result.finalRatings,
        strengthScores: result.strengthScores,
        extendedScore: result.extendedScore,
        verdict: result.verdict,
        complexMetrics: result.complexMetrics,
        logEntries: archive.logEntries,
        startedAt: archive.startedAt,
        completedAt: archive.completedAt,
      })
      .returning();

    await Promise.all([
      saveHarmonizationRecords(tx, session.id, archive.harmonizationLog),
      saveDebateTranscript(tx, session.id, archive.transcript),
      savePositionChanges(tx, session.id, archive.positionChanges),
    ]);

    return session;
  });
}

export async function getResearchSessionsByTicker(ticker: string) {
  return db
    .select({
      id: researchSessions.id,
      ticker: researchSessions.ticker,
      extendedScore: researchSessions.extendedScore,
      verdict: researchSessions.verdict,
      complexMetrics: researchSessions.complexMetrics,
      completedAt: researchSessions.completedAt,
    })
    .from(researchSessions)
    .where(eq(researchSessions.ticker, ticker.toUpperCase()))
    .orderBy(desc(researchSessions.completedAt));
}

/**
 * Most recent archived session for a ticker, or null if it was never
 * researched.
 */
export async function getLatestResearchSession(ticker: string) {
  const [session] = await db
    .select()
    .from(researchSessions)
    .where(eq(researchSessions.ticker, ticker.toUpperCase()))
    .orderBy(desc(researchSessions.completedAt))
    .limit(1);
  return session ?? null;
}

export async function getSessionTranscript(sessionId: string) {
  return db
    .select()
    .from(debateTranscripts)
    .where(eq(debateTranscripts.sessionId, sessionId))
    .orderBy(asc(debateTranscripts.position));
}

export async function getSessionHarmonization(sessionId: string) {
  return db
    .select()
    .from(harmonizationRecords)
    .where(eq(harmonizationRecords.sessionId, sessionId))
    .orderBy(asc(harmonizationRecords.position));
}
