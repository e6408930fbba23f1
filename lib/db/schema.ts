/**
 * Drizzle ORM schema: archived research sessions.
 *
 * researchSessions holds one row per ticker run with its consensus result.
 * Child tables keep the harmonization log, the debate transcript and the
 * position changes, ordered by their `position` column.
 */

import {
  pgTable,
  text,
  timestamp,
  integer,
  jsonb,
  boolean,
  index,
} from "drizzle-orm/pg-core";
import type {
  Analysis,
  AnalystFailure,
  FinalRating,
  Metric,
  Rating,
} from "@/lib/consensus/types";
import type { SessionLogEntry } from "@/lib/consensus/session-log";

// ---------------------------------------------------------------------------
// Research Sessions
// ---------------------------------------------------------------------------

export const researchSessions = pgTable(
  "research_sessions",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    ticker: text("ticker").notNull(),
    analysts: jsonb("analysts").notNull().$type<string[]>(),
    failures: jsonb("failures").notNull().$type<AnalystFailure[]>(),
    originalAnalyses: jsonb("original_analyses").notNull().$type<Analysis[]>(),
    finalRatings: jsonb("final_ratings")
      .notNull()
      .$type<Record<Metric, FinalRating | null>>(),
    strengthScores: jsonb("strength_scores").notNull().$type<number[]>(),
    extendedScore: integer("extended_score").notNull(),
    verdict: text("verdict").notNull(),
    complexMetrics: jsonb("complex_metrics").notNull().$type<Metric[]>(),
    logEntries: jsonb("log_entries").notNull().$type<SessionLogEntry[]>(),
    startedAt: timestamp("started_at", { mode: "date" }).notNull(),
    completedAt: timestamp("completed_at", { mode: "date" }).notNull(),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
  },
  (t) => [index("research_sessions_ticker_idx").on(t.ticker, t.completedAt)]
);

// ---------------------------------------------------------------------------
// Harmonization
// ---------------------------------------------------------------------------

export const harmonizationRecords = pgTable("harmonization_records", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  sessionId: text("session_id")
    .notNull()
    .references(() => researchSessions.id, { onDelete: "cascade" }),
  position: integer("position").notNull(),
  metric: text("metric").notNull(),
  action: text("action", {
    enum: ["already_aligned", "harmonized", "debate", "skipped"],
  }).notNull(),
  ratings: jsonb("ratings").notNull().$type<(Rating | null)[]>(),
  result: text("result"),
  reason: text("reason"),
});

// ---------------------------------------------------------------------------
// Debate
// ---------------------------------------------------------------------------

export const debateTranscripts = pgTable("debate_transcripts", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  sessionId: text("session_id")
    .notNull()
    .references(() => researchSessions.id, { onDelete: "cascade" }),
  position: integer("position").notNull(),
  metric: text("metric").notNull(),
  /** "1", "2", ... or "final" */
  round: text("round").notNull(),
  participant: text("participant").notNull(),
  content: text("content").notNull(),
  failed: boolean("failed").default(false).notNull(),
});

export const positionChanges = pgTable("position_changes", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  sessionId: text("session_id")
    .notNull()
    .references(() => researchSessions.id, { onDelete: "cascade" }),
  position: integer("position").notNull(),
  metric: text("metric").notNull(),
  participant: text("participant").notNull(),
  fromRating: text("from_rating"),
  toRating: text("to_rating").notNull(),
});
