/**
 * Persistence sink: where a finished research session is archived.
 *
 * Write-only from the pipeline's point of view. A failing sink is logged
 * and never fails the session.
 */

import type {
  Analysis,
  AnalystFailure,
  ConsensusResult,
  HarmonizationRecord,
  PositionChange,
  TranscriptEntry,
} from "./types";
import type { SessionLog, SessionLogEntry } from "./session-log";
import { errorMessage } from "./errors";

export interface SessionArchive {
  sessionId: string;
  ticker: string;
  startedAt: Date;
  completedAt: Date;
  analysts: string[];
  failures: AnalystFailure[];
  originalAnalyses: Analysis[];
  harmonizationLog: HarmonizationRecord[];
  transcript: TranscriptEntry[];
  positionChanges: PositionChange[];
  result: ConsensusResult;
  logEntries: SessionLogEntry[];
}

export interface PersistenceSink {
  saveSession(archive: SessionArchive): Promise<void>;
}

/**
 * Hand the archive to the sink. Returns false when the sink failed.
 */
export async function archiveSession(
  sink: PersistenceSink,
  archive: SessionArchive,
  log: SessionLog
): Promise<boolean> {
  try {
    await sink.saveSession(archive);
    log.info("persistence", `Archived session ${archive.sessionId}`);
    return true;
  } catch (error) {
    log.error("persistence", `Failed to archive session: ${errorMessage(error)}`);
    return false;
  }
}
