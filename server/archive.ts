/**
 * Archive Store
 *
 * Persists transcript snapshots (periodic checkpoints and the final hand-off)
 * and meeting summaries in SQLite.
 */

import Database from "better-sqlite3";
import { desc, eq } from "drizzle-orm";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import {
  meetingSummaries,
  transcriptSnapshots,
  type MeetingSummary,
  type TranscriptSnapshot,
} from "@shared/schema";
import { log } from "./logger";

export interface ArchiveStore {
  writeSnapshot(snapshot: TranscriptSnapshot): Promise<void>;
  writeSummary(sessionId: string, summary: MeetingSummary): Promise<void>;
  latestSnapshot(sessionId: string): Promise<TranscriptSnapshot | null>;
  getSummary(sessionId: string): Promise<MeetingSummary | null>;
}

const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS transcript_snapshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    taken_at TEXT NOT NULL,
    final INTEGER NOT NULL DEFAULT 0,
    utterance_count INTEGER NOT NULL,
    gap_count INTEGER NOT NULL,
    entries TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_transcript_snapshots_session
    ON transcript_snapshots(session_id, id);

  CREATE TABLE IF NOT EXISTS meeting_summaries (
    session_id TEXT PRIMARY KEY,
    summary TEXT NOT NULL,
    notes TEXT NOT NULL,
    action_items TEXT NOT NULL,
    decisions TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
`;

export class SqliteArchiveStore implements ArchiveStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;

  constructor(dbPath: string) {
    this.sqlite = new Database(dbPath);
    if (dbPath !== ":memory:") {
      this.sqlite.pragma("journal_mode = WAL");
    }
    this.sqlite.exec(CREATE_TABLES);
    this.db = drizzle(this.sqlite);
    log(`Archive store ready at ${dbPath}`, "archive");
  }

  async writeSnapshot(snapshot: TranscriptSnapshot): Promise<void> {
    this.db
      .insert(transcriptSnapshots)
      .values({
        sessionId: snapshot.sessionId,
        takenAt: snapshot.takenAt,
        final: snapshot.final,
        utteranceCount: snapshot.utteranceCount,
        gapCount: snapshot.gapCount,
        entries: [...snapshot.entries],
      })
      .run();
    log(
      `[Archive] Stored ${snapshot.final ? "final" : "checkpoint"} snapshot for ${snapshot.sessionId} (${snapshot.utteranceCount} utterances)`,
      "archive",
      "debug"
    );
  }

  async writeSummary(sessionId: string, summary: MeetingSummary): Promise<void> {
    const row = {
      summary: summary.summary,
      notes: summary.notes,
      actionItems: summary.actionItems,
      decisions: summary.decisions,
      createdAt: new Date().toISOString(),
    };
    this.db
      .insert(meetingSummaries)
      .values({ sessionId, ...row })
      .onConflictDoUpdate({ target: meetingSummaries.sessionId, set: row })
      .run();
  }

  async latestSnapshot(sessionId: string): Promise<TranscriptSnapshot | null> {
    const row = this.db
      .select()
      .from(transcriptSnapshots)
      .where(eq(transcriptSnapshots.sessionId, sessionId))
      .orderBy(desc(transcriptSnapshots.id))
      .limit(1)
      .get();
    if (!row) return null;

    return {
      sessionId: row.sessionId,
      takenAt: row.takenAt,
      final: row.final,
      entries: row.entries,
      utteranceCount: row.utteranceCount,
      gapCount: row.gapCount,
    };
  }

  async getSummary(sessionId: string): Promise<MeetingSummary | null> {
    const row = this.db
      .select()
      .from(meetingSummaries)
      .where(eq(meetingSummaries.sessionId, sessionId))
      .get();
    if (!row) return null;

    return {
      summary: row.summary,
      notes: row.notes,
      actionItems: row.actionItems,
      decisions: row.decisions,
    };
  }

  /** Throws when the database cannot be queried */
  ping(): void {
    this.sqlite.prepare("SELECT 1").get();
  }

  close(): void {
    this.sqlite.close();
  }
}
