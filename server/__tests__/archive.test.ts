/**
 * Archive Store Tests
 *
 * Runs against an in-memory SQLite database.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { MeetingSummary, TranscriptSnapshot } from "@shared/schema";
import { SqliteArchiveStore } from "../archive";

function snapshot(sessionId: string, final: boolean, text: string): TranscriptSnapshot {
  return {
    sessionId,
    takenAt: "2026-01-05T10:00:00.000Z",
    final,
    entries: [
      {
        kind: "utterance",
        segmentId: 1,
        startMs: 0,
        endMs: 1200,
        speakerLabel: "SPEAKER_0",
        speakerConfidence: 0.8,
        text,
        confidence: 0.9,
        degraded: false,
      },
      { kind: "gap", atMs: 1200, afterSegmentId: 1, reason: "disconnect" },
    ],
    utteranceCount: 1,
    gapCount: 1,
  };
}

const summary: MeetingSummary = {
  summary: "Agreed on the release date.",
  notes: ["Release moves to Friday"],
  actionItems: [{ task: "Update the changelog", owner: "SPEAKER_0", priority: "high" }],
  decisions: ["Ship on Friday"],
};

describe("SqliteArchiveStore", () => {
  let store: SqliteArchiveStore;

  beforeEach(() => {
    store = new SqliteArchiveStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("should return null for sessions it has never seen", async () => {
    expect(await store.latestSnapshot("missing")).toBeNull();
    expect(await store.getSummary("missing")).toBeNull();
  });

  it("should return the most recent snapshot for a session", async () => {
    await store.writeSnapshot(snapshot("session-a", false, "checkpoint"));
    await store.writeSnapshot(snapshot("session-b", false, "other session"));
    await store.writeSnapshot(snapshot("session-a", true, "final"));

    const latest = await store.latestSnapshot("session-a");
    expect(latest).toEqual(snapshot("session-a", true, "final"));
  });

  it("should store and overwrite summaries", async () => {
    await store.writeSummary("session-a", summary);
    expect(await store.getSummary("session-a")).toEqual(summary);

    const revised = { ...summary, decisions: ["Ship on Monday"] };
    await store.writeSummary("session-a", revised);
    expect(await store.getSummary("session-a")).toEqual(revised);
  });

  it("should answer a ping while open", () => {
    expect(() => store.ping()).not.toThrow();
  });
});
