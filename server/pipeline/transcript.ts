/**
 * Transcript
 *
 * Append-only, ordered record of utterances and gap markers for one session.
 * Order: start timestamp, then segment id. A gap marker sorts right after the
 * utterances of segments sealed before it.
 */

import type {
  TranscriptEntry,
  TranscriptSnapshot,
  Utterance,
} from "@shared/schema";

function entryTime(entry: TranscriptEntry): number {
  return entry.kind === "utterance" ? entry.startMs : entry.atMs;
}

function entryRank(entry: TranscriptEntry): number {
  return entry.kind === "utterance" ? entry.segmentId : entry.afterSegmentId + 0.5;
}

export function compareEntries(a: TranscriptEntry, b: TranscriptEntry): number {
  return entryTime(a) - entryTime(b) || entryRank(a) - entryRank(b);
}

export class Transcript {
  private readonly entries: TranscriptEntry[] = [];
  private readonly segmentIds = new Set<number>();
  private gaps = 0;

  get length(): number {
    return this.entries.length;
  }

  get utteranceCount(): number {
    return this.segmentIds.size;
  }

  get gapCount(): number {
    return this.gaps;
  }

  /**
   * Inserts in order and returns the index, or -1 when an utterance for the
   * same segment is already present.
   */
  insert(entry: TranscriptEntry): number {
    if (entry.kind === "utterance") {
      if (this.segmentIds.has(entry.segmentId)) return -1;
      this.segmentIds.add(entry.segmentId);
    } else {
      this.gaps++;
    }

    const frozen = Object.freeze({ ...entry });
    const index = this.upperBound(frozen);
    this.entries.splice(index, 0, frozen);
    return index;
  }

  utterances(): Utterance[] {
    return this.entries.filter((entry): entry is Utterance => entry.kind === "utterance");
  }

  snapshot(sessionId: string, final: boolean): TranscriptSnapshot {
    return {
      sessionId,
      takenAt: new Date().toISOString(),
      final,
      entries: Object.freeze([...this.entries]),
      utteranceCount: this.utteranceCount,
      gapCount: this.gaps,
    };
  }

  /** First index whose entry sorts strictly after `entry` */
  private upperBound(entry: TranscriptEntry): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareEntries(this.entries[mid], entry) <= 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
