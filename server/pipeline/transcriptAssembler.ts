/**
 * Transcript Assembler
 *
 * Keyed join of diarization and transcription results. Each registered
 * segment walks:
 *
 *   waiting_both -> has_diarization | has_transcription -> joined -> appended
 *
 * Discardable segments go straight to `dropped`. A segment still missing a
 * half after `segmentTimeoutMs` is finalized with a degraded placeholder for
 * that half. Late, duplicate and unknown results are ignored.
 */

import type {
  DiarizationResult,
  GapMarker,
  GapReason,
  SealedSegment,
  TranscriptSnapshot,
  TranscriptionResult,
  Utterance,
} from "@shared/schema";
import { log } from "../logger";
import { degradedDiarization } from "./diarizationWorker";
import { Transcript } from "./transcript";
import { degradedTranscription } from "./transcriptionWorker";

export type SegmentPhase =
  | "waiting_both"
  | "has_diarization"
  | "has_transcription"
  | "joined"
  | "appended"
  | "dropped";

export type AcceptOutcome = "stored" | "appended" | "duplicate" | "unknown" | "dropped";

export type FinalizeReason = "timeout" | "drain";

export interface TranscriptAssemblerOptions {
  sessionId: string;
  segmentTimeoutMs: number;
}

export interface AssemblerStats {
  registered: number;
  pending: number;
  appended: number;
  dropped: number;
  duplicates: number;
  unknown: number;
  timedOut: number;
  forced: number;
}

interface PendingSegment {
  segment: SealedSegment;
  phase: "waiting_both" | "has_diarization" | "has_transcription";
  diarization?: DiarizationResult;
  transcription?: TranscriptionResult;
  timer: ReturnType<typeof setTimeout>;
}

export function joinResults(
  segment: SealedSegment,
  diarization: DiarizationResult,
  transcription: TranscriptionResult
): Utterance {
  return {
    kind: "utterance",
    segmentId: segment.id,
    startMs: segment.startMs,
    endMs: segment.endMs,
    speakerLabel: diarization.speakerLabel,
    speakerConfidence: diarization.confidence,
    text: transcription.text,
    confidence: transcription.confidence,
    ...(transcription.words ? { words: transcription.words } : {}),
    degraded: diarization.degraded || transcription.degraded,
  };
}

export class TranscriptAssembler {
  private readonly transcript = new Transcript();
  private readonly pending = new Map<number, PendingSegment>();
  /** Terminal phase of every segment that has left the join table */
  private readonly settled = new Map<number, "appended" | "dropped">();
  private settleWaiters: Array<() => void> = [];
  private disposed = false;

  private counters = {
    registered: 0,
    duplicates: 0,
    unknown: 0,
    timedOut: 0,
    forced: 0,
  };

  constructor(private readonly options: TranscriptAssemblerOptions) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  get utteranceCount(): number {
    return this.transcript.utteranceCount;
  }

  phaseOf(segmentId: number): SegmentPhase | undefined {
    return this.pending.get(segmentId)?.phase ?? this.settled.get(segmentId);
  }

  register(segment: SealedSegment): void {
    if (this.pending.has(segment.id) || this.settled.has(segment.id)) {
      log(`[Assembler:${this.options.sessionId}] Segment ${segment.id} registered twice`, "pipeline", "warn");
      return;
    }
    this.counters.registered++;

    if (segment.discardable) {
      this.settled.set(segment.id, "dropped");
      log(
        `[Assembler:${this.options.sessionId}] Dropped segment ${segment.id} (${segment.endMs - segment.startMs}ms)`,
        "pipeline",
        "debug"
      );
      return;
    }

    const timer = setTimeout(() => this.onTimeout(segment.id), this.options.segmentTimeoutMs);
    timer.unref();
    this.pending.set(segment.id, { segment, phase: "waiting_both", timer });
  }

  acceptDiarization(result: DiarizationResult): AcceptOutcome {
    const entry = this.lookup(result.segmentId, "diarization");
    if (typeof entry === "string") return entry;

    if (entry.diarization) {
      this.counters.duplicates++;
      return "duplicate";
    }
    entry.diarization = result;
    entry.phase = entry.transcription ? entry.phase : "has_diarization";
    return this.tryJoin(entry);
  }

  acceptTranscription(result: TranscriptionResult): AcceptOutcome {
    const entry = this.lookup(result.segmentId, "transcription");
    if (typeof entry === "string") return entry;

    if (entry.transcription) {
      this.counters.duplicates++;
      return "duplicate";
    }
    entry.transcription = result;
    entry.phase = entry.diarization ? entry.phase : "has_transcription";
    return this.tryJoin(entry);
  }

  insertGapMarker(atMs: number, afterSegmentId: number, reason: GapReason = "disconnect"): GapMarker {
    const marker: GapMarker = { kind: "gap", atMs, afterSegmentId, reason };
    this.transcript.insert(marker);
    log(
      `[Assembler:${this.options.sessionId}] Gap marker at ${atMs}ms after segment ${afterSegmentId}`,
      "pipeline"
    );
    return marker;
  }

  /**
   * Finalizes a pending segment now, substituting degraded placeholders for
   * whichever half is missing. Returns false if the segment is not pending.
   */
  forceFinalize(segmentId: number, reason: FinalizeReason): boolean {
    const entry = this.pending.get(segmentId);
    if (!entry) return false;

    const missing = [
      entry.diarization ? null : "diarization",
      entry.transcription ? null : "transcription",
    ].filter((half): half is string => half !== null);

    if (reason === "timeout") {
      this.counters.timedOut++;
    } else {
      this.counters.forced++;
    }
    log(
      `[Assembler:${this.options.sessionId}] Segment ${segmentId} finalized on ${reason}, missing ${missing.join(" and ")}`,
      "pipeline",
      "warn"
    );

    entry.diarization ??= degradedDiarization(segmentId);
    entry.transcription ??= degradedTranscription(segmentId);
    this.tryJoin(entry);
    return true;
  }

  forceFinalizeAll(reason: FinalizeReason): number {
    const ids = [...this.pending.keys()].sort((a, b) => a - b);
    for (const id of ids) {
      this.forceFinalize(id, reason);
    }
    return ids.length;
  }

  /** Resolves once no registered segment is waiting on a result */
  whenSettled(): Promise<void> {
    if (this.pending.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.settleWaiters.push(resolve));
  }

  snapshot(final = false): TranscriptSnapshot {
    return this.transcript.snapshot(this.options.sessionId, final);
  }

  utterances(): Utterance[] {
    return this.transcript.utterances();
  }

  stats(): AssemblerStats {
    let appended = 0;
    let dropped = 0;
    for (const phase of this.settled.values()) {
      if (phase === "appended") appended++;
      else dropped++;
    }
    return { ...this.counters, pending: this.pending.size, appended, dropped };
  }

  /** Clears timers. Pending segments stay pending. */
  dispose(): void {
    this.disposed = true;
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
    }
  }

  private lookup(segmentId: number, half: string): PendingSegment | AcceptOutcome {
    const entry = this.pending.get(segmentId);
    if (entry) return entry;

    const terminal = this.settled.get(segmentId);
    if (terminal === "dropped") return "dropped";
    if (terminal === "appended") {
      this.counters.duplicates++;
      return "duplicate";
    }

    this.counters.unknown++;
    log(
      `[Assembler:${this.options.sessionId}] Ignoring ${half} result for unknown segment ${segmentId}`,
      "pipeline",
      "warn"
    );
    return "unknown";
  }

  private tryJoin(entry: PendingSegment): AcceptOutcome {
    const { diarization, transcription, segment } = entry;
    if (!diarization || !transcription) return "stored";

    clearTimeout(entry.timer);
    const utterance = joinResults(segment, diarization, transcription);
    this.pending.delete(segment.id);
    this.transcript.insert(utterance);
    this.settled.set(segment.id, "appended");
    this.notifyIfSettled();
    return "appended";
  }

  private onTimeout(segmentId: number): void {
    if (this.disposed) return;
    this.forceFinalize(segmentId, "timeout");
  }

  private notifyIfSettled(): void {
    if (this.pending.size > 0) return;
    const waiters = this.settleWaiters;
    this.settleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
