/**
 * Segmenter
 *
 * Slices the frame stream into utterance-candidate segments. At most one
 * segment is open at a time. A segment seals when the silence run reaches
 * `silenceGapMs` or its voiced span reaches `maxSegmentMs`; segments shorter
 * than `minSegmentMs` are sealed but flagged discardable.
 *
 * Silence before the first voiced frame is skipped. Silence inside a segment
 * is kept only if speech resumes before the gap threshold.
 */

import type { AudioFrame, SealedSegment } from "@shared/schema";
import { VoiceActivityDetector } from "../stt/vad";
import { log } from "../logger";

export interface SegmenterConfig {
  sessionId: string;
  silenceGapMs: number;
  maxSegmentMs: number;
  minSegmentMs: number;
  vad?: VoiceActivityDetector;
}

export type SealReason = "silence" | "max_duration" | "flush" | "stream_end";

interface OpenSegment {
  id: number;
  startMs: number;
  voicedEndMs: number;
  lastFrameEndMs: number;
  frames: AudioFrame[];
  pendingSilence: AudioFrame[];
  silenceMs: number;
}

export interface SegmenterStats {
  framesSeen: number;
  framesSkipped: number;
  sealed: number;
  discardable: number;
  sealReasons: Record<SealReason, number>;
}

export class Segmenter {
  private readonly vad: VoiceActivityDetector;
  private open: OpenSegment | null = null;
  private nextId = 1;
  private lastSealedEndMs = Number.NEGATIVE_INFINITY;
  private lastSealedId = 0;
  private latestFrameEndMs = 0;
  private closed = false;

  private counters: SegmenterStats = {
    framesSeen: 0,
    framesSkipped: 0,
    sealed: 0,
    discardable: 0,
    sealReasons: { silence: 0, max_duration: 0, flush: 0, stream_end: 0 },
  };

  constructor(private readonly config: SegmenterConfig) {
    this.vad = config.vad ?? new VoiceActivityDetector();
  }

  get hasOpenSegment(): boolean {
    return this.open !== null;
  }

  /** Highest segment id sealed so far (0 before the first seal) */
  get lastSegmentId(): number {
    return this.lastSealedId;
  }

  /** End of the last sealed segment (0 before the first seal) */
  get lastSegmentEndMs(): number {
    return Math.max(0, this.lastSealedEndMs);
  }

  /** End of the latest audio seen, sealed or not */
  get streamPositionMs(): number {
    return this.latestFrameEndMs;
  }

  /**
   * Feed one frame. Returns the segments sealed by it (possibly none).
   */
  push(frame: AudioFrame): SealedSegment[] {
    if (this.closed) {
      log(`[Segmenter:${this.config.sessionId}] Frame ${frame.sequence} after close ignored`, "pipeline", "warn");
      return [];
    }

    this.counters.framesSeen++;
    const { isSpeech } = this.vad.classify(frame.pcm);
    const frameEndMs = frame.captureMs + frame.durationMs;
    this.latestFrameEndMs = Math.max(this.latestFrameEndMs, frameEndMs);
    const sealed: SealedSegment[] = [];

    const current = this.open;
    if (!current) {
      if (isSpeech) {
        this.open = this.openWith(frame);
        this.checkMaxDuration(sealed);
      } else {
        this.counters.framesSkipped++;
      }
      return sealed;
    }

    const hole = Math.max(0, frame.captureMs - current.lastFrameEndMs);
    current.lastFrameEndMs = Math.max(current.lastFrameEndMs, frameEndMs);

    if (isSpeech) {
      if (current.silenceMs + hole >= this.config.silenceGapMs) {
        sealed.push(this.seal("silence"));
        this.open = this.openWith(frame);
      } else {
        current.frames.push(...current.pendingSilence, frame);
        current.pendingSilence = [];
        current.silenceMs = 0;
        current.voicedEndMs = Math.max(current.voicedEndMs, frameEndMs);
      }
      this.checkMaxDuration(sealed);
      return sealed;
    }

    current.pendingSilence.push(frame);
    current.silenceMs += hole + frame.durationMs;
    if (current.silenceMs >= this.config.silenceGapMs) {
      sealed.push(this.seal("silence"));
    }
    return sealed;
  }

  /**
   * Seal the open segment at a stream discontinuity without ending the stream.
   */
  flush(): SealedSegment | null {
    return this.open ? this.seal("flush") : null;
  }

  /**
   * Stream closed: seal whatever is open, however short. Further frames are ignored.
   */
  close(): SealedSegment | null {
    const last = this.open ? this.seal("stream_end") : null;
    this.closed = true;
    return last;
  }

  stats(): SegmenterStats {
    return {
      ...this.counters,
      sealReasons: { ...this.counters.sealReasons },
    };
  }

  private openWith(frame: AudioFrame): OpenSegment {
    const frameEndMs = frame.captureMs + frame.durationMs;
    const startMs = Math.max(frame.captureMs, this.lastSealedEndMs);
    return {
      id: this.nextId++,
      startMs,
      voicedEndMs: Math.max(frameEndMs, startMs),
      lastFrameEndMs: frameEndMs,
      frames: [frame],
      pendingSilence: [],
      silenceMs: 0,
    };
  }

  private checkMaxDuration(sealed: SealedSegment[]): void {
    const current = this.open;
    if (current && current.voicedEndMs - current.startMs >= this.config.maxSegmentMs) {
      sealed.push(this.seal("max_duration"));
    }
  }

  private seal(reason: SealReason): SealedSegment {
    const current = this.open;
    if (!current) {
      throw new Error("No open segment to seal");
    }
    this.open = null;

    const frames = [...current.frames].sort(
      (a, b) => a.captureMs - b.captureMs || a.sequence - b.sequence
    );
    const durationMs = current.voicedEndMs - current.startMs;
    const discardable = durationMs < this.config.minSegmentMs;

    const segment: SealedSegment = Object.freeze({
      id: current.id,
      sessionId: this.config.sessionId,
      startMs: current.startMs,
      endMs: current.voicedEndMs,
      frames: Object.freeze(frames),
      state: "sealed" as const,
      discardable,
    });

    this.lastSealedEndMs = Math.max(this.lastSealedEndMs, current.voicedEndMs);
    this.lastSealedId = current.id;
    this.counters.sealed++;
    this.counters.sealReasons[reason]++;
    if (discardable) {
      this.counters.discardable++;
    }

    log(
      `[Segmenter:${this.config.sessionId}] Sealed segment ${segment.id} (${reason}, ${durationMs}ms${discardable ? ", discardable" : ""})`,
      "pipeline",
      "debug"
    );

    return segment;
  }
}
