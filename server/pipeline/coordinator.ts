/**
 * Pipeline Coordinator
 *
 * Owns one meeting session end to end:
 *
 *   idle -> joining -> streaming <-> reconnecting -> draining -> closed
 *
 * Connector frames go into the FrameBuffer; a single consumer drains it into
 * the Segmenter. Every sealed segment is registered with the assembler and
 * handed to both inference workers. On close the final transcript goes to
 * the archive and the summarizer.
 */

import type {
  AudioFrame,
  MeetingMetadata,
  MeetingSummary,
  PipelineConfig,
  PipelineState,
  SealedSegment,
  TranscriptSnapshot,
} from "@shared/schema";
import type { ArchiveStore } from "../archive";
import type { ConnectorListener, MeetingConnector } from "../connectors/types";
import { log } from "../logger";
import type { MeetingSummarizer } from "../meetingSummarizer";
import type { SpeakerRecognitionEngine, SpeechToTextEngine } from "../stt/engines";
import { VoiceActivityDetector } from "../stt/vad";
import { DiarizationWorker } from "./diarizationWorker";
import { EmptySessionError, FatalConnectorError, errorMessage } from "./errors";
import { FrameBuffer, type FrameBufferStats } from "./frameBuffer";
import type { InferenceWorkerStats, RetryPolicy } from "./inferenceWorker";
import { Segmenter, type SegmenterStats } from "./segmenter";
import { TranscriptAssembler, type AssemblerStats } from "./transcriptAssembler";
import { TranscriptionWorker } from "./transcriptionWorker";

export interface PipelineDependencies {
  connector: MeetingConnector;
  speechToText: SpeechToTextEngine;
  speakerRecognition: SpeakerRecognitionEngine;
  archive?: ArchiveStore;
  summarizer?: MeetingSummarizer;
  /** Jitter source for retry backoff */
  random?: () => number;
}

export type SessionResult =
  | {
      status: "completed";
      sessionId: string;
      transcript: TranscriptSnapshot;
      summary: MeetingSummary | null;
    }
  | {
      status: "failed";
      sessionId: string;
      transcript: TranscriptSnapshot;
      summary: MeetingSummary | null;
      failure: FatalConnectorError;
    }
  | {
      status: "empty";
      sessionId: string;
      failure: EmptySessionError;
    };

export interface PipelineStatus {
  sessionId: string;
  state: PipelineState;
  metadata: MeetingMetadata;
  startedAt: string | null;
  closedAt: string | null;
  reconnects: number;
  framesRejected: number;
  utterances: number;
  pendingSegments: number;
  buffer: FrameBufferStats;
  segmenter: SegmenterStats;
  assembler: AssemblerStats;
  diarization: InferenceWorkerStats;
  transcription: InferenceWorkerStats;
  failure: string | null;
}

type Outcome = "settled" | "timeout";

export class PipelineCoordinator {
  private currentState: PipelineState = "idle";
  private readonly buffer: FrameBuffer;
  private readonly segmenter: Segmenter;
  private readonly assembler: TranscriptAssembler;
  private readonly diarizer: DiarizationWorker;
  private readonly transcriber: TranscriptionWorker;

  private drainHandle: ReturnType<typeof setImmediate> | null = null;
  private graceTimer: ReturnType<typeof setTimeout> | null = null;
  private checkpointTimer: ReturnType<typeof setInterval> | null = null;

  private readonly closed: Promise<SessionResult>;
  private resolveClosed: (result: SessionResult) => void = () => undefined;

  private startedAt: Date | null = null;
  private closedAt: Date | null = null;
  private reconnects = 0;
  private framesRejected = 0;
  private failure: Error | null = null;

  constructor(
    readonly sessionId: string,
    private readonly config: PipelineConfig,
    private readonly deps: PipelineDependencies
  ) {
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });

    this.buffer = new FrameBuffer(config.frameBufferCapacity, (event) => {
      log(`[Pipeline:${sessionId}] Frame ${event.sequence} dropped (${event.reason})`, "pipeline", "warn");
    });

    this.segmenter = new Segmenter({
      sessionId,
      silenceGapMs: config.silenceGapMs,
      maxSegmentMs: config.maxSegmentMs,
      minSegmentMs: config.minSegmentMs,
      vad: new VoiceActivityDetector({
        energyThreshold: config.vadEnergyThreshold,
        smoothingFrames: config.vadSmoothingFrames,
      }),
    });

    this.assembler = new TranscriptAssembler({
      sessionId,
      segmentTimeoutMs: config.segmentTimeoutMs,
    });

    const retry: RetryPolicy = {
      maxAttempts: config.retryMaxAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
      jitterFactor: config.retryJitterFactor,
      random: deps.random,
    };
    const breaker = {
      failureThreshold: config.breakerFailureThreshold,
      openDurationMs: config.breakerOpenDurationMs,
    };

    this.diarizer = new DiarizationWorker(deps.speakerRecognition, {
      sessionId,
      parallelism: config.diarizationParallelism,
      sampleRate: config.sampleRate,
      retry,
      breaker,
      onResult: (result) => {
        this.assembler.acceptDiarization(result);
      },
    });

    this.transcriber = new TranscriptionWorker(deps.speechToText, {
      sessionId,
      parallelism: config.transcriptionParallelism,
      sampleRate: config.sampleRate,
      retry,
      breaker,
      onResult: (result) => {
        this.assembler.acceptTranscription(result);
      },
    });
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get metadata(): MeetingMetadata {
    return this.deps.connector.metadata;
  }

  async start(): Promise<void> {
    if (this.currentState !== "idle") {
      throw new Error(`Pipeline ${this.sessionId} already started (${this.currentState})`);
    }
    this.currentState = "joining";
    this.startedAt = new Date();
    this.deps.connector.attach(this.listener());

    try {
      await this.deps.connector.join();
    } catch (error) {
      this.fail(new FatalConnectorError(`Failed to join meeting: ${errorMessage(error)}`, { cause: error }));
      return;
    }

    // A fatal or end event may have arrived while joining
    if (this.currentState !== "joining") return;

    this.currentState = "streaming";
    this.startCheckpoints();
    log(`[Pipeline:${this.sessionId}] Streaming from ${this.metadata.meetingUrl}`, "pipeline");
  }

  /** Stop accepting audio, drain and close. Resolves with the session result. */
  stop(reason = "stopped"): Promise<SessionResult> {
    this.beginDrain(reason);
    return this.closed;
  }

  whenClosed(): Promise<SessionResult> {
    return this.closed;
  }

  snapshot(): TranscriptSnapshot {
    return this.assembler.snapshot(this.currentState === "closed");
  }

  status(): PipelineStatus {
    return {
      sessionId: this.sessionId,
      state: this.currentState,
      metadata: this.metadata,
      startedAt: this.startedAt?.toISOString() ?? null,
      closedAt: this.closedAt?.toISOString() ?? null,
      reconnects: this.reconnects,
      framesRejected: this.framesRejected,
      utterances: this.assembler.utteranceCount,
      pendingSegments: this.assembler.pendingCount,
      buffer: this.buffer.stats(),
      segmenter: this.segmenter.stats(),
      assembler: this.assembler.stats(),
      diarization: this.diarizer.stats(),
      transcription: this.transcriber.stats(),
      failure: this.failure?.message ?? null,
    };
  }

  private listener(): ConnectorListener {
    return {
      onFrame: (frame) => this.onFrame(frame),
      onDisconnect: (reason) => this.onDisconnect(reason),
      onReconnect: () => this.onReconnect(),
      onEnd: () => this.beginDrain("meeting ended"),
      onFatal: (error) => this.fail(error),
    };
  }

  private onFrame(frame: AudioFrame): void {
    if (this.currentState !== "streaming") {
      this.framesRejected++;
      log(
        `[Pipeline:${this.sessionId}] Frame ${frame.sequence} rejected while ${this.currentState}`,
        "pipeline",
        "debug"
      );
      return;
    }
    this.buffer.push(frame);
    this.scheduleDrain();
  }

  private onDisconnect(reason: string): void {
    if (this.currentState !== "streaming") return;

    this.processBuffered();
    const flushed = this.segmenter.flush();
    if (flushed) this.dispatch(flushed);

    this.assembler.insertGapMarker(this.segmenter.lastSegmentEndMs, this.segmenter.lastSegmentId);
    this.currentState = "reconnecting";
    log(
      `[Pipeline:${this.sessionId}] Disconnected (${reason}); waiting ${this.config.reconnectGraceMs}ms for reconnect`,
      "pipeline",
      "warn"
    );

    this.graceTimer = setTimeout(() => {
      this.graceTimer = null;
      log(`[Pipeline:${this.sessionId}] No reconnect within grace period`, "pipeline", "warn");
      this.beginDrain("reconnect grace expired");
    }, this.config.reconnectGraceMs);
  }

  private onReconnect(): void {
    if (this.currentState !== "reconnecting") return;
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    this.reconnects++;
    this.currentState = "streaming";
    log(`[Pipeline:${this.sessionId}] Reconnected (${this.reconnects})`, "pipeline");
  }

  private fail(error: FatalConnectorError): void {
    if (this.currentState === "draining" || this.currentState === "closed") return;
    log(`[Pipeline:${this.sessionId}] Fatal connector error: ${error.message}`, "pipeline", "error");
    this.beginDrain("fatal connector error", error);
  }

  private scheduleDrain(): void {
    if (this.drainHandle) return;
    this.drainHandle = setImmediate(() => {
      this.drainHandle = null;
      this.processBuffered();
    });
  }

  /** Single consumer of the frame buffer */
  private processBuffered(): void {
    if (this.drainHandle) {
      clearImmediate(this.drainHandle);
      this.drainHandle = null;
    }
    let frame = this.buffer.pop();
    while (frame) {
      for (const segment of this.segmenter.push(frame)) {
        this.dispatch(segment);
      }
      frame = this.buffer.pop();
    }
  }

  private dispatch(segment: SealedSegment): void {
    this.assembler.register(segment);
    if (segment.discardable) return;
    this.diarizer.enqueue(segment);
    this.transcriber.enqueue(segment);
  }

  private beginDrain(reason: string, failure?: FatalConnectorError): void {
    if (this.currentState === "draining" || this.currentState === "closed") return;
    this.currentState = "draining";
    this.clearTimers();
    if (failure) this.failure = failure;

    log(`[Pipeline:${this.sessionId}] Draining (${reason})`, "pipeline");

    void this.drain(failure)
      .catch((error: unknown): SessionResult => {
        log(`[Pipeline:${this.sessionId}] Drain failed: ${errorMessage(error)}`, "pipeline", "error");
        this.assembler.forceFinalizeAll("drain");
        this.markClosed();
        return failure
          ? { status: "failed", sessionId: this.sessionId, transcript: this.assembler.snapshot(true), summary: null, failure }
          : { status: "completed", sessionId: this.sessionId, transcript: this.assembler.snapshot(true), summary: null };
      })
      .then((result) => this.resolveClosed(result));
  }

  private async drain(failure?: FatalConnectorError): Promise<SessionResult> {
    await this.leaveMeeting();

    this.processBuffered();
    const last = this.segmenter.close();
    if (last) this.dispatch(last);

    if (failure && this.segmenter.stats().sealed === 0) {
      const empty = new EmptySessionError(this.sessionId, { cause: failure });
      this.failure = empty;
      this.assembler.dispose();
      this.markClosed();
      log(`[Pipeline:${this.sessionId}] ${empty.message}`, "pipeline", "error");
      return { status: "empty", sessionId: this.sessionId, failure: empty };
    }

    await this.settleOrCancel();
    this.assembler.dispose();
    this.markClosed();

    const transcript = this.assembler.snapshot(true);
    const summary = await this.handOff(transcript);

    log(
      `[Pipeline:${this.sessionId}] Closed with ${transcript.utteranceCount} utterances, ${transcript.gapCount} gaps`,
      "pipeline"
    );

    return failure
      ? { status: "failed", sessionId: this.sessionId, transcript, summary, failure }
      : { status: "completed", sessionId: this.sessionId, transcript, summary };
  }

  /**
   * Waits up to drainTimeoutMs for every segment to settle. Past that, waits
   * cancelGraceMs more, then cancels in-flight calls and force-finalizes.
   */
  private async settleOrCancel(): Promise<void> {
    if ((await this.waitForSettle(this.config.drainTimeoutMs)) === "settled") return;

    log(
      `[Pipeline:${this.sessionId}] ${this.assembler.pendingCount} segment(s) still pending after ${this.config.drainTimeoutMs}ms`,
      "pipeline",
      "warn"
    );
    if ((await this.waitForSettle(this.config.cancelGraceMs)) === "settled") return;

    this.diarizer.cancel();
    this.transcriber.cancel();
    await Promise.all([this.diarizer.whenIdle(), this.transcriber.whenIdle()]);

    const forced = this.assembler.forceFinalizeAll("drain");
    if (forced > 0) {
      log(`[Pipeline:${this.sessionId}] Force-finalized ${forced} segment(s)`, "pipeline", "warn");
    }
  }

  private waitForSettle(timeoutMs: number): Promise<Outcome> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<Outcome>((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    const settled = this.assembler.whenSettled().then((): Outcome => "settled");
    return Promise.race([settled, timeout]).finally(() => clearTimeout(timer));
  }

  private async leaveMeeting(): Promise<void> {
    try {
      await this.deps.connector.leave();
    } catch (error) {
      log(`[Pipeline:${this.sessionId}] Leaving meeting failed: ${errorMessage(error)}`, "pipeline", "warn");
    }
  }

  private async handOff(transcript: TranscriptSnapshot): Promise<MeetingSummary | null> {
    const { archive, summarizer } = this.deps;

    if (archive) {
      try {
        await archive.writeSnapshot(transcript);
      } catch (error) {
        log(`[Pipeline:${this.sessionId}] Archiving transcript failed: ${errorMessage(error)}`, "pipeline", "error");
      }
    }

    if (!summarizer) return null;

    let summary: MeetingSummary;
    try {
      summary = await summarizer.summarize(transcript);
    } catch (error) {
      log(`[Pipeline:${this.sessionId}] Summarization failed: ${errorMessage(error)}`, "pipeline", "error");
      return null;
    }

    if (archive) {
      try {
        await archive.writeSummary(this.sessionId, summary);
      } catch (error) {
        log(`[Pipeline:${this.sessionId}] Archiving summary failed: ${errorMessage(error)}`, "pipeline", "error");
      }
    }
    return summary;
  }

  private startCheckpoints(): void {
    const { archive } = this.deps;
    if (!archive || this.config.checkpointIntervalMs === 0) return;

    this.checkpointTimer = setInterval(() => {
      archive.writeSnapshot(this.assembler.snapshot(false)).catch((error: unknown) => {
        log(`[Pipeline:${this.sessionId}] Checkpoint failed: ${errorMessage(error)}`, "pipeline", "warn");
      });
    }, this.config.checkpointIntervalMs);
    this.checkpointTimer.unref();
  }

  private clearTimers(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    if (this.checkpointTimer) {
      clearInterval(this.checkpointTimer);
      this.checkpointTimer = null;
    }
  }

  private markClosed(): void {
    this.currentState = "closed";
    this.closedAt = new Date();
    this.diarizer.dispose();
    this.transcriber.dispose();
  }
}
