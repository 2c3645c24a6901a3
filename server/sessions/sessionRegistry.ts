/**
 * Session Registry
 *
 * One pipeline per meeting session. Engines are shared across sessions;
 * transcript state, buffers and circuit breakers are not. A closed session
 * stays in memory for `closedRetentionMs`, after which its transcript and
 * summary are served from the archive.
 */

import { v4 as uuidv4 } from "uuid";
import type { MeetingMetadata, PipelineConfig } from "@shared/schema";
import type { ArchiveStore } from "../archive";
import { WebSocketMeetingConnector } from "../connectors/websocketConnector";
import { log } from "../logger";
import type { MeetingSummarizer } from "../meetingSummarizer";
import {
  PipelineCoordinator,
  type PipelineStatus,
  type SessionResult,
} from "../pipeline/coordinator";
import type { SpeakerRecognitionEngine, SpeechToTextEngine } from "../stt/engines";

export interface SessionRegistryOptions {
  config: PipelineConfig;
  speechToText: SpeechToTextEngine;
  speakerRecognition: SpeakerRecognitionEngine;
  archive?: ArchiveStore;
  summarizer?: MeetingSummarizer;
  generateId?: () => string;
  /** How long a closed session stays in memory; 0 evicts it on close */
  closedRetentionMs?: number;
}

const DEFAULT_CLOSED_RETENTION_MS = 5 * 60 * 1000;

export interface MeetingSession {
  id: string;
  createdAt: Date;
  connector: WebSocketMeetingConnector;
  pipeline: PipelineCoordinator;
  result: SessionResult | null;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, MeetingSession>();
  private readonly evictionTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly generateId: () => string;
  private readonly closedRetentionMs: number;

  constructor(private readonly options: SessionRegistryOptions) {
    this.generateId = options.generateId ?? uuidv4;
    this.closedRetentionMs = options.closedRetentionMs ?? DEFAULT_CLOSED_RETENTION_MS;
  }

  get size(): number {
    return this.sessions.size;
  }

  get activeCount(): number {
    let active = 0;
    for (const session of this.sessions.values()) {
      if (session.pipeline.state !== "closed") active++;
    }
    return active;
  }

  async create(metadata: MeetingMetadata): Promise<MeetingSession> {
    const id = this.generateId();
    const { config, speechToText, speakerRecognition, archive, summarizer } = this.options;

    const connector = new WebSocketMeetingConnector(id, metadata, config.sampleRate);
    const pipeline = new PipelineCoordinator(id, config, {
      connector,
      speechToText,
      speakerRecognition,
      archive,
      summarizer,
    });

    const session: MeetingSession = {
      id,
      createdAt: new Date(),
      connector,
      pipeline,
      result: null,
    };
    this.sessions.set(id, session);

    void pipeline.whenClosed().then((result) => {
      session.result = result;
      log(`Session ${id} finished: ${result.status}`, "sessions");
      this.scheduleEviction(id);
    });

    await pipeline.start();
    log(`Session ${id} started for ${metadata.platform} meeting ${metadata.meetingUrl}`, "sessions");
    return session;
  }

  get(id: string): MeetingSession | undefined {
    return this.sessions.get(id);
  }

  list(): PipelineStatus[] {
    return [...this.sessions.values()].map((session) => session.pipeline.status());
  }

  async stop(id: string): Promise<SessionResult | null> {
    const session = this.sessions.get(id);
    if (!session) return null;
    return session.pipeline.stop("stopped by request");
  }

  async stopAll(): Promise<void> {
    await Promise.all(
      [...this.sessions.values()].map((session) => session.pipeline.stop("service shutdown"))
    );
    for (const timer of this.evictionTimers.values()) {
      clearTimeout(timer);
    }
    this.evictionTimers.clear();
  }

  private scheduleEviction(id: string): void {
    if (this.closedRetentionMs === 0) {
      this.evict(id);
      return;
    }
    const timer = setTimeout(() => this.evict(id), this.closedRetentionMs);
    timer.unref();
    this.evictionTimers.set(id, timer);
  }

  private evict(id: string): void {
    this.evictionTimers.delete(id);
    if (this.sessions.delete(id)) {
      log(`Session ${id} released from memory`, "sessions", "debug");
    }
  }
}
