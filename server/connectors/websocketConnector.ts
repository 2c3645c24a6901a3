/**
 * WebSocket meeting connector
 *
 * A meeting bot streams PCM16 audio into `/ws/audio?sessionId=...`. The first
 * socket starts the stream; a socket closing mid-stream is a disconnect and
 * the next socket for the same session is a reconnect.
 */

import {
  audioIngressMessageSchema,
  type AudioFrame,
  type MeetingMetadata,
} from "@shared/schema";
import { log } from "../logger";
import { FatalConnectorError } from "../pipeline/errors";
import { pcmDurationMs } from "../stt/wav";
import type { ConnectorListener, MeetingConnector } from "./types";

/** The part of a ws socket the connector writes to */
export interface StreamLink {
  send(text: string): void;
  close(code?: number, reason?: string): void;
}

/** Callbacks the socket wiring forwards into the connector */
export interface StreamHandle {
  receive(text: string): void;
  closed(): void;
}

interface ServerMessage {
  type: "ready" | "error";
  sessionId?: string;
  message?: string;
}

export class WebSocketMeetingConnector implements MeetingConnector {
  private listener: ConnectorListener | null = null;
  private link: StreamLink | null = null;
  private nextSequence = 0;
  private hasStreamed = false;
  private joined = false;
  private finished = false;
  private framesReceived = 0;

  constructor(
    readonly sessionId: string,
    readonly metadata: MeetingMetadata,
    private readonly sampleRate: number
  ) {}

  get isLinked(): boolean {
    return this.link !== null;
  }

  get frameCount(): number {
    return this.framesReceived;
  }

  attach(listener: ConnectorListener): void {
    this.listener = listener;
  }

  async join(): Promise<void> {
    this.joined = true;
    log(`[Connector:${this.sessionId}] Waiting for audio stream from ${this.metadata.meetingUrl}`, "connector");
  }

  async leave(): Promise<void> {
    this.finished = true;
    const link = this.link;
    this.link = null;
    link?.close(1000, "session stopped");
  }

  /**
   * Binds a newly connected socket. A second socket replaces the first;
   * one arriving after a disconnect resumes the stream.
   */
  openStream(link: StreamLink): StreamHandle {
    if (this.finished || !this.joined) {
      this.sendTo(link, { type: "error", message: "Session is not accepting audio" });
      link.close(4409, "session not accepting audio");
      return { receive: () => undefined, closed: () => undefined };
    }

    const previous = this.link;
    this.link = link;
    if (previous) {
      log(`[Connector:${this.sessionId}] Stream replaced by a new socket`, "connector", "warn");
      previous.close(4000, "superseded");
    } else if (this.hasStreamed) {
      log(`[Connector:${this.sessionId}] Stream resumed`, "connector");
      this.listener?.onReconnect();
    }
    this.hasStreamed = true;
    this.sendTo(link, { type: "ready", sessionId: this.sessionId });

    return {
      receive: (text) => {
        if (this.link === link) this.handleMessage(link, text);
      },
      closed: () => {
        if (this.link === link) this.handleClosed();
      },
    };
  }

  private handleMessage(link: StreamLink, text: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.sendTo(link, { type: "error", message: "Invalid message format" });
      return;
    }

    const parsed = audioIngressMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendTo(link, { type: "error", message: "Invalid message format" });
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case "audio": {
        const pcm = Buffer.from(message.data, "base64");
        if (pcm.length === 0 || pcm.length % 2 !== 0) {
          this.sendTo(link, { type: "error", message: "Audio must be base64 PCM16" });
          return;
        }
        const frame: AudioFrame = Object.freeze({
          sequence: this.nextSequence++,
          pcm,
          captureMs: message.captureMs,
          durationMs: pcmDurationMs(pcm.length, this.sampleRate),
        });
        this.framesReceived++;
        this.listener?.onFrame(frame);
        return;
      }
      case "end":
        this.finished = true;
        this.link = null;
        log(`[Connector:${this.sessionId}] Meeting ended by stream`, "connector");
        this.listener?.onEnd();
        link.close(1000, "meeting ended");
        return;
      case "fatal":
        this.finished = true;
        this.link = null;
        log(`[Connector:${this.sessionId}] Fatal from stream: ${message.reason}`, "connector", "error");
        this.listener?.onFatal(new FatalConnectorError(message.reason));
        link.close(1011, "fatal");
        return;
    }
  }

  private handleClosed(): void {
    this.link = null;
    if (this.finished) return;
    log(`[Connector:${this.sessionId}] Stream socket closed`, "connector", "warn");
    this.listener?.onDisconnect("socket closed");
  }

  private sendTo(link: StreamLink, message: ServerMessage): void {
    try {
      link.send(JSON.stringify(message));
    } catch (error) {
      log(
        `[Connector:${this.sessionId}] Send failed: ${error instanceof Error ? error.message : String(error)}`,
        "connector",
        "warn"
      );
    }
  }
}
