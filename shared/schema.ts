import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { z } from "zod";

// ============================================
// AUDIO & SEGMENTS
// ============================================

export interface AudioFrame {
  readonly sequence: number;
  /** PCM16 little-endian, mono, at the session sample rate */
  readonly pcm: Buffer;
  readonly captureMs: number;
  readonly durationMs: number;
}

export type SegmentState = "open" | "sealed";

export interface Segment {
  readonly id: number;
  readonly sessionId: string;
  readonly startMs: number;
  readonly endMs: number;
  readonly frames: ReadonlyArray<AudioFrame>;
  readonly state: SegmentState;
  /** Sealed below the minimum duration; skipped by the assembler */
  readonly discardable: boolean;
}

export type SealedSegment = Segment & { readonly state: "sealed" };

export type FrameDropReason = "overflow";

export interface FrameDroppedEvent {
  sequence: number;
  reason: FrameDropReason;
  droppedAt: number;
}

// ============================================
// INFERENCE RESULTS
// ============================================

export const UNKNOWN_SPEAKER = "unknown";

export const wordTimingSchema = z.object({
  word: z.string(),
  startMs: z.number(),
  endMs: z.number(),
  confidence: z.number().min(0).max(1).optional(),
});

export type WordTiming = z.infer<typeof wordTimingSchema>;

export interface DiarizationResult {
  segmentId: number;
  speakerLabel: string;
  confidence: number;
  degraded: boolean;
}

export interface TranscriptionResult {
  segmentId: number;
  text: string;
  confidence: number;
  words?: WordTiming[];
  language?: string;
  degraded: boolean;
}

// ============================================
// TRANSCRIPT
// ============================================

export interface Utterance {
  readonly kind: "utterance";
  readonly segmentId: number;
  readonly startMs: number;
  readonly endMs: number;
  readonly speakerLabel: string;
  readonly speakerConfidence: number;
  readonly text: string;
  /** Transcription confidence */
  readonly confidence: number;
  readonly words?: ReadonlyArray<WordTiming>;
  /** Either half came from a degraded or placeholder result */
  readonly degraded: boolean;
}

export type GapReason = "disconnect";

export interface GapMarker {
  readonly kind: "gap";
  readonly atMs: number;
  /** Highest segment id sealed before the discontinuity (0 if none) */
  readonly afterSegmentId: number;
  readonly reason: GapReason;
}

export type TranscriptEntry = Utterance | GapMarker;

export interface TranscriptSnapshot {
  sessionId: string;
  takenAt: string;
  final: boolean;
  entries: ReadonlyArray<TranscriptEntry>;
  utteranceCount: number;
  gapCount: number;
}

// ============================================
// SUMMARIES
// ============================================

export const actionItemSchema = z.object({
  task: z.string(),
  owner: z.string().optional(),
  dueDate: z.string().optional(),
  priority: z.enum(["high", "medium", "low"]).default("medium"),
});

export const meetingSummarySchema = z.object({
  summary: z.string().default(""),
  notes: z.array(z.string()).default([]),
  actionItems: z.array(actionItemSchema).default([]),
  decisions: z.array(z.string()).default([]),
});

export type ActionItem = z.infer<typeof actionItemSchema>;
export type MeetingSummary = z.infer<typeof meetingSummarySchema>;

// ============================================
// ARCHIVE TABLES
// ============================================

export const transcriptSnapshots = sqliteTable("transcript_snapshots", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sessionId: text("session_id").notNull(),
  takenAt: text("taken_at").notNull(),
  final: integer("final", { mode: "boolean" }).notNull().default(false),
  utteranceCount: integer("utterance_count").notNull(),
  gapCount: integer("gap_count").notNull(),
  entries: text("entries", { mode: "json" }).$type<TranscriptEntry[]>().notNull(),
});

export type TranscriptSnapshotRow = typeof transcriptSnapshots.$inferSelect;

export const meetingSummaries = sqliteTable("meeting_summaries", {
  sessionId: text("session_id").primaryKey(),
  summary: text("summary").notNull(),
  notes: text("notes", { mode: "json" }).$type<string[]>().notNull(),
  actionItems: text("action_items", { mode: "json" }).$type<ActionItem[]>().notNull(),
  decisions: text("decisions", { mode: "json" }).$type<string[]>().notNull(),
  createdAt: text("created_at").notNull(),
});

export type MeetingSummaryRow = typeof meetingSummaries.$inferSelect;

// ============================================
// PIPELINE CONFIGURATION
// ============================================

export const pipelineConfigSchema = z.object({
  sampleRate: z.number().int().positive().default(16000),
  frameBufferCapacity: z.number().int().positive().default(500),
  vadEnergyThreshold: z.number().positive().default(0.01),
  vadSmoothingFrames: z.number().int().positive().default(3),
  silenceGapMs: z.number().int().positive().default(700),
  maxSegmentMs: z.number().int().positive().default(15000),
  minSegmentMs: z.number().int().nonnegative().default(250),
  diarizationParallelism: z.number().int().positive().default(2),
  transcriptionParallelism: z.number().int().positive().default(4),
  retryMaxAttempts: z.number().int().positive().default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(500),
  retryMaxDelayMs: z.number().int().nonnegative().default(8000),
  retryJitterFactor: z.number().min(0).max(1).default(0.3),
  breakerFailureThreshold: z.number().int().positive().default(5),
  breakerOpenDurationMs: z.number().int().positive().default(30000),
  segmentTimeoutMs: z.number().int().positive().default(60000),
  reconnectGraceMs: z.number().int().positive().default(30000),
  drainTimeoutMs: z.number().int().positive().default(30000),
  cancelGraceMs: z.number().int().nonnegative().default(2000),
  checkpointIntervalMs: z.number().int().nonnegative().default(60000),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

// ============================================
// SESSIONS
// ============================================

export type PipelineState =
  | "idle"
  | "joining"
  | "streaming"
  | "reconnecting"
  | "draining"
  | "closed";

export const meetingPlatformSchema = z.enum(["google_meet", "zoom", "teams", "other"]);
export type MeetingPlatform = z.infer<typeof meetingPlatformSchema>;

export interface MeetingMetadata {
  meetingUrl: string;
  platform: MeetingPlatform;
  title?: string;
}

export const createSessionRequestSchema = z.object({
  meetingUrl: z.string().url(),
  platform: meetingPlatformSchema.default("other"),
  title: z.string().min(1).max(200).optional(),
});

export type CreateSessionRequest = z.infer<typeof createSessionRequestSchema>;

export const joinGoogleMeetRequestSchema = z.object({
  meeting_url: z.string().url(),
});

export type JoinGoogleMeetRequest = z.infer<typeof joinGoogleMeetRequestSchema>;

// ============================================
// AUDIO INGRESS (WebSocket)
// ============================================

export const audioIngressMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("audio"),
    captureMs: z.number().nonnegative(),
    /** base64 PCM16LE mono */
    data: z.string().min(1),
  }),
  z.object({ type: z.literal("end") }),
  z.object({ type: z.literal("fatal"), reason: z.string().default("connector failure") }),
]);

export type AudioIngressMessage = z.infer<typeof audioIngressMessageSchema>;
