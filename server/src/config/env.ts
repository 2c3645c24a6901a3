/**
 * Centralized Environment Configuration
 *
 * Fail-fast Zod validation for the service environment. `getEnv()` is called
 * once from the entry point, so a bad variable stops startup.
 */

import { z } from "zod";
import { pipelineConfigSchema, type PipelineConfig } from "@shared/schema";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const optionalNumber = z.coerce.number().optional();

const EnvSchema = z.object({
  APP_NAME: z.string().min(1).default("MeetScribe"),
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  LOG_LEVEL: LogLevelSchema.default("info"),

  OPENAI_API_KEY: z.string().optional(),
  WHISPER_MODEL: z.string().default("whisper-1"),
  WHISPER_LANGUAGE: z.string().optional(),
  SUMMARY_MODEL: z.string().default("gpt-4o-mini"),

  SPEAKER_RECOGNITION_URL: z.string().url().optional(),
  SPEAKER_RECOGNITION_TOKEN: z.string().optional(),

  ARCHIVE_DB_PATH: z.string().min(1).default("meetscribe.db"),

  PIPELINE_SAMPLE_RATE: optionalNumber,
  PIPELINE_FRAME_BUFFER_CAPACITY: optionalNumber,
  PIPELINE_VAD_ENERGY_THRESHOLD: optionalNumber,
  PIPELINE_VAD_SMOOTHING_FRAMES: optionalNumber,
  PIPELINE_SILENCE_GAP_MS: optionalNumber,
  PIPELINE_MAX_SEGMENT_MS: optionalNumber,
  PIPELINE_MIN_SEGMENT_MS: optionalNumber,
  PIPELINE_DIARIZATION_PARALLELISM: optionalNumber,
  PIPELINE_TRANSCRIPTION_PARALLELISM: optionalNumber,
  PIPELINE_RETRY_MAX_ATTEMPTS: optionalNumber,
  PIPELINE_RETRY_BASE_DELAY_MS: optionalNumber,
  PIPELINE_RETRY_MAX_DELAY_MS: optionalNumber,
  PIPELINE_RETRY_JITTER_FACTOR: optionalNumber,
  PIPELINE_BREAKER_FAILURE_THRESHOLD: optionalNumber,
  PIPELINE_BREAKER_OPEN_DURATION_MS: optionalNumber,
  PIPELINE_SEGMENT_TIMEOUT_MS: optionalNumber,
  PIPELINE_RECONNECT_GRACE_MS: optionalNumber,
  PIPELINE_DRAIN_TIMEOUT_MS: optionalNumber,
  PIPELINE_CANCEL_GRACE_MS: optionalNumber,
  PIPELINE_CHECKPOINT_INTERVAL_MS: optionalNumber,

  SESSION_RETENTION_MS: z.coerce.number().int().nonnegative().default(300000),
});

type RawEnv = z.infer<typeof EnvSchema>;
type PipelineVariable = Extract<keyof RawEnv, `PIPELINE_${string}`>;

export type Env = RawEnv & { pipeline: PipelineConfig };
export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Pipeline tunable -> the variable that overrides it */
const PIPELINE_VARIABLES: Record<keyof PipelineConfig, PipelineVariable> = {
  sampleRate: "PIPELINE_SAMPLE_RATE",
  frameBufferCapacity: "PIPELINE_FRAME_BUFFER_CAPACITY",
  vadEnergyThreshold: "PIPELINE_VAD_ENERGY_THRESHOLD",
  vadSmoothingFrames: "PIPELINE_VAD_SMOOTHING_FRAMES",
  silenceGapMs: "PIPELINE_SILENCE_GAP_MS",
  maxSegmentMs: "PIPELINE_MAX_SEGMENT_MS",
  minSegmentMs: "PIPELINE_MIN_SEGMENT_MS",
  diarizationParallelism: "PIPELINE_DIARIZATION_PARALLELISM",
  transcriptionParallelism: "PIPELINE_TRANSCRIPTION_PARALLELISM",
  retryMaxAttempts: "PIPELINE_RETRY_MAX_ATTEMPTS",
  retryBaseDelayMs: "PIPELINE_RETRY_BASE_DELAY_MS",
  retryMaxDelayMs: "PIPELINE_RETRY_MAX_DELAY_MS",
  retryJitterFactor: "PIPELINE_RETRY_JITTER_FACTOR",
  breakerFailureThreshold: "PIPELINE_BREAKER_FAILURE_THRESHOLD",
  breakerOpenDurationMs: "PIPELINE_BREAKER_OPEN_DURATION_MS",
  segmentTimeoutMs: "PIPELINE_SEGMENT_TIMEOUT_MS",
  reconnectGraceMs: "PIPELINE_RECONNECT_GRACE_MS",
  drainTimeoutMs: "PIPELINE_DRAIN_TIMEOUT_MS",
  cancelGraceMs: "PIPELINE_CANCEL_GRACE_MS",
  checkpointIntervalMs: "PIPELINE_CHECKPOINT_INTERVAL_MS",
};

export class EnvValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid environment:\n  - ${problems.join("\n  - ")}`);
    this.name = "EnvValidationError";
  }
}

let _env: Env | null = null;

function variableFor(key: string | number | undefined): string {
  const match = Object.entries(PIPELINE_VARIABLES).find(([tunable]) => tunable === key);
  return match ? match[1] : String(key);
}

/**
 * Validates `source`, including the pipeline tunables the PIPELINE_*
 * variables override; unset tunables take the schema defaults. Every
 * problem is reported by variable name.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new EnvValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const raw = result.data;

  const tunables: Record<string, number> = {};
  for (const [tunable, variable] of Object.entries(PIPELINE_VARIABLES)) {
    const value = raw[variable];
    if (value !== undefined) tunables[tunable] = value;
  }

  const pipeline = pipelineConfigSchema.safeParse(tunables);
  if (!pipeline.success) {
    throw new EnvValidationError(
      pipeline.error.issues.map((issue) => `${variableFor(issue.path[0])}: ${issue.message}`)
    );
  }
  return { ...raw, pipeline: pipeline.data };
}

function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (!(error instanceof EnvValidationError)) throw error;
    console.error(
      `\n${"=".repeat(60)}\nENVIRONMENT CONFIGURATION ERROR\n${"=".repeat(60)}\n\n${error.message}\n\nSee server/src/config/env.ts for the supported variables.\n${"=".repeat(60)}\n`
    );
    process.exit(1);
  }
}

export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}
