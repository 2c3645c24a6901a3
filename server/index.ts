import express from "express";
import { SqliteArchiveStore } from "./archive";
import { log } from "./logger";
import { OpenAiMeetingSummarizer } from "./meetingSummarizer";
import { createHealthCheckHandler } from "./middleware/healthCheck";
import { registerRoutes } from "./routes";
import { SessionRegistry } from "./sessions/sessionRegistry";
import { getEnv } from "./src/config/env";
import { HttpSpeakerRecognition, UnconfiguredSpeakerRecognition } from "./stt/speakerRecognition";
import { WhisperSpeechToText } from "./stt/whisper";

const env = getEnv();

if (!env.OPENAI_API_KEY) {
  log("OPENAI_API_KEY not set - transcription and summaries will degrade", "startup", "warn");
}
if (!env.SPEAKER_RECOGNITION_URL) {
  log("SPEAKER_RECOGNITION_URL not set - every utterance will be attributed to the unknown speaker", "startup", "warn");
}

const archive = new SqliteArchiveStore(env.ARCHIVE_DB_PATH);
const speechToText = new WhisperSpeechToText({
  apiKey: env.OPENAI_API_KEY,
  model: env.WHISPER_MODEL,
  language: env.WHISPER_LANGUAGE,
});
const speakerRecognition = env.SPEAKER_RECOGNITION_URL
  ? new HttpSpeakerRecognition({ url: env.SPEAKER_RECOGNITION_URL, token: env.SPEAKER_RECOGNITION_TOKEN })
  : new UnconfiguredSpeakerRecognition();
const summarizer = new OpenAiMeetingSummarizer({
  apiKey: env.OPENAI_API_KEY,
  model: env.SUMMARY_MODEL,
});

const registry = new SessionRegistry({
  config: env.pipeline,
  closedRetentionMs: env.SESSION_RETENTION_MS,
  speechToText,
  speakerRecognition,
  archive,
  summarizer,
});

const app = express();

app.use(express.json({ limit: "1mb" }));
app.use(express.urlencoded({ extended: false }));

// Health and readiness endpoints (no auth, no logging, crash-resistant)
app.get("/healthz", (_req, res) => {
  res.json({ ok: true, service: env.APP_NAME });
});

app.get("/readyz", (_req, res) => {
  try {
    archive.ping();
    res.json({ ready: true });
  } catch {
    res.status(503).json({ ready: false });
  }
});

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });

  next();
});

const httpServer = registerRoutes(app, {
  registry,
  archive,
  healthHandler: createHealthCheckHandler({
    registry,
    engines: { speechToText: speechToText.name, speakerRecognition: speakerRecognition.name },
    pingArchive: () => archive.ping(),
  }),
});

httpServer.listen({ port: env.PORT, host: "0.0.0.0" }, () => {
  log(`serving on port ${env.PORT}`);
});

async function shutdown(signal: string): Promise<void> {
  log(`${signal} received, draining ${registry.activeCount} session(s)`, "startup");
  await registry.stopAll();
  archive.close();
  httpServer.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        log(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`, "startup", "error");
        process.exit(1);
      }
    );
  });
}
