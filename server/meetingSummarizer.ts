import OpenAI from "openai";
import {
  meetingSummarySchema,
  type MeetingSummary,
  type TranscriptSnapshot,
} from "@shared/schema";
import { getCircuitBreaker, withReliability } from "../lib/reliability";
import { log } from "./logger";

export interface MeetingSummarizer {
  summarize(snapshot: TranscriptSnapshot): Promise<MeetingSummary>;
}

export interface OpenAiSummarizerOptions {
  apiKey?: string;
  model?: string;
  client?: OpenAI;
  maxTranscriptChars?: number;
}

const SYSTEM_PROMPT = `You are a meeting assistant. You receive a speaker-attributed meeting transcript.
Write:
1. A short summary of the meeting (2-4 sentences)
2. Notes: the key points discussed, one per entry
3. Action items: concrete tasks, with the owner when the transcript names one
4. Decisions: anything the participants agreed on

Lines marked [gap] are stretches where audio was lost. Do not invent content for them.

Return a JSON object with this structure:
{
  "summary": "string",
  "notes": ["string"],
  "actionItems": [{"task": "string", "owner": "string", "dueDate": "string", "priority": "high" | "medium" | "low"}],
  "decisions": ["string"]
}`;

function formatClock(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

/**
 * Renders the transcript as plain lines. Utterances with no text are left out.
 */
export function formatTranscript(snapshot: TranscriptSnapshot): string {
  const lines: string[] = [];
  for (const entry of snapshot.entries) {
    if (entry.kind === "gap") {
      lines.push(`[${formatClock(entry.atMs)}] [gap]`);
    } else if (entry.text) {
      lines.push(`[${formatClock(entry.startMs)}] ${entry.speakerLabel}: ${entry.text}`);
    }
  }
  return lines.join("\n");
}

export function hasSpeech(snapshot: TranscriptSnapshot): boolean {
  return snapshot.entries.some((entry) => entry.kind === "utterance" && entry.text.length > 0);
}

export class OpenAiMeetingSummarizer implements MeetingSummarizer {
  private client: OpenAI | null;
  private readonly model: string;
  private readonly maxTranscriptChars: number;

  constructor(private readonly options: OpenAiSummarizerOptions = {}) {
    this.client = options.client ?? null;
    this.model = options.model ?? "gpt-4o-mini";
    this.maxTranscriptChars = options.maxTranscriptChars ?? 60000;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error("OPENAI_API_KEY is required for meeting summarization");
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  async summarize(snapshot: TranscriptSnapshot): Promise<MeetingSummary> {
    if (!hasSpeech(snapshot)) {
      return meetingSummarySchema.parse({});
    }

    const client = this.getClient();
    let transcript = formatTranscript(snapshot);
    if (transcript.length > this.maxTranscriptChars) {
      log(
        `[Summarizer] Transcript for ${snapshot.sessionId} truncated to ${this.maxTranscriptChars} chars`,
        "summarizer",
        "warn"
      );
      transcript = transcript.slice(transcript.length - this.maxTranscriptChars);
    }

    const response = await withReliability(
      () =>
        client.chat.completions.create({
          model: this.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: transcript },
          ],
          response_format: { type: "json_object" },
          max_completion_tokens: 1500,
        }),
      getCircuitBreaker("openai-summarizer", { failureThreshold: 5, openDurationMs: 60000 }),
      { maxRetries: 2 }
    );

    const content = response.choices[0]?.message?.content;
    if (!content || content.trim() === "") {
      throw new Error("Summarizer returned no content");
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      log(`[Summarizer] Failed to parse JSON response: ${content.substring(0, 200)}`, "summarizer", "error");
      throw new Error("Summarizer returned invalid JSON", { cause: error });
    }

    const parsed = meetingSummarySchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Summarizer returned an unexpected shape: ${parsed.error.message}`);
    }

    log(
      `[Summarizer] ${snapshot.sessionId}: ${parsed.data.notes.length} notes, ${parsed.data.actionItems.length} action items`,
      "summarizer"
    );
    return parsed.data;
  }
}
