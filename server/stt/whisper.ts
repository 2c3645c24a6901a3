/**
 * OpenAI Whisper speech-to-text engine.
 *
 * Requests verbose JSON with word timestamps. Confidence is the mean of the
 * per-segment average log-probabilities mapped back to a probability.
 */

import OpenAI, { toFile } from "openai";
import { z } from "zod";
import { log } from "../logger";
import { TransientBackendError } from "../pipeline/errors";
import type { InferenceRequest, SpeechToTextEngine, SpeechToTextResponse } from "./engines";

const FALLBACK_CONFIDENCE = 0.5;

const verboseTranscriptionSchema = z.object({
  text: z.string().default(""),
  language: z.string().optional(),
  words: z
    .array(z.object({ word: z.string(), start: z.number(), end: z.number() }))
    .optional(),
  segments: z.array(z.object({ avg_logprob: z.number() })).optional(),
});

export interface WhisperOptions {
  apiKey?: string;
  model?: string;
  language?: string;
  client?: OpenAI;
}

export function confidenceFromLogprobs(avgLogprobs: number[]): number {
  if (avgLogprobs.length === 0) return FALLBACK_CONFIDENCE;
  const mean = avgLogprobs.reduce((a, b) => a + b, 0) / avgLogprobs.length;
  return Math.min(1, Math.max(0, Math.exp(mean)));
}

export function classifyOpenAiError(error: unknown, backend: string): unknown {
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === undefined || status === 429 || status >= 500) {
      return new TransientBackendError(error.message, backend, status, { cause: error });
    }
  }
  return error;
}

export class WhisperSpeechToText implements SpeechToTextEngine {
  readonly name = "whisper";
  private client: OpenAI | null;
  private readonly model: string;

  constructor(private readonly options: WhisperOptions = {}) {
    this.client = options.client ?? null;
    this.model = options.model ?? "whisper-1";
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error("OPENAI_API_KEY is required for Whisper transcription");
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  async transcribe(request: InferenceRequest): Promise<SpeechToTextResponse> {
    const client = this.getClient();
    const file = await toFile(request.audio, `segment-${request.segmentId}.wav`, {
      type: "audio/wav",
    });

    let raw: unknown;
    try {
      raw = await client.audio.transcriptions.create(
        {
          file,
          model: this.model,
          response_format: "verbose_json",
          timestamp_granularities: ["word", "segment"],
          ...(this.options.language ? { language: this.options.language } : {}),
        },
        { signal: request.signal }
      );
    } catch (error) {
      throw classifyOpenAiError(error, this.name);
    }

    const parsed = verboseTranscriptionSchema.safeParse(raw);
    if (!parsed.success) {
      log(`[Whisper] Unexpected response for segment ${request.segmentId}: ${parsed.error.message}`, "stt", "warn");
      throw new Error("Unexpected transcription response shape");
    }

    const { text, language, words, segments } = parsed.data;
    const trimmed = text.trim();

    return {
      text: trimmed,
      confidence: trimmed ? confidenceFromLogprobs((segments ?? []).map((s) => s.avg_logprob)) : 0,
      words: words?.map((w) => ({
        word: w.word,
        startMs: Math.round(w.start * 1000),
        endMs: Math.round(w.end * 1000),
      })),
      language,
    };
  }
}
