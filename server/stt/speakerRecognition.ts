/**
 * HTTP Speaker-Recognition engine
 *
 * Posts the WAV segment to a speaker-recognition service and expects a
 * cluster label back. Numeric labels follow the SPEAKER_<n> convention.
 *
 * Required Environment Variables:
 * - SPEAKER_RECOGNITION_URL: endpoint accepting audio/wav
 * - SPEAKER_RECOGNITION_TOKEN (optional): bearer token
 */

import { z } from "zod";
import { log } from "../logger";
import { TransientBackendError } from "../pipeline/errors";
import type {
  InferenceRequest,
  SpeakerRecognitionEngine,
  SpeakerRecognitionResponse,
} from "./engines";

const speakerResponseSchema = z.object({
  speaker: z.union([z.string().min(1), z.number().int().nonnegative()]),
  confidence: z.number().min(0).max(1).default(0),
});

export interface HttpSpeakerRecognitionOptions {
  url: string;
  token?: string;
  fetchImpl?: typeof fetch;
}

export function normalizeSpeakerLabel(speaker: string | number): string {
  return typeof speaker === "number" ? `SPEAKER_${speaker}` : speaker;
}

export class HttpSpeakerRecognition implements SpeakerRecognitionEngine {
  readonly name = "speaker-recognition";
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpSpeakerRecognitionOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async identify(request: InferenceRequest): Promise<SpeakerRecognitionResponse> {
    const headers: Record<string, string> = {
      "Content-Type": "audio/wav",
      "X-Session-Id": request.sessionId,
      "X-Segment-Id": String(request.segmentId),
      "X-Sample-Rate": String(request.sampleRate),
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    let res: Response;
    try {
      res = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers,
        body: request.audio,
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal.aborted) throw error;
      throw new TransientBackendError(
        `Speaker recognition unreachable: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        undefined,
        { cause: error }
      );
    }

    if (!res.ok) {
      const body = await safeReadText(res);
      const message = `Speaker recognition failed: ${res.status} ${res.statusText}${body ? ` - ${body}` : ""}`;
      if (res.status === 429 || res.status >= 500) {
        throw new TransientBackendError(message, this.name, res.status);
      }
      throw new Error(message);
    }

    const parsed = speakerResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      log(`[SpeakerRecognition] Invalid response for segment ${request.segmentId}: ${parsed.error.message}`, "stt", "warn");
      throw new Error("Invalid speaker recognition response");
    }

    return {
      speakerLabel: normalizeSpeakerLabel(parsed.data.speaker),
      confidence: parsed.data.confidence,
    };
  }
}

async function safeReadText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

/** Stand-in when no service is configured: every segment degrades to the unknown speaker */
export class UnconfiguredSpeakerRecognition implements SpeakerRecognitionEngine {
  readonly name = "speaker-recognition";

  async identify(): Promise<SpeakerRecognitionResponse> {
    throw new Error("SPEAKER_RECOGNITION_URL is not configured");
  }
}
