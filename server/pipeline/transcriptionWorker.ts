import type { SealedSegment, TranscriptionResult } from "@shared/schema";
import type {
  InferenceRequest,
  SpeechToTextEngine,
  SpeechToTextResponse,
} from "../stt/engines";
import { clampConfidence } from "./diarizationWorker";
import { InferenceWorker, type InferenceWorkerOptions } from "./inferenceWorker";

/**
 * Transcribes each sealed segment. Word timings come back relative to the
 * segment and are shifted onto the session timeline here. Degrades to empty
 * text with zero confidence.
 */
export class TranscriptionWorker extends InferenceWorker<SpeechToTextResponse, TranscriptionResult> {
  readonly backend: string;

  constructor(
    private readonly engine: SpeechToTextEngine,
    options: InferenceWorkerOptions<TranscriptionResult>
  ) {
    super(options);
    this.backend = engine.name;
  }

  protected invoke(request: InferenceRequest): Promise<SpeechToTextResponse> {
    return this.engine.transcribe(request);
  }

  protected toResult(segment: SealedSegment, response: SpeechToTextResponse): TranscriptionResult {
    const text = response.text.trim();
    return {
      segmentId: segment.id,
      text,
      confidence: text ? clampConfidence(response.confidence) : 0,
      words: response.words?.map((word) => ({
        ...word,
        startMs: segment.startMs + word.startMs,
        endMs: segment.startMs + word.endMs,
      })),
      language: response.language,
      degraded: false,
    };
  }

  protected degrade(segment: SealedSegment): TranscriptionResult {
    return degradedTranscription(segment.id);
  }
}

export function degradedTranscription(segmentId: number): TranscriptionResult {
  return {
    segmentId,
    text: "",
    confidence: 0,
    degraded: true,
  };
}
