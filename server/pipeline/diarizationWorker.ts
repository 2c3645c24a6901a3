import { UNKNOWN_SPEAKER, type DiarizationResult, type SealedSegment } from "@shared/schema";
import type {
  InferenceRequest,
  SpeakerRecognitionEngine,
  SpeakerRecognitionResponse,
} from "../stt/engines";
import { InferenceWorker, type InferenceWorkerOptions } from "./inferenceWorker";

/**
 * Attributes each sealed segment to a speaker cluster. Degrades to the
 * unknown speaker with zero confidence.
 */
export class DiarizationWorker extends InferenceWorker<SpeakerRecognitionResponse, DiarizationResult> {
  readonly backend: string;

  constructor(
    private readonly engine: SpeakerRecognitionEngine,
    options: InferenceWorkerOptions<DiarizationResult>
  ) {
    super(options);
    this.backend = engine.name;
  }

  protected invoke(request: InferenceRequest): Promise<SpeakerRecognitionResponse> {
    return this.engine.identify(request);
  }

  protected toResult(segment: SealedSegment, response: SpeakerRecognitionResponse): DiarizationResult {
    const label = response.speakerLabel.trim();
    return {
      segmentId: segment.id,
      speakerLabel: label || UNKNOWN_SPEAKER,
      confidence: clampConfidence(response.confidence),
      degraded: false,
    };
  }

  protected degrade(segment: SealedSegment): DiarizationResult {
    return degradedDiarization(segment.id);
  }
}

export function degradedDiarization(segmentId: number): DiarizationResult {
  return {
    segmentId,
    speakerLabel: UNKNOWN_SPEAKER,
    confidence: 0,
    degraded: true,
  };
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
