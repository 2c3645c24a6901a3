/**
 * Inference backend contracts.
 *
 * Both engines always receive the identical WAV rendering of a sealed segment.
 */

import type { SealedSegment, WordTiming } from "@shared/schema";
import { pcmToWav } from "./wav";

export interface InferenceRequest {
  sessionId: string;
  segmentId: number;
  /** WAV (PCM16 mono) of the whole segment */
  audio: Buffer;
  sampleRate: number;
  durationMs: number;
  signal: AbortSignal;
}

export interface SpeechToTextResponse {
  text: string;
  confidence: number;
  /** Offsets relative to the start of the segment */
  words?: WordTiming[];
  language?: string;
}

export interface SpeechToTextEngine {
  readonly name: string;
  transcribe(request: InferenceRequest): Promise<SpeechToTextResponse>;
}

export interface SpeakerRecognitionResponse {
  speakerLabel: string;
  confidence: number;
}

export interface SpeakerRecognitionEngine {
  readonly name: string;
  identify(request: InferenceRequest): Promise<SpeakerRecognitionResponse>;
}

const wavCache = new WeakMap<SealedSegment, Buffer>();

function msToBytes(ms: number, sampleRate: number): number {
  return Math.round((ms * sampleRate) / 1000) * 2;
}

/**
 * PCM16 covering exactly `startMs`..`endMs` of the segment. Each frame is
 * written at its capture offset, so capture holes come out as silence and
 * offsets into the audio stay offsets from `segment.startMs`.
 */
export function segmentPcm(segment: SealedSegment, sampleRate: number): Buffer {
  const pcm = Buffer.alloc(msToBytes(segment.endMs - segment.startMs, sampleRate));

  for (const frame of segment.frames) {
    const offset = msToBytes(frame.captureMs - segment.startMs, sampleRate);
    const skip = Math.max(0, -offset);
    const target = Math.max(0, offset);
    if (target >= pcm.length || skip >= frame.pcm.length) continue;
    frame.pcm.copy(pcm, target, skip, Math.min(frame.pcm.length, skip + pcm.length - target));
  }
  return pcm;
}

export function segmentAudio(segment: SealedSegment, sampleRate: number): Buffer {
  const cached = wavCache.get(segment);
  if (cached) return cached;

  const wav = pcmToWav(segmentPcm(segment, sampleRate), sampleRate);
  wavCache.set(segment, wav);
  return wav;
}
