import type { AudioFrame, SealedSegment } from "@shared/schema";

export const SAMPLE_RATE = 16000;
export const FRAME_MS = 20;

/** Constant-amplitude PCM16LE; 8000/32768 RMS is well above the speech threshold */
export function pcm(durationMs: number, amplitude: number): Buffer {
  const samples = Math.round((SAMPLE_RATE * durationMs) / 1000);
  const buffer = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) {
    buffer.writeInt16LE(amplitude, i * 2);
  }
  return buffer;
}

export function frame(sequence: number, captureMs: number, voiced: boolean, durationMs = FRAME_MS): AudioFrame {
  return {
    sequence,
    pcm: pcm(durationMs, voiced ? 8000 : 0),
    captureMs,
    durationMs,
  };
}

/**
 * Consecutive frames from `startMs` to `endMs`; sequences continue from
 * `firstSequence`.
 */
export function run(startMs: number, endMs: number, voiced: boolean, firstSequence: number): AudioFrame[] {
  const frames: AudioFrame[] = [];
  for (let t = startMs, seq = firstSequence; t < endMs; t += FRAME_MS, seq++) {
    frames.push(frame(seq, t, voiced));
  }
  return frames;
}

/** Builds a stream from [voiced, fromMs, toMs] spans, numbering frames in order */
export function stream(...spans: Array<[boolean, number, number]>): AudioFrame[] {
  const frames: AudioFrame[] = [];
  for (const [voiced, from, to] of spans) {
    frames.push(...run(from, to, voiced, frames.length));
  }
  return frames;
}

export function sealedSegment(id: number, startMs: number, endMs: number, discardable = false): SealedSegment {
  return Object.freeze({
    id,
    sessionId: "session-test",
    startMs,
    endMs,
    frames: Object.freeze(run(startMs, endMs, true, id * 1000)),
    state: "sealed" as const,
    discardable,
  });
}
