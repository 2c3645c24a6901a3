/**
 * Inference Worker Tests
 *
 * Exactly-one-result delivery, retry classification, cancellation and the
 * parallelism bound, exercised through the diarization and transcription
 * workers with in-process engines.
 */

import { describe, it, expect, vi } from "vitest";
import { CircuitState, getAllCircuitBreakers } from "../../../lib/reliability";
import type { DiarizationResult, SealedSegment, TranscriptionResult } from "@shared/schema";
import type { SpeechToTextResponse } from "../../stt/engines";
import { DiarizationWorker, clampConfidence } from "../../pipeline/diarizationWorker";
import { TranscriptionWorker } from "../../pipeline/transcriptionWorker";
import { TransientBackendError } from "../../pipeline/errors";
import { raceAbort, type InferenceWorkerOptions } from "../../pipeline/inferenceWorker";
import { FakeSpeakerRecognition, FakeSpeechToText, never } from "../fakes";
import { SAMPLE_RATE, run, sealedSegment } from "./fixtures";

function workerOptions<T>(
  onResult: (result: T, segment: SealedSegment) => void,
  overrides: Partial<InferenceWorkerOptions<T>> = {}
): InferenceWorkerOptions<T> {
  return {
    sessionId: "session-test",
    parallelism: 2,
    sampleRate: SAMPLE_RATE,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, jitterFactor: 0, random: () => 0.5 },
    breaker: { failureThreshold: 100, openDurationMs: 60_000 },
    onResult,
    ...overrides,
  };
}

describe("TranscriptionWorker", () => {
  it("should emit one result per segment with words on the session timeline", async () => {
    const engine = new FakeSpeechToText(async () => ({
      text: "  hello there ",
      confidence: 0.9,
      words: [{ word: "hello", startMs: 0, endMs: 200 }],
      language: "en",
    }));
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(1, 1000, 1400));
    await worker.whenIdle();

    expect(results).toEqual([
      {
        segmentId: 1,
        text: "hello there",
        confidence: 0.9,
        words: [{ word: "hello", startMs: 1000, endMs: 1200 }],
        language: "en",
        degraded: false,
      },
    ]);
    expect(worker.stats().completed).toBe(1);
  });

  it("should send the segment as a WAV rendering", async () => {
    const engine = new FakeSpeechToText(async () => ({ text: "ok", confidence: 1 }));
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>(() => undefined));

    worker.enqueue(sealedSegment(1, 0, 100));
    await worker.whenIdle();

    const [request] = engine.requests;
    expect(request.audio.subarray(0, 4).toString("ascii")).toBe("RIFF");
    expect(request.durationMs).toBe(100);
    expect(request.segmentId).toBe(1);
  });

  it("should keep word timings on the session timeline across a capture hole", async () => {
    const engine = new FakeSpeechToText(async (request) => {
      const audioMs = (request.audio.length - 44) / 2 / (SAMPLE_RATE / 1000);
      return { text: "later", confidence: 0.9, words: [{ word: "later", startMs: 400, endMs: audioMs }] };
    });
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => results.push(r)));
    const segment: SealedSegment = {
      id: 4,
      sessionId: "session-test",
      startMs: 1000,
      endMs: 1700,
      frames: [...run(1000, 1300, true, 0), ...run(1400, 1700, true, 15)],
      state: "sealed",
      discardable: false,
    };

    worker.enqueue(segment);
    await worker.whenIdle();

    expect(engine.requests[0].durationMs).toBe(700);
    expect(results[0].words).toEqual([{ word: "later", startMs: 1400, endMs: 1700 }]);
  });

  it("should give empty text zero confidence", async () => {
    const engine = new FakeSpeechToText(async () => ({ text: "   ", confidence: 0.7 }));
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(1, 0, 300));
    await worker.whenIdle();

    expect(results[0]).toMatchObject({ text: "", confidence: 0, degraded: false });
  });

  it("should retry a transient failure and then succeed", async () => {
    const engine = new FakeSpeechToText(async (_request, call) => {
      if (call === 1) throw new TransientBackendError("upstream 503", "fake-stt", 503);
      return { text: "second try", confidence: 0.8 };
    });
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(1, 0, 300));
    await worker.whenIdle();

    expect(engine.requests).toHaveLength(2);
    expect(results[0].text).toBe("second try");
    expect(worker.stats().retries).toBe(1);
  });

  it("should degrade after every attempt fails", async () => {
    const engine = new FakeSpeechToText(async () => {
      throw new TransientBackendError("timeout", "fake-stt");
    });
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(5, 0, 300));
    await worker.whenIdle();

    expect(engine.requests).toHaveLength(3);
    expect(results).toEqual([{ segmentId: 5, text: "", confidence: 0, degraded: true }]);
    expect(worker.stats().degraded).toBe(1);
  });

  it("should not retry a non-transient failure", async () => {
    const engine = new FakeSpeechToText(async () => {
      throw new Error("unsupported audio format");
    });
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(1, 0, 300));
    await worker.whenIdle();

    expect(engine.requests).toHaveLength(1);
    expect(results[0].degraded).toBe(true);
  });

  it("should keep at most `parallelism` calls in flight", async () => {
    let active = 0;
    let peak = 0;
    const engine = new FakeSpeechToText(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return { text: "x", confidence: 1 };
    });
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => results.push(r)));

    for (let id = 1; id <= 5; id++) {
      worker.enqueue(sealedSegment(id, id * 1000, id * 1000 + 300));
    }
    expect(worker.stats()).toMatchObject({ queued: 3, inFlight: 2 });

    await worker.whenIdle();
    expect(peak).toBe(2);
    expect(results.map((r) => r.segmentId).sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("should deliver results in completion order", async () => {
    const delays: Record<number, number> = { 1: 30, 2: 1 };
    const engine = new FakeSpeechToText(async (request) => {
      await new Promise((resolve) => setTimeout(resolve, delays[request.segmentId]));
      return { text: `segment ${request.segmentId}`, confidence: 1 };
    });
    const order: number[] = [];
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>((r) => order.push(r.segmentId)));

    worker.enqueue(sealedSegment(1, 0, 300));
    worker.enqueue(sealedSegment(2, 400, 700));
    await worker.whenIdle();

    expect(order).toEqual([2, 1]);
  });

  it("should degrade in-flight and queued segments on cancel", async () => {
    const engine = new FakeSpeechToText(() => never<SpeechToTextResponse>());
    const results: TranscriptionResult[] = [];
    const worker = new TranscriptionWorker(
      engine,
      workerOptions<TranscriptionResult>((r) => results.push(r), { parallelism: 1 })
    );

    worker.enqueue(sealedSegment(1, 0, 300));
    worker.enqueue(sealedSegment(2, 400, 700));
    worker.cancel();
    await worker.whenIdle();

    expect(results.map((r) => [r.segmentId, r.degraded])).toEqual([
      [2, true],
      [1, true],
    ]);
    expect(worker.stats()).toMatchObject({ cancelled: 2, degraded: 2, completed: 0 });
    expect(worker.isIdle).toBe(true);

    worker.enqueue(sealedSegment(3, 800, 1100));
    expect(results.at(-1)).toEqual({ segmentId: 3, text: "", confidence: 0, degraded: true });
    expect(worker.stats()).toMatchObject({ cancelled: 3, degraded: 3 });
    expect(engine.requests).toHaveLength(1);
  });

  it("should keep going when the result handler throws", async () => {
    const engine = new FakeSpeechToText(async () => ({ text: "x", confidence: 1 }));
    const onResult = vi.fn(() => {
      throw new Error("handler broke");
    });
    const worker = new TranscriptionWorker(engine, workerOptions<TranscriptionResult>(onResult));

    worker.enqueue(sealedSegment(1, 0, 300));
    worker.enqueue(sealedSegment(2, 400, 700));
    await worker.whenIdle();

    expect(onResult).toHaveBeenCalledTimes(2);
  });
});

describe("DiarizationWorker", () => {
  it("should pass the speaker label and confidence through", async () => {
    const engine = new FakeSpeakerRecognition(async () => ({ speakerLabel: " SPEAKER_1 ", confidence: 0.75 }));
    const results: DiarizationResult[] = [];
    const worker = new DiarizationWorker(engine, workerOptions<DiarizationResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(1, 0, 300));
    await worker.whenIdle();

    expect(results).toEqual([{ segmentId: 1, speakerLabel: "SPEAKER_1", confidence: 0.75, degraded: false }]);
  });

  it("should fall back to the unknown speaker for an empty label", async () => {
    const engine = new FakeSpeakerRecognition(async () => ({ speakerLabel: "", confidence: 2 }));
    const results: DiarizationResult[] = [];
    const worker = new DiarizationWorker(engine, workerOptions<DiarizationResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(1, 0, 300));
    await worker.whenIdle();

    expect(results[0]).toEqual({ segmentId: 1, speakerLabel: "unknown", confidence: 1, degraded: false });
  });

  it("should degrade to the unknown speaker when the backend keeps failing", async () => {
    const engine = new FakeSpeakerRecognition(async () => {
      throw new TransientBackendError("rate limit", "fake-speakers", 429);
    });
    const results: DiarizationResult[] = [];
    const worker = new DiarizationWorker(engine, workerOptions<DiarizationResult>((r) => results.push(r)));

    worker.enqueue(sealedSegment(1, 0, 300));
    await worker.whenIdle();

    expect(results).toEqual([{ segmentId: 1, speakerLabel: "unknown", confidence: 0, degraded: true }]);
  });

  it("should degrade without calling the backend once the circuit opens", async () => {
    const engine = new FakeSpeakerRecognition(async () => {
      throw new Error("speaker service misconfigured");
    });
    const results: DiarizationResult[] = [];
    const worker = new DiarizationWorker(
      engine,
      workerOptions<DiarizationResult>((r) => results.push(r), {
        sessionId: "session-open",
        parallelism: 1,
        breaker: { failureThreshold: 1, openDurationMs: 60_000 },
      })
    );

    worker.enqueue(sealedSegment(1, 0, 300));
    worker.enqueue(sealedSegment(2, 400, 700));
    await worker.whenIdle();

    expect(engine.requests).toHaveLength(1);
    expect(results.map((r) => r.degraded)).toEqual([true, true]);
    expect(getAllCircuitBreakers().get("DiarizationWorker:session-open")?.currentState).toBe(CircuitState.OPEN);

    worker.dispose();
    expect(getAllCircuitBreakers().has("DiarizationWorker:session-open")).toBe(false);
  });
});

describe("clampConfidence", () => {
  it("should clamp into [0, 1] and zero out non-finite values", () => {
    expect(clampConfidence(-0.5)).toBe(0);
    expect(clampConfidence(0.4)).toBe(0.4);
    expect(clampConfidence(3)).toBe(1);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});

describe("raceAbort", () => {
  it("should reject with the abort reason when the signal fires first", async () => {
    const controller = new AbortController();
    const racing = raceAbort(never<string>(), controller.signal);
    controller.abort(new Error("stop"));

    await expect(racing).rejects.toThrow("stop");
  });

  it("should resolve with the value when the promise wins", async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve("done"), controller.signal)).resolves.toBe("done");
  });
});
