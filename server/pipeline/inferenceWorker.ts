/**
 * Inference Worker
 *
 * Consumes sealed segments with bounded concurrency and calls one inference
 * backend per segment. Every segment handed to `enqueue` yields exactly one
 * result through `onResult`: the backend's answer, or a degraded result once
 * retries are exhausted, the circuit is open, or the call was cancelled.
 * Output order follows completion, not segment order.
 */

import type { SealedSegment } from "@shared/schema";
import {
  CircuitBreaker,
  CircuitOpenError,
  RetryAbortedError,
  isRetryableError,
  registerCircuitBreaker,
  withReliability,
} from "../../lib/reliability";
import { log } from "../logger";
import { segmentAudio, type InferenceRequest } from "../stt/engines";
import {
  CancelledError,
  ExhaustedRetryError,
  TransientBackendError,
  errorMessage,
} from "./errors";

export type BackendOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; failure: ExhaustedRetryError | CancelledError; attempts: number };

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  random?: () => number;
}

export interface BreakerPolicy {
  failureThreshold: number;
  openDurationMs: number;
}

export interface InferenceWorkerOptions<TResult> {
  sessionId: string;
  parallelism: number;
  sampleRate: number;
  retry: RetryPolicy;
  breaker: BreakerPolicy;
  onResult: (result: TResult, segment: SealedSegment) => void;
}

export interface InferenceWorkerStats {
  queued: number;
  inFlight: number;
  completed: number;
  degraded: number;
  retries: number;
  cancelled: number;
}

/**
 * Settles with `promise`, or rejects as soon as `signal` aborts, whichever
 * comes first. Backends that ignore the signal cannot hold a segment hostage.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function isTransientFailure(error: unknown): boolean {
  return error instanceof TransientBackendError || isRetryableError(error);
}

export abstract class InferenceWorker<TResponse, TResult> {
  abstract readonly backend: string;

  private readonly queue: SealedSegment[] = [];
  private readonly inFlight = new Map<number, AbortController>();
  private readonly breaker: CircuitBreaker;
  private readonly releaseBreaker: () => void;
  private idleWaiters: Array<() => void> = [];
  private cancelled = false;

  private counters = {
    completed: 0,
    degraded: 0,
    retries: 0,
    cancelled: 0,
  };

  constructor(protected readonly options: InferenceWorkerOptions<TResult>) {
    this.breaker = new CircuitBreaker({
      name: `${this.constructor.name}:${options.sessionId}`,
      failureThreshold: options.breaker.failureThreshold,
      openDurationMs: options.breaker.openDurationMs,
      successThreshold: 1,
    });
    this.releaseBreaker = registerCircuitBreaker(this.breaker);
  }

  protected abstract invoke(request: InferenceRequest): Promise<TResponse>;
  protected abstract toResult(segment: SealedSegment, response: TResponse): TResult;
  protected abstract degrade(segment: SealedSegment, cause: Error): TResult;

  get isIdle(): boolean {
    return this.queue.length === 0 && this.inFlight.size === 0;
  }

  enqueue(segment: SealedSegment): void {
    if (this.cancelled) {
      this.counters.degraded++;
      this.counters.cancelled++;
      this.emit(this.degrade(segment, new CancelledError(this.backend, segment.id)), segment);
      return;
    }
    this.queue.push(segment);
    this.processNext();
  }

  /**
   * Abort every in-flight call and degrade everything still queued.
   * Later enqueues degrade immediately.
   */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;

    const pending = this.queue.splice(0, this.queue.length);
    for (const segment of pending) {
      this.counters.degraded++;
      this.counters.cancelled++;
      this.emit(this.degrade(segment, new CancelledError(this.backend, segment.id)), segment);
    }

    for (const controller of this.inFlight.values()) {
      controller.abort();
    }

    this.notifyIfIdle();
  }

  /** Drops the session's breaker from the health report. */
  dispose(): void {
    this.releaseBreaker();
  }

  whenIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  stats(): InferenceWorkerStats {
    return {
      queued: this.queue.length,
      inFlight: this.inFlight.size,
      ...this.counters,
    };
  }

  private processNext(): void {
    while (this.inFlight.size < this.options.parallelism && this.queue.length > 0) {
      const segment = this.queue.shift();
      if (!segment) break;

      const controller = new AbortController();
      this.inFlight.set(segment.id, controller);

      void this.run(segment, controller.signal)
        .catch((error: unknown) => {
          this.counters.degraded++;
          log(
            `[${this.constructor.name}:${this.options.sessionId}] Segment ${segment.id} failed outside the backend call: ${errorMessage(error)}`,
            "pipeline",
            "error"
          );
          return this.degrade(segment, error instanceof Error ? error : new Error(String(error)));
        })
        .then((result) => this.emit(result, segment))
        .finally(() => {
          this.inFlight.delete(segment.id);
          this.processNext();
          this.notifyIfIdle();
        });
    }
  }

  private async run(segment: SealedSegment, signal: AbortSignal): Promise<TResult> {
    const outcome = await this.call(segment, signal);
    if (outcome.ok) {
      this.counters.completed++;
      return this.toResult(segment, outcome.value);
    }

    this.counters.degraded++;
    if (outcome.failure instanceof CancelledError) {
      this.counters.cancelled++;
    }
    log(
      `[${this.constructor.name}:${this.options.sessionId}] Degraded segment ${segment.id}: ${outcome.failure.message}`,
      "pipeline",
      "warn"
    );
    return this.degrade(segment, outcome.failure);
  }

  private async call(segment: SealedSegment, signal: AbortSignal): Promise<BackendOutcome<TResponse>> {
    const { retry, sampleRate, sessionId } = this.options;
    const request: InferenceRequest = {
      sessionId,
      segmentId: segment.id,
      audio: segmentAudio(segment, sampleRate),
      sampleRate,
      durationMs: segment.endMs - segment.startMs,
      signal,
    };

    let attempts = 0;
    try {
      const value = await withReliability(
        (attempt) => {
          attempts = attempt + 1;
          return raceAbort(this.invoke(request), signal);
        },
        this.breaker,
        {
          maxRetries: Math.max(0, retry.maxAttempts - 1),
          baseDelayMs: retry.baseDelayMs,
          maxDelayMs: retry.maxDelayMs,
          jitterFactor: retry.jitterFactor,
          random: retry.random ?? Math.random,
          retryOn: isTransientFailure,
          signal,
          onRetry: () => {
            this.counters.retries++;
          },
        }
      );
      return { ok: true, value, attempts };
    } catch (error) {
      if (error instanceof RetryAbortedError || signal.aborted) {
        return { ok: false, failure: new CancelledError(this.backend, segment.id), attempts };
      }
      if (error instanceof CircuitOpenError) {
        log(`[${this.constructor.name}:${sessionId}] ${error.message}`, "pipeline", "warn");
      }
      return {
        ok: false,
        failure: new ExhaustedRetryError(this.backend, segment.id, attempts, { cause: error }),
        attempts,
      };
    }
  }

  private emit(result: TResult, segment: SealedSegment): void {
    try {
      this.options.onResult(result, segment);
    } catch (error) {
      log(
        `[${this.constructor.name}:${this.options.sessionId}] Result handler failed for segment ${segment.id}: ${errorMessage(error)}`,
        "pipeline",
        "error"
      );
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
