/**
 * Backend call guard tests: retry classification, backoff, breaker
 * transitions and the breaker registry. Timers and Date are faked.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  CircuitBreaker,
  CircuitState,
  CircuitOpenError,
  RetryAbortedError,
  type CircuitBreakerConfig,
  calculateBackoff,
  getAllCircuitBreakers,
  getCircuitBreaker,
  isRetryableError,
  registerCircuitBreaker,
  resetAllCircuitBreakers,
  retryReason,
  withReliability,
  withRetry,
} from "../../lib/reliability";

class HttpError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
  }
}

const midpoint = () => 0.5;

function trip(breaker: CircuitBreaker, times: number): void {
  for (let i = 0; i < times; i++) breaker.recordFailure();
}

describe("retryReason", () => {
  it("should classify by HTTP status first", () => {
    expect(retryReason(new HttpError("slow down", 429))).toBe("rate_limited");
    expect(retryReason(new HttpError("bad gateway", 502))).toBe("server_error");
    expect(retryReason(new HttpError("request timeout in body", 400))).toBeNull();
  });

  it("should fall back to the message when there is no status", () => {
    expect(retryReason(new Error("Rate limit exceeded"))).toBe("rate_limited");
    expect(retryReason(new Error("request timed out"))).toBe("timeout");
    expect(retryReason(new Error("read ECONNRESET"))).toBe("network");
    expect(retryReason(new Error("audio too short"))).toBeNull();
  });

  it("should read statusCode as well as status", () => {
    const error = Object.assign(new Error("unavailable"), { statusCode: 503 });
    expect(isRetryableError(error)).toBe(true);
  });

  it("should not retry values that are not errors", () => {
    expect(isRetryableError("timeout")).toBe(false);
    expect(isRetryableError(undefined)).toBe(false);
  });
});

describe("calculateBackoff", () => {
  it("should double the delay per attempt up to the cap", () => {
    expect([0, 1, 2, 3].map((attempt) => calculateBackoff(attempt, 250, 1500, 0.3, midpoint))).toEqual([
      250, 500, 1000, 1500,
    ]);
  });

  it("should spread by the jitter factor in both directions", () => {
    expect(calculateBackoff(0, 1000, 10000, 0.2, () => 0)).toBe(800);
    expect(calculateBackoff(0, 1000, 10000, 0.2, () => 1)).toBe(1200);
  });
});

describe("CircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function breakerFor(overrides: Partial<CircuitBreakerConfig> = {}) {
    return new CircuitBreaker({
      name: "whisper:session-a",
      failureThreshold: 3,
      successThreshold: 2,
      openDurationMs: 1000,
      ...overrides,
    });
  }

  it("should open after consecutive failures and refuse calls", () => {
    const breaker = breakerFor();

    trip(breaker, 2);
    expect(breaker.currentState).toBe(CircuitState.CLOSED);
    breaker.recordFailure();

    expect(breaker.currentState).toBe(CircuitState.OPEN);
    expect(breaker.canExecute()).toBe(false);
    expect(breaker.stats).toMatchObject({ consecutiveFailures: 3, totalCalls: 3, totalFailures: 3 });
  });

  it("should only count consecutive failures", () => {
    const breaker = breakerFor();

    trip(breaker, 2);
    breaker.recordSuccess();
    trip(breaker, 2);

    expect(breaker.currentState).toBe(CircuitState.CLOSED);
  });

  it("should admit a single trial call once the open period has passed", () => {
    const breaker = breakerFor();
    trip(breaker, 3);

    vi.advanceTimersByTime(999);
    expect(breaker.canExecute()).toBe(false);
    vi.advanceTimersByTime(1);

    expect(breaker.currentState).toBe(CircuitState.HALF_OPEN);
    expect(breaker.canExecute()).toBe(true);
    expect(breaker.canExecute()).toBe(false);
  });

  it("should close after enough successful trial calls", () => {
    const breaker = breakerFor();
    trip(breaker, 3);
    vi.advanceTimersByTime(1000);

    expect(breaker.canExecute()).toBe(true);
    breaker.recordSuccess();
    expect(breaker.currentState).toBe(CircuitState.HALF_OPEN);

    expect(breaker.canExecute()).toBe(true);
    breaker.recordSuccess();
    expect(breaker.currentState).toBe(CircuitState.CLOSED);
  });

  it("should reopen when a trial call fails", () => {
    const breaker = breakerFor();
    trip(breaker, 3);
    vi.advanceTimersByTime(1000);

    breaker.canExecute();
    breaker.recordFailure();

    expect(breaker.currentState).toBe(CircuitState.OPEN);
    expect(breaker.canExecute()).toBe(false);
  });

  it("should report each state change", () => {
    const changes: string[] = [];
    const breaker = breakerFor({
      successThreshold: 1,
      onStateChange: (from, to) => changes.push(`${from}->${to}`),
    });

    trip(breaker, 3);
    vi.advanceTimersByTime(1000);
    breaker.canExecute();
    breaker.recordSuccess();

    expect(changes).toEqual(["closed->open", "open->half-open", "half-open->closed"]);
  });

  it("should refuse calls through execute with CircuitOpenError", async () => {
    const breaker = breakerFor({ failureThreshold: 1 });
    const backend = vi.fn().mockRejectedValue(new Error("speaker service down"));

    await expect(breaker.execute(backend)).rejects.toThrow("speaker service down");
    const refused = breaker.execute(backend);

    await expect(refused).rejects.toBeInstanceOf(CircuitOpenError);
    await expect(refused).rejects.toThrow("Circuit 'whisper:session-a' is open after 1 consecutive failure(s)");
    expect(backend).toHaveBeenCalledTimes(1);
  });

  it("should return to closed on reset", () => {
    const breaker = breakerFor();
    trip(breaker, 3);

    breaker.reset();

    expect(breaker.currentState).toBe(CircuitState.CLOSED);
    expect(breaker.stats.consecutiveFailures).toBe(0);
    expect(breaker.canExecute()).toBe(true);
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should pass the attempt number and stop at the first success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new HttpError("busy", 503)).mockResolvedValue("transcript");

    const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 100, random: midpoint });
    await vi.advanceTimersByTimeAsync(100);

    await expect(promise).resolves.toBe("transcript");
    expect(fn.mock.calls).toEqual([[0], [1]]);
  });

  it("should give up after maxRetries and rethrow the last error", async () => {
    const fn = vi.fn().mockRejectedValue(new HttpError("busy", 503));

    const promise = withRetry(fn, { maxRetries: 2, baseDelayMs: 100, random: midpoint });
    const assertion = expect(promise).rejects.toThrow("busy");
    await vi.advanceTimersByTimeAsync(300);

    await assertion;
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should rethrow a permanent error without waiting", async () => {
    const fn = vi.fn().mockRejectedValue(new HttpError("unsupported audio", 415));

    await expect(withRetry(fn, { maxRetries: 3 })).rejects.toThrow("unsupported audio");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should report each retry with its delay", async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new HttpError("busy", 503))
      .mockRejectedValueOnce(new HttpError("busy", 503))
      .mockResolvedValue("ok");

    const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 100, random: midpoint, onRetry });
    await vi.advanceTimersByTimeAsync(300);
    await promise;

    expect(onRetry.mock.calls.map(([attempt, delayMs]) => [attempt, delayMs])).toEqual([
      [1, 100],
      [2, 200],
    ]);
  });

  it("should honour a custom retryOn predicate", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValue("ok");

    const promise = withRetry(fn, {
      maxRetries: 1,
      baseDelayMs: 10,
      random: midpoint,
      retryOn: (error) => error instanceof Error && error.message === "flaky",
    });
    await vi.advanceTimersByTimeAsync(10);

    await expect(promise).resolves.toBe("ok");
  });

  it("should stop waiting when the segment is cancelled", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(new HttpError("busy", 503));

    const promise = withRetry(fn, { maxRetries: 5, baseDelayMs: 1000, random: midpoint, signal: controller.signal });
    const assertion = expect(promise).rejects.toEqual(new RetryAbortedError(1));
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();

    await assertion;
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should not call fn when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue("never");

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBeInstanceOf(RetryAbortedError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("withReliability", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should count one breaker failure per exhausted segment", async () => {
    const breaker = new CircuitBreaker({ name: "stt", failureThreshold: 2, successThreshold: 1, openDurationMs: 1000 });
    const fn = vi.fn().mockRejectedValue(new HttpError("busy", 503));

    for (let segment = 0; segment < 2; segment++) {
      const promise = withReliability(fn, breaker, { maxRetries: 1, baseDelayMs: 50, random: midpoint });
      const assertion = expect(promise).rejects.toThrow("busy");
      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    }

    expect(fn).toHaveBeenCalledTimes(4);
    expect(breaker.currentState).toBe(CircuitState.OPEN);
    await expect(withReliability(fn, breaker)).rejects.toBeInstanceOf(CircuitOpenError);
  });
});

describe("circuit breaker registry", () => {
  afterEach(() => {
    resetAllCircuitBreakers();
  });

  it("should share a named breaker", () => {
    const first = getCircuitBreaker("summarizer-test", { failureThreshold: 1 });

    expect(getCircuitBreaker("summarizer-test")).toBe(first);
    expect(getAllCircuitBreakers().get("summarizer-test")).toBe(first);
  });

  it("should release a registered breaker only while it is still the holder", () => {
    const older = new CircuitBreaker({ name: "TranscriptionWorker:session-r" });
    const newer = new CircuitBreaker({ name: "TranscriptionWorker:session-r" });

    const releaseOlder = registerCircuitBreaker(older);
    const releaseNewer = registerCircuitBreaker(newer);
    releaseOlder();
    expect(getAllCircuitBreakers().get("TranscriptionWorker:session-r")).toBe(newer);

    releaseNewer();
    expect(getAllCircuitBreakers().has("TranscriptionWorker:session-r")).toBe(false);
  });

  it("should reset every registered breaker", () => {
    const breaker = getCircuitBreaker("registry-reset", { failureThreshold: 1 });
    breaker.recordFailure();

    resetAllCircuitBreakers();

    expect(breaker.currentState).toBe(CircuitState.CLOSED);
  });
});
