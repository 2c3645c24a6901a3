/**
 * Backend call guards
 *
 * Jittered exponential backoff and a circuit breaker for calls into the
 * inference backends (speech-to-text, speaker recognition, summarization).
 * Breakers live in a process-wide registry so the health endpoint can
 * report them; per-session breakers register themselves and are released
 * when their session closes.
 */

import { log } from "../../server/logger";

export enum CircuitState {
  CLOSED = "closed",
  OPEN = "open",
  HALF_OPEN = "half-open",
}

export type RetryReason = "rate_limited" | "server_error" | "timeout" | "network";

export interface RetryConfig {
  /** Retries after the first attempt; 0 means a single attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0..1, fraction of the delay randomized in either direction */
  jitterFactor: number;
  retryOn: (error: unknown) => boolean;
  /** Aborting stops waiting between attempts and rejects with RetryAbortedError */
  signal?: AbortSignal;
  random: () => number;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export interface CircuitBreakerConfig {
  name: string;
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Successful trial calls needed to close it again */
  successThreshold: number;
  openDurationMs: number;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  consecutiveFailures: number;
  trialSuccesses: number;
  lastFailureAt: number | null;
  stateSince: number;
  totalCalls: number;
  totalFailures: number;
}

const RETRY_DEFAULTS: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
  retryOn: isRetryableError,
  random: Math.random,
};

const BREAKER_DEFAULTS: CircuitBreakerConfig = {
  name: "default",
  failureThreshold: 5,
  successThreshold: 2,
  openDurationMs: 30000,
};

const TRANSIENT_MESSAGES: Array<[string, RetryReason]> = [
  ["rate limit", "rate_limited"],
  ["timeout", "timeout"],
  ["timed out", "timeout"],
  ["econnreset", "network"],
  ["econnrefused", "network"],
  ["socket hang up", "network"],
  ["network", "network"],
];

function httpStatus(error: Error): number | undefined {
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

/** Why a failed backend call is worth repeating, or null when it is not. */
export function retryReason(error: unknown): RetryReason | null {
  if (!(error instanceof Error)) return null;

  const status = httpStatus(error);
  if (status === 429) return "rate_limited";
  if (status !== undefined && status >= 500 && status < 600) return "server_error";
  if (status !== undefined) return null;

  const message = error.message.toLowerCase();
  for (const [needle, reason] of TRANSIENT_MESSAGES) {
    if (message.includes(needle)) return reason;
  }
  return null;
}

export function isRetryableError(error: unknown): boolean {
  return retryReason(error) !== null;
}

/** Delay before retry number `attempt + 1`: base * 2^attempt, capped, then jittered. */
export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor: number,
  random: () => number = Math.random
): number {
  const capped = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  const spread = capped * jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + spread));
}

export class RetryAbortedError extends Error {
  constructor(public readonly attempts: number) {
    super(`Retry aborted after ${attempts} attempt(s)`);
    this.name = "RetryAbortedError";
  }
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly stats: CircuitBreakerStats
  ) {
    super(`Circuit '${circuitName}' is open after ${stats.consecutiveFailures} consecutive failure(s)`);
    this.name = "CircuitOpenError";
  }
}

function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Closed: calls pass, consecutive failures are counted.
 * Open: calls are refused until openDurationMs has passed.
 * Half-open: one trial call at a time; a failed trial reopens the circuit.
 */
export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private state = CircuitState.CLOSED;
  private stateSince = Date.now();
  private consecutiveFailures = 0;
  private trialSuccesses = 0;
  private trialInFlight = false;
  private lastFailureAt: number | null = null;
  private totalCalls = 0;
  private totalFailures = 0;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...BREAKER_DEFAULTS, ...config };
  }

  get name(): string {
    return this.config.name;
  }

  get currentState(): CircuitState {
    if (this.state === CircuitState.OPEN && this.cooledDown()) {
      return CircuitState.HALF_OPEN;
    }
    return this.state;
  }

  get stats(): CircuitBreakerStats {
    return {
      state: this.currentState,
      consecutiveFailures: this.consecutiveFailures,
      trialSuccesses: this.trialSuccesses,
      lastFailureAt: this.lastFailureAt,
      stateSince: this.stateSince,
      totalCalls: this.totalCalls,
      totalFailures: this.totalFailures,
    };
  }

  /** Claims a slot for one call; false means the caller must not proceed. */
  canExecute(): boolean {
    if (this.state === CircuitState.OPEN) {
      if (!this.cooledDown()) return false;
      this.moveTo(CircuitState.HALF_OPEN);
    }
    if (this.state === CircuitState.CLOSED) return true;

    if (this.trialInFlight) return false;
    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.totalCalls++;
    this.trialInFlight = false;
    this.consecutiveFailures = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.trialSuccesses++;
      if (this.trialSuccesses >= this.config.successThreshold) {
        this.moveTo(CircuitState.CLOSED);
      }
    }
  }

  recordFailure(): void {
    this.totalCalls++;
    this.totalFailures++;
    this.consecutiveFailures++;
    this.lastFailureAt = Date.now();
    this.trialInFlight = false;

    const tripped =
      this.state === CircuitState.HALF_OPEN ||
      (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.config.failureThreshold);
    if (tripped) this.moveTo(CircuitState.OPEN);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitOpenError(this.name, this.stats);
    }
    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  reset(): void {
    this.moveTo(CircuitState.CLOSED);
    this.lastFailureAt = null;
  }

  private cooledDown(): boolean {
    return Date.now() - this.stateSince >= this.config.openDurationMs;
  }

  private moveTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.stateSince = Date.now();
    this.trialInFlight = false;
    this.trialSuccesses = 0;
    if (next === CircuitState.CLOSED) this.consecutiveFailures = 0;

    if (previous === next) return;
    log(`[CircuitBreaker:${this.name}] ${previous} -> ${next}`, "reliability", next === CircuitState.OPEN ? "warn" : "info");
    this.config.onStateChange?.(previous, next);
  }
}

/**
 * Calls `fn` until it succeeds, `retryOn` rejects the error, or
 * `maxRetries` retries are spent. `fn` receives the zero-based attempt.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const opts = { ...RETRY_DEFAULTS, ...config };
  const { signal } = opts;

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) throw new RetryAbortedError(attempt);

    try {
      return await fn(attempt);
    } catch (error) {
      if (signal?.aborted) throw new RetryAbortedError(attempt + 1);
      if (attempt >= opts.maxRetries || !opts.retryOn(error)) throw error;

      const delayMs = calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.jitterFactor, opts.random);
      opts.onRetry?.(attempt + 1, delayMs, error);
      log(`[withRetry] Attempt ${attempt + 1} failed (${retryReason(error) ?? "retryable"}), next in ${delayMs}ms`, "reliability", "debug");

      try {
        await pause(delayMs, signal);
      } catch {
        throw new RetryAbortedError(attempt + 1);
      }
    }
  }
}

/** Retries inside one breaker slot: a segment that exhausts its retries counts as one failure. */
export function withReliability<T>(
  fn: (attempt: number) => Promise<T>,
  breaker: CircuitBreaker,
  retryConfig: Partial<RetryConfig> = {}
): Promise<T> {
  return breaker.execute(() => withRetry(fn, retryConfig));
}

const registry = new Map<string, CircuitBreaker>();

/** Shared breaker for a process-wide backend, created on first use. */
export function getCircuitBreaker(name: string, config: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
  const existing = registry.get(name);
  if (existing) return existing;

  const breaker = new CircuitBreaker({ ...config, name });
  registry.set(name, breaker);
  return breaker;
}

/**
 * Lists a breaker owned elsewhere (a session's worker) under its name,
 * replacing any earlier holder. The returned function removes it again,
 * unless it has since been replaced.
 */
export function registerCircuitBreaker(breaker: CircuitBreaker): () => void {
  registry.set(breaker.name, breaker);
  return () => {
    if (registry.get(breaker.name) === breaker) {
      registry.delete(breaker.name);
    }
  };
}

export function getAllCircuitBreakers(): Map<string, CircuitBreaker> {
  return new Map(registry);
}

export function resetAllCircuitBreakers(): void {
  for (const breaker of registry.values()) {
    breaker.reset();
  }
}
