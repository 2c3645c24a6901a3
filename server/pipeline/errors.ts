/**
 * Pipeline error taxonomy.
 *
 * Only FatalConnectorError and EmptySessionError ever reach a caller. The rest
 * are classified at the worker boundary and turned into degraded results.
 */

export class TransientBackendError extends Error {
  constructor(
    message: string,
    public readonly backend: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransientBackendError";
  }
}

export class ExhaustedRetryError extends Error {
  constructor(
    public readonly backend: string,
    public readonly segmentId: number,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`${backend} gave up on segment ${segmentId} after ${attempts} attempt(s)`, options);
    this.name = "ExhaustedRetryError";
  }
}

export class CancelledError extends Error {
  constructor(public readonly backend: string, public readonly segmentId: number) {
    super(`${backend} call for segment ${segmentId} was cancelled`);
    this.name = "CancelledError";
  }
}

export class FatalConnectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalConnectorError";
  }
}

export class EmptySessionError extends Error {
  constructor(
    public readonly sessionId: string,
    options?: { cause?: unknown }
  ) {
    super(`Session ${sessionId} ended before any audio segment was captured`, options);
    this.name = "EmptySessionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
