export {
  CircuitState,
  CircuitBreaker,
  CircuitOpenError,
  RetryAbortedError,
  type RetryConfig,
  type RetryReason,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  calculateBackoff,
  withRetry,
  withReliability,
  getCircuitBreaker,
  registerCircuitBreaker,
  getAllCircuitBreakers,
  resetAllCircuitBreakers,
  isRetryableError,
  retryReason,
} from "./client_wrap";
