/**
 * Reliability Utilities
 *
 * Retry and circuit breaker wrappers for the directory and remote store calls.
 */

export {
  CircuitState,
  CircuitBreaker,
  CircuitOpenError,
  type CallWrapper,
  type RetryConfig,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  withRetry,
  withCircuitBreaker,
  withReliability,
  createReliableCall,
  wrapRedcap,
  wrapFirestore,
  isRetryableError,
  is429Error,
  is5xxError,
  statusOf,
} from './client_wrap';
