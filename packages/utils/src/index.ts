// Result type
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  toError,
  tryCatchAsync,
} from './result.js';

// Retry utilities
export {
  type RetryOptions,
  type RetryError,
  withRetry,
  retryPresets,
} from './retry.js';

// Timeouts
export { TimeoutError, withTimeout, isTimeoutError } from './timeout.js';

// Locking and bounded concurrency
export { Mutex } from './mutex.js';
export { type BoundedRunOptions, type BoundedRunSummary, runBounded } from './concurrency.js';

// Logger
export {
  type Logger,
  type LogLevel,
  type LogContext,
  logger,
  createLogger,
  withTiming,
} from './logger.js';

// Circuit Breaker
export {
  type CircuitState,
  type CircuitBreakerOptions,
  CircuitBreaker,
  CircuitOpenError,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
} from './circuit-breaker.js';
