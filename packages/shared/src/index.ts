export { logger, REDACTED_PATHS, type Logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
export {
  CircuitBreaker,
  CircuitOpenError,
  type CircuitBreakerOptions,
  type CircuitState,
} from './circuit-breaker.js';
export { features, createFeatures, toEnvKey, type Features, type FeatureFlag, type RelaypostMode } from './features.js';
export { delay, retry, type Task, type RetryOptions } from './task.js';
