export { logger, type Logger } from './logger.js';
export * from './errors.js';
export * from './model-types.js';
export { ModelRouter } from './model-router.js';
export { loadModelConfig, createDefaultConfig } from './model-config.js';
export { getTracer, withSpan } from './tracing.js';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
