export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  type CircuitBreakerConfig,
  type CircuitEvent,
  type CircuitState,
  type CircuitStats,
} from './circuit-breaker.js';
