/**
 * @fileoverview Resilience Pattern Exports
 * @description
 * Policy layers that wrap an outbound call:
 *
 * - **Cache**: memoize successful responses per request key
 * - **Rate Limit**: bound call frequency per target over a sliding window
 * - **Circuit Breaker**: fail fast while a target is unhealthy
 * - **Retry**: re-attempt transient failures with backoff
 *
 * @packageDocumentation
 * @module infrastructure/resilience
 */

export { CircuitState, LAYER_NAMES, DEFAULT_LAYER_ORDER } from './IResiliencePolicy';

export type {
  PolicyType,
  LayerName,
  CallContext,
  CallHandler,
  IPolicyLayer,
  PolicyStats,
  PolicyEvent,
  PolicyEventType,
  PolicyEventListener,
  LayerDependencies,
  IBackoffStrategy,
  CachePolicyOptions,
  RateLimitOptions,
  CircuitBreakerOptions,
  RetryPolicyOptions,
} from './IResiliencePolicy';

export { PolicyLayerBase } from './PolicyLayerBase';
export { PolicyStatsCollector } from './PolicyStatsCollector';
export { KeyedStateStore } from './KeyedStateStore';
export { CachePolicy } from './CachePolicy';
export { RateLimitPolicy } from './RateLimitPolicy';
export { CircuitBreakerPolicy } from './CircuitBreakerPolicy';
export type { CircuitSnapshot } from './CircuitBreakerPolicy';
export { RetryPolicy, FixedBackoff, ExponentialBackoff } from './RetryPolicy';
export type { ExponentialBackoffOptions, RetryDependencies } from './RetryPolicy';
export { InvokerLayer } from './InvokerLayer';
export type { InvokerLayerOptions } from './InvokerLayer';
