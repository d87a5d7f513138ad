/**
 * Resilience Policy Interfaces
 *
 * Abstractions shared by the cache, rate limit, circuit breaker and retry
 * layers. Every layer exposes the same `call` signature as the layer it
 * wraps, so a stack is a chain of decorators over one invoker:
 *
 * ```
 * caller → [rateLimit] → [circuitBreaker] → [retry] → [cache] → invoker
 * ```
 *
 * @module infrastructure/resilience/IResiliencePolicy
 * @see {@link https://learn.microsoft.com/en-us/azure/architecture/patterns/circuit-breaker | Circuit Breaker Pattern}
 */

import type { ResilientRequest } from '../../domain/request';
import type { Clock } from '../time';

/**
 * Circuit breaker states.
 */
export enum CircuitState {
  /** Circuit is closed, requests flow normally */
  Closed = 'CLOSED',
  /** Circuit is open, requests are rejected immediately */
  Open = 'OPEN',
  /** Circuit is testing, a single probe is allowed */
  HalfOpen = 'HALF_OPEN',
}

/**
 * Policy type enumeration.
 */
export type PolicyType = 'cache' | 'rateLimit' | 'circuitBreaker' | 'retry' | 'invoker';

/**
 * Names of the layers a caller can place in a stack.
 */
export type LayerName = Exclude<PolicyType, 'invoker'>;

export const LAYER_NAMES: readonly LayerName[] = ['cache', 'rateLimit', 'circuitBreaker', 'retry'];

/**
 * Recommended order (outermost first) when the caller does not give one.
 */
export const DEFAULT_LAYER_ORDER: readonly LayerName[] = ['rateLimit', 'circuitBreaker', 'retry', 'cache'];

/**
 * State that travels with one attempt through the layers.
 *
 * The retry layer derives a fresh context per attempt; every other layer
 * passes it through untouched.
 */
export interface CallContext {
  /** Identifier shared by every attempt of one logical call */
  readonly executionId: string;

  /** Current attempt number (1-indexed) */
  readonly attempt: number;

  /** Caller cancellation */
  readonly signal?: AbortSignal;

  /** Per-attempt time budget in milliseconds */
  readonly timeout?: number;
}

/**
 * Uniform call surface implemented by every layer and by the invoker
 * adapter.
 */
export interface CallHandler<TRequest extends ResilientRequest, TResponse> {
  call(request: TRequest, context: CallContext): Promise<TResponse>;
}

/**
 * A single policy layer in a stack.
 *
 * @template TRequest - Request type
 * @template TResponse - Response type
 */
export interface IPolicyLayer<TRequest extends ResilientRequest, TResponse>
  extends CallHandler<TRequest, TResponse> {
  /**
   * Name of this layer for identification and logging.
   */
  readonly name: string;

  /**
   * Type of the layer.
   */
  readonly type: PolicyType;

  /**
   * Snapshot of execution statistics.
   */
  getStats(): PolicyStats;

  /**
   * Drop all mutable state (cache entries, windows, breaker states) and
   * statistics.
   */
  reset(): void;
}

/**
 * Policy execution statistics.
 *
 * @example
 * ```typescript
 * const stats = stack.getLayer('circuitBreaker')?.getStats();
 * console.log('Success rate:', stats.successCount / stats.totalExecutions);
 * ```
 */
export interface PolicyStats {
  /**
   * Total number of executions.
   */
  totalExecutions: number;

  /**
   * Number of successful executions.
   */
  successCount: number;

  /**
   * Number of failed executions.
   */
  failureCount: number;

  /**
   * Number of executions this layer refused to admit.
   */
  rejectedCount: number;

  /**
   * Number of attempts that timed out.
   */
  timeoutCount: number;

  /**
   * Average execution time in milliseconds.
   */
  averageExecutionTime: number;

  /**
   * 95th percentile execution time.
   */
  p95ExecutionTime: number;

  /**
   * 99th percentile execution time.
   */
  p99ExecutionTime: number;

  /**
   * Circuit state per target (circuit breaker only).
   */
  circuitStates?: Record<string, CircuitState>;

  /**
   * Hit/miss counters (cache only).
   */
  cache?: {
    hits: number;
    misses: number;
    size: number;
    hitRate: number;
  };

  /**
   * Last execution timestamp.
   */
  lastExecutionTime?: Date;

  /**
   * Start of the window these stats cover.
   */
  windowStart: Date;
}

/**
 * Policy event types for monitoring and logging.
 */
export type PolicyEventType =
  | 'execution.success'
  | 'execution.failure'
  | 'cache.hit'
  | 'cache.miss'
  | 'cache.evicted'
  | 'rateLimit.rejected'
  | 'circuit.open'
  | 'circuit.close'
  | 'circuit.halfOpen'
  | 'circuit.rejected'
  | 'retry.attempt'
  | 'retry.exhausted'
  | 'timeout.triggered';

/**
 * Policy event for monitoring.
 */
export interface PolicyEvent {
  /**
   * Event type.
   */
  type: PolicyEventType;

  /**
   * Layer that emitted the event.
   */
  policyName: string;

  /**
   * Layer type.
   */
  policyType: PolicyType;

  /**
   * Event timestamp.
   */
  timestamp: Date;

  /**
   * Event-specific data.
   */
  data?: {
    target?: string;
    cacheKey?: string;
    error?: Error;
    attemptNumber?: number;
    delay?: number;
    circuitState?: CircuitState;
    [key: string]: unknown;
  };
}

/**
 * Policy event listener function type.
 */
export type PolicyEventListener = (event: PolicyEvent) => void;

/**
 * Collaborators every layer may receive from the composer.
 */
export interface LayerDependencies {
  /** Time source, defaults to the system clock */
  clock?: Clock;

  /** Event sink, defaults to discarding events. Must not throw */
  onEvent?: PolicyEventListener;
}

/**
 * Computes the wait before a retry. Pure: no side effects, no I/O.
 *
 * @example
 * ```typescript
 * const backoff: IBackoffStrategy = new ExponentialBackoff({ baseDelay: 100, maxDelay: 2000 });
 * backoff.delay(0); // 100..110
 * backoff.delay(3); // 800..880
 * ```
 */
export interface IBackoffStrategy {
  /**
   * @param attempt - Zero-based retry index (0 before the first retry)
   * @returns Delay in milliseconds
   */
  delay(attempt: number): number;
}

/**
 * Cache layer options.
 */
export interface CachePolicyOptions<TResponse> {
  /**
   * Entry lifetime in milliseconds.
   */
  ttl: number;

  /**
   * Upper bound on stored entries; the entry expiring soonest is evicted
   * first. Unbounded when omitted.
   */
  maxEntries?: number;

  /**
   * Applied to a cached value before it is handed out.
   * @defaultValue identity
   */
  clone?: (value: TResponse) => TResponse;
}

/**
 * Rate limit options.
 *
 * @example
 * ```typescript
 * const options: RateLimitOptions = {
 *   maxRequests: 100,
 *   window: 60_000, // 100 requests per minute per target
 * };
 * ```
 */
export interface RateLimitOptions {
  /**
   * Maximum admissions per target within the window.
   */
  maxRequests: number;

  /**
   * Sliding window length in milliseconds.
   */
  window: number;
}

/**
 * Circuit breaker options.
 *
 * @example
 * ```typescript
 * const options: CircuitBreakerOptions = {
 *   failureThreshold: 5,
 *   resetTimeout: 30_000,
 * };
 * ```
 */
export interface CircuitBreakerOptions {
  /**
   * Consecutive failures that open the circuit.
   */
  failureThreshold: number;

  /**
   * Time the circuit stays open before a probe is admitted, in milliseconds.
   */
  resetTimeout: number;

  /**
   * Decides which errors count against the target.
   * @defaultValue transient errors only
   */
  isFailure?: (error: unknown) => boolean;
}

/**
 * Retry options.
 */
export interface RetryPolicyOptions {
  /**
   * Maximum number of attempts (including the initial attempt).
   */
  maxAttempts: number;

  /**
   * Delay sequence between attempts.
   */
  backoff: IBackoffStrategy;
}
