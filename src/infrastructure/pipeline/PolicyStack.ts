/**
 * The assembled stack: one call surface over an ordered chain of layers.
 *
 * A stack is immutable once built and holds no per-call state; every piece of
 * mutable state lives in the layers it wraps. Build it once at startup and
 * pass it to whoever needs it.
 *
 * @module infrastructure/pipeline/PolicyStack
 */

import { v4 as uuidv4 } from 'uuid';
import type { CallOptions, ResilientRequest } from '../../domain/request';
import type { CachePolicy } from '../resilience/CachePolicy';
import type { CircuitBreakerPolicy } from '../resilience/CircuitBreakerPolicy';
import type { InvokerLayer } from '../resilience/InvokerLayer';
import type { CallHandler, LayerName, PolicyStats, PolicyType } from '../resilience/IResiliencePolicy';
import type { RateLimitPolicy } from '../resilience/RateLimitPolicy';
import type { RetryPolicy } from '../resilience/RetryPolicy';

/**
 * Concrete layer type for each layer name.
 */
export interface LayerMap<TRequest extends ResilientRequest, TResponse> {
  cache: CachePolicy<TRequest, TResponse>;
  rateLimit: RateLimitPolicy<TRequest, TResponse>;
  circuitBreaker: CircuitBreakerPolicy<TRequest, TResponse>;
  retry: RetryPolicy<TRequest, TResponse>;
}

export class PolicyStack<TRequest extends ResilientRequest, TResponse> {
  constructor(
    private readonly entry: CallHandler<TRequest, TResponse>,
    private readonly layers: Readonly<Partial<LayerMap<TRequest, TResponse>>>,
    private readonly invokerLayer: InvokerLayer<TRequest, TResponse>,
    /** Layer names, outermost first */
    readonly order: readonly LayerName[],
  ) {}

  /**
   * Issue one logical call through every layer.
   *
   * Resolves with the response or rejects with exactly one of
   * `TransientError`, `PermanentError`, `RateLimitExceededError` or
   * `CircuitOpenError` (cancellation surfaces as `OperationCancelledError`,
   * a `PermanentError`).
   *
   * @example
   * ```typescript
   * const controller = new AbortController();
   * const user = await stack.call(
   *   { cacheKey: 'GET /users/42', target: 'users-api' },
   *   { signal: controller.signal, timeout: 2000 },
   * );
   * ```
   */
  call(request: TRequest, options: CallOptions = {}): Promise<TResponse> {
    return this.entry.call(request, {
      executionId: uuidv4(),
      attempt: 1,
      signal: options.signal,
      timeout: options.timeout,
    });
  }

  /**
   * Access a layer for inspection or manual control (e.g. isolating a
   * circuit). `undefined` when the layer is not part of this stack.
   */
  getLayer<TName extends LayerName>(name: TName): LayerMap<TRequest, TResponse>[TName] | undefined {
    return this.layers[name];
  }

  /**
   * Statistics for every layer, keyed by layer type.
   */
  getStats(): Partial<Record<PolicyType, PolicyStats>> {
    const stats: Partial<Record<PolicyType, PolicyStats>> = {
      invoker: this.invokerLayer.getStats(),
    };
    for (const name of this.order) {
      stats[name] = this.layers[name]?.getStats();
    }
    return stats;
  }

  /**
   * Drop all layer state: cache entries, rate windows, circuit states and
   * statistics.
   */
  reset(): void {
    for (const name of this.order) {
      this.layers[name]?.reset();
    }
    this.invokerLayer.reset();
  }
}
