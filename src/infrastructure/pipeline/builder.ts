/**
 * @fileoverview Policy Stack Builder - Layer Composition
 *
 * @module infrastructure/pipeline
 *
 * ## Architectural Responsibility
 *
 * This module **composes policy layers** around an invoker. A stack is an
 * ordered chain where each layer holds the next one and exposes the same
 * `call` signature:
 *
 * ```
 * stack.call(req)
 *   → RateLimit.call(req)
 *     → CircuitBreaker.call(req)
 *       → Retry.call(req)
 *         → Cache.call(req)
 *           → Invoker.call(req)
 * ```
 *
 * ## Order Matters
 *
 * Layers are wired exactly in the order given, outermost first. The builder
 * does not reorder anything; it only rejects orders that name a layer twice,
 * name a layer that was not configured, or leave a configured layer out.
 *
 * - **Cache outermost**: hits skip rate limiting and the breaker entirely.
 * - **Retry inside the breaker**: one logical call counts once against the
 *   breaker, after all its attempts.
 * - **Retry outside the breaker**: every attempt is checked and counted by
 *   the breaker, and the breaker's `CircuitOpenError` stops the retry loop.
 *
 * Without an explicit `order(...)` the layers are wired in the order their
 * methods were called.
 *
 * @example
 * ```typescript
 * const stack = new PolicyStackBuilder<UserRequest, User>({ logger: consoleLogger })
 *   .rateLimit({ maxRequests: 100, window: 60_000 })
 *   .circuitBreaker({ failureThreshold: 5, resetTimeout: 30_000 })
 *   .retry({ maxAttempts: 3, backoff: new ExponentialBackoff({ baseDelay: 200, maxDelay: 5_000 }) })
 *   .cache({ ttl: 10_000, maxEntries: 500 })
 *   .build(fetchUser);
 * ```
 */

import { ConfigurationError } from '../../domain/exceptions';
import type { ResilienceError } from '../../domain/exceptions';
import type { Invoker, ResilientRequest } from '../../domain/request';
import { createEventLogger, noopLogger } from '../../application/logging';
import type { ILogger } from '../../application/logging';
import { CachePolicy } from '../resilience/CachePolicy';
import { CircuitBreakerPolicy } from '../resilience/CircuitBreakerPolicy';
import { InvokerLayer } from '../resilience/InvokerLayer';
import type {
  CachePolicyOptions,
  CallHandler,
  CircuitBreakerOptions,
  LayerDependencies,
  LayerName,
  PolicyEvent,
  PolicyEventListener,
  RateLimitOptions,
  RetryPolicyOptions,
} from '../resilience/IResiliencePolicy';
import { RateLimitPolicy } from '../resilience/RateLimitPolicy';
import { RetryPolicy } from '../resilience/RetryPolicy';
import type { Clock, Sleeper } from '../time';
import { PolicyStack } from './PolicyStack';
import type { LayerMap } from './PolicyStack';
import {
  attemptTimeoutSchema,
  cacheSettingsSchema,
  circuitBreakerSettingsSchema,
  collectIssues,
  isLayerName,
  maxAttemptsSchema,
  rateLimitSettingsSchema,
  validateLayerOrder,
} from './validation';

/**
 * Collaborators injected into every layer of a stack.
 */
export interface StackDependencies {
  /** Time source for windows, TTLs and reset timeouts */
  clock?: Clock;

  /** Wait used between retry attempts */
  sleep?: Sleeper;

  /** Receives policy events at debug level, warnings for rejections */
  logger?: ILogger;

  /** Additional event listeners. A listener that throws is logged and skipped */
  listeners?: PolicyEventListener[];
}

interface LayerSpecs<TResponse> {
  cache?: CachePolicyOptions<TResponse>;
  rateLimit?: RateLimitOptions;
  circuitBreaker?: CircuitBreakerOptions;
  retry?: RetryPolicyOptions;
}

/**
 * Fluent builder for policy stacks.
 *
 * @template TRequest - Request type routed through the stack
 * @template TResponse - Response type produced by the invoker
 */
export class PolicyStackBuilder<TRequest extends ResilientRequest, TResponse> {
  private readonly specs: LayerSpecs<TResponse> = {};
  private readonly added: LayerName[] = [];
  private readonly issues: string[] = [];
  private explicitOrder?: string[];
  private attemptTimeoutMs?: number;
  private classifier?: (error: unknown) => ResilienceError;
  private readonly listeners: PolicyEventListener[];

  constructor(private readonly dependencies: StackDependencies = {}) {
    this.listeners = [...(dependencies.listeners ?? [])];
  }

  /**
   * Add a response cache layer.
   */
  cache(options: CachePolicyOptions<TResponse>): this {
    this.issues.push(
      ...collectIssues(cacheSettingsSchema, { ttl: options.ttl, maxEntries: options.maxEntries }, 'cache'),
    );
    return this.add('cache', options);
  }

  /**
   * Add a per-target sliding-window rate limiter.
   */
  rateLimit(options: RateLimitOptions): this {
    this.issues.push(
      ...collectIssues(
        rateLimitSettingsSchema,
        { maxRequests: options.maxRequests, window: options.window },
        'rateLimit',
      ),
    );
    return this.add('rateLimit', options);
  }

  /**
   * Add a per-target circuit breaker.
   */
  circuitBreaker(options: CircuitBreakerOptions): this {
    this.issues.push(
      ...collectIssues(
        circuitBreakerSettingsSchema,
        { failureThreshold: options.failureThreshold, resetTimeout: options.resetTimeout },
        'circuitBreaker',
      ),
    );
    return this.add('circuitBreaker', options);
  }

  /**
   * Add a retry loop.
   */
  retry(options: RetryPolicyOptions): this {
    this.issues.push(...collectIssues(maxAttemptsSchema, options.maxAttempts, 'retry.maxAttempts'));
    return this.add('retry', options);
  }

  /**
   * Wire the configured layers in this order (outermost first) instead of
   * the order they were added.
   */
  order(...names: string[]): this {
    this.explicitOrder = names;
    return this;
  }

  /**
   * Default time budget for each invoker attempt.
   */
  attemptTimeout(ms: number): this {
    this.issues.push(...collectIssues(attemptTimeoutSchema, ms, 'attemptTimeout'));
    this.attemptTimeoutMs = ms;
    return this;
  }

  /**
   * Map unknown invoker errors to `TransientError` / `PermanentError`.
   */
  classifyErrors(classifier: (error: unknown) => ResilienceError): this {
    this.classifier = classifier;
    return this;
  }

  /**
   * Subscribe to policy events from every layer.
   */
  onEvent(listener: PolicyEventListener): this {
    this.listeners.push(listener);
    return this;
  }

  /**
   * Validate the configuration and wire the stack around `invoker`.
   *
   * @throws {ConfigurationError} Listing every problem found; no stack is
   *   returned
   */
  build(invoker: Invoker<TRequest, TResponse>): PolicyStack<TRequest, TResponse> {
    const order: readonly string[] = this.explicitOrder ?? this.added;
    const issues = [...this.issues, ...validateLayerOrder(order, new Set(this.added))];
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid policy stack configuration', issues);
    }

    const layerDependencies: LayerDependencies = {
      clock: this.dependencies.clock,
      onEvent: this.createEventSink(),
    };

    const invokerLayer = new InvokerLayer<TRequest, TResponse>(
      invoker,
      { attemptTimeout: this.attemptTimeoutMs, classifyError: this.classifier },
      layerDependencies,
    );

    const layers: Partial<LayerMap<TRequest, TResponse>> = {};
    const wiredOrder = order.filter(isLayerName);

    let handler: CallHandler<TRequest, TResponse> = invokerLayer;
    for (const name of [...wiredOrder].reverse()) {
      handler = this.createLayer(name, handler, layerDependencies, layers);
    }

    return new PolicyStack(handler, layers, invokerLayer, wiredOrder);
  }

  private add<TName extends LayerName>(name: TName, options: LayerSpecs<TResponse>[TName]): this {
    if (this.added.includes(name)) {
      this.issues.push(`${name}: configured more than once`);
      return this;
    }
    this.specs[name] = options;
    this.added.push(name);
    return this;
  }

  private createLayer(
    name: LayerName,
    inner: CallHandler<TRequest, TResponse>,
    dependencies: LayerDependencies,
    layers: Partial<LayerMap<TRequest, TResponse>>,
  ): CallHandler<TRequest, TResponse> {
    switch (name) {
      case 'cache': {
        const layer = new CachePolicy(inner, this.require(this.specs.cache, name), dependencies);
        layers.cache = layer;
        return layer;
      }
      case 'rateLimit': {
        const layer = new RateLimitPolicy(inner, this.require(this.specs.rateLimit, name), dependencies);
        layers.rateLimit = layer;
        return layer;
      }
      case 'circuitBreaker': {
        const layer = new CircuitBreakerPolicy(inner, this.require(this.specs.circuitBreaker, name), dependencies);
        layers.circuitBreaker = layer;
        return layer;
      }
      case 'retry': {
        const layer = new RetryPolicy(inner, this.require(this.specs.retry, name), {
          ...dependencies,
          sleep: this.dependencies.sleep,
        });
        layers.retry = layer;
        return layer;
      }
    }
  }

  private require<TOptions>(options: TOptions | undefined, name: LayerName): TOptions {
    if (options === undefined) {
      throw new ConfigurationError(`Layer "${name}" is ordered but not configured`);
    }
    return options;
  }

  private createEventSink(): PolicyEventListener {
    const logger = this.dependencies.logger ?? noopLogger;
    const listeners = [createEventLogger(logger), ...this.listeners];
    return (event: PolicyEvent) => {
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          // Listener failures must not replace a call's response or error
          logger.error(`Policy event listener failed on ${event.type}`, error);
        }
      }
    };
  }
}

/**
 * Create a new policy stack builder.
 *
 * @example
 * ```typescript
 * const stack = createPolicyStackBuilder<Req, Res>()
 *   .circuitBreaker({ failureThreshold: 3, resetTimeout: 10_000 })
 *   .retry({ maxAttempts: 3, backoff: new FixedBackoff(100) })
 *   .build(invoker);
 * ```
 */
export function createPolicyStackBuilder<TRequest extends ResilientRequest, TResponse>(
  dependencies: StackDependencies = {},
): PolicyStackBuilder<TRequest, TResponse> {
  return new PolicyStackBuilder<TRequest, TResponse>(dependencies);
}
