/**
 * Build a policy stack from a plain configuration object.
 */

import type { ResilienceError } from '../../domain/exceptions';
import type { Invoker, ResilientRequest } from '../../domain/request';
import { PolicyStackBuilder } from '../../infrastructure/pipeline/builder';
import type { StackDependencies } from '../../infrastructure/pipeline/builder';
import type { PolicyStack } from '../../infrastructure/pipeline/PolicyStack';
import { DEFAULT_LAYER_ORDER } from '../../infrastructure/resilience/IResiliencePolicy';
import type { IBackoffStrategy } from '../../infrastructure/resilience/IResiliencePolicy';
import { ExponentialBackoff, FixedBackoff } from '../../infrastructure/resilience/RetryPolicy';
import { enabledLayers, parsePolicyStackConfig } from './schema';
import type { PolicyStackConfig } from './schema';

/**
 * Hooks that cannot be expressed in a configuration object.
 */
export interface PolicyStackHooks<TResponse> extends StackDependencies {
  /** Random source for backoff jitter */
  random?: () => number;

  /** Copy applied to cached responses before they are handed out */
  clone?: (value: TResponse) => TResponse;

  /** Which errors count against a circuit */
  isFailure?: (error: unknown) => boolean;

  /** Map unknown invoker errors into the taxonomy */
  classifyError?: (error: unknown) => ResilienceError;
}

/**
 * Validate `config` and wire the enabled layers around `invoker`.
 *
 * Layers follow `config.order` when given, otherwise rate limiter →
 * circuit breaker → retry → cache → invoker, skipping disabled ones.
 *
 * @throws {ConfigurationError} When the configuration is invalid
 *
 * @example
 * ```typescript
 * const stack = createPolicyStack<ApiRequest, ApiResponse>(
 *   {
 *     cache: { enabled: true, ttl: 5_000, maxEntries: 1_000 },
 *     retry: { enabled: true, maxAttempts: 3, policy: { type: 'fixed', delay: 250 } },
 *   },
 *   (request, { signal }) => client.send(request, { signal }),
 *   { logger: consoleLogger },
 * );
 * ```
 */
export function createPolicyStack<TRequest extends ResilientRequest, TResponse>(
  config: unknown,
  invoker: Invoker<TRequest, TResponse>,
  hooks: PolicyStackHooks<TResponse> = {},
): PolicyStack<TRequest, TResponse> {
  const parsed = parsePolicyStackConfig(config);
  const enabled = enabledLayers(parsed);
  const order = parsed.order ?? DEFAULT_LAYER_ORDER.filter((name) => enabled.has(name));

  const builder = new PolicyStackBuilder<TRequest, TResponse>(hooks);

  for (const name of order) {
    switch (name) {
      case 'cache':
        if (parsed.cache?.enabled === true) {
          builder.cache({ ttl: parsed.cache.ttl, maxEntries: parsed.cache.maxEntries, clone: hooks.clone });
        }
        break;
      case 'rateLimit':
        if (parsed.rateLimit?.enabled === true) {
          builder.rateLimit({ maxRequests: parsed.rateLimit.maxRequests, window: parsed.rateLimit.window });
        }
        break;
      case 'circuitBreaker':
        if (parsed.circuitBreaker?.enabled === true) {
          builder.circuitBreaker({
            failureThreshold: parsed.circuitBreaker.failureThreshold,
            resetTimeout: parsed.circuitBreaker.resetTimeout,
            isFailure: hooks.isFailure,
          });
        }
        break;
      case 'retry':
        if (parsed.retry?.enabled === true) {
          builder.retry({
            maxAttempts: parsed.retry.maxAttempts,
            backoff: createBackoff(parsed.retry.policy, hooks.random),
          });
        }
        break;
    }
  }

  if (parsed.attemptTimeout !== undefined) {
    builder.attemptTimeout(parsed.attemptTimeout);
  }
  if (hooks.classifyError) {
    builder.classifyErrors(hooks.classifyError);
  }

  return builder.build(invoker);
}

type BackoffConfig = Extract<NonNullable<PolicyStackConfig['retry']>, { enabled: true }>['policy'];

function createBackoff(policy: BackoffConfig, random?: () => number): IBackoffStrategy {
  switch (policy.type) {
    case 'fixed':
      return new FixedBackoff(policy.delay);
    case 'exponential':
      return new ExponentialBackoff({
        baseDelay: policy.baseDelay,
        maxDelay: policy.maxDelay,
        jitterFraction: policy.jitterFraction,
        random,
      });
  }
}
