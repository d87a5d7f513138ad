/**
 * Retry with backoff.
 *
 * Two separate pieces:
 * - backoff strategies: pure `delay(attempt)` functions
 * - `RetryPolicy`: the loop that re-invokes the inner layer on
 *   `TransientError` and waits between attempts
 *
 * Only transient errors are retried. Permanent errors, rate limit and circuit
 * rejections and cancellations surface on the first occurrence. When
 * attempts run out the last transient error is rethrown as is.
 *
 * @module infrastructure/resilience/RetryPolicy
 */

import { OperationCancelledError, isRetryable } from '../../domain/exceptions';
import type { ResilientRequest } from '../../domain/request';
import { sleep } from '../time';
import type { Sleeper } from '../time';
import type {
  CallContext,
  CallHandler,
  IBackoffStrategy,
  LayerDependencies,
  RetryPolicyOptions,
} from './IResiliencePolicy';
import { PolicyLayerBase } from './PolicyLayerBase';

/**
 * Constant delay regardless of attempt.
 */
export class FixedBackoff implements IBackoffStrategy {
  constructor(private readonly interval: number) {}

  delay(_attempt: number): number {
    return this.interval;
  }
}

export interface ExponentialBackoffOptions {
  /** Delay before the first retry, in milliseconds */
  baseDelay: number;

  /** Cap applied before jitter, in milliseconds */
  maxDelay: number;

  /**
   * Upper bound of the random extra delay, as a fraction of the computed delay.
   * @defaultValue 0.1
   */
  jitterFraction?: number;

  /**
   * Uniform random source in [0, 1).
   * @defaultValue Math.random
   */
  random?: () => number;
}

/**
 * Exponential backoff with proportional jitter.
 *
 * `delay(a) = d + U[0, jitterFraction × d]` where `d = min(baseDelay × 2^a, maxDelay)`.
 *
 * | attempt | base 1s, max 10s, jitter 0.1 |
 * |---------|------------------------------|
 * | 0       | 1.0s – 1.1s                  |
 * | 1       | 2.0s – 2.2s                  |
 * | 2       | 4.0s – 4.4s                  |
 * | 3       | 8.0s – 8.8s                  |
 * | 4+      | 10s – 11s                    |
 */
export class ExponentialBackoff implements IBackoffStrategy {
  private readonly jitterFraction: number;
  private readonly random: () => number;

  constructor(private readonly options: ExponentialBackoffOptions) {
    this.jitterFraction = options.jitterFraction ?? 0.1;
    this.random = options.random ?? Math.random;
  }

  delay(attempt: number): number {
    const computed = Math.min(this.options.baseDelay * 2 ** attempt, this.options.maxDelay);
    return computed + this.random() * this.jitterFraction * computed;
  }
}

export interface RetryDependencies extends LayerDependencies {
  /** Waits between attempts; replaced in tests */
  sleep?: Sleeper;
}

export class RetryPolicy<TRequest extends ResilientRequest, TResponse> extends PolicyLayerBase<
  TRequest,
  TResponse
> {
  readonly type = 'retry' as const;

  private readonly sleep: Sleeper;

  constructor(
    inner: CallHandler<TRequest, TResponse>,
    private readonly options: RetryPolicyOptions,
    dependencies: RetryDependencies = {},
  ) {
    super('retry', inner, dependencies);
    this.sleep = dependencies.sleep ?? sleep;
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  protected async execute(request: TRequest, context: CallContext): Promise<TResponse> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.inner.call(request, { ...context, attempt });
      } catch (error) {
        if (!isRetryable(error)) {
          throw error;
        }

        if (attempt >= this.options.maxAttempts) {
          this.emit('retry.exhausted', { target: request.target, attemptNumber: attempt, error });
          throw error;
        }

        const delay = this.options.backoff.delay(attempt - 1);
        this.emit('retry.attempt', {
          target: request.target,
          attemptNumber: attempt + 1,
          delay,
          error,
        });

        try {
          await this.sleep(delay, context.signal);
        } catch (reason) {
          throw new OperationCancelledError('Operation cancelled during retry backoff', { cause: reason });
        }
      }
    }
  }
}
