/**
 * Sliding-window rate limiter.
 *
 * Keeps, per target, the timestamps of admitted calls within the closed
 * window `[now - window, now]`. Older timestamps are pruned lazily on each admission check, and the
 * check and the append happen in the same critical section.
 *
 * ```
 * window = 1000ms, maxRequests = 3
 *
 *   t=0    t=200  t=400  t=600       t=1001
 *    ✓      ✓      ✓      ✗            ✓   ← t=0 left the window
 * ```
 *
 * @module infrastructure/resilience/RateLimitPolicy
 */

import { RateLimitExceededError } from '../../domain/exceptions';
import type { ResilientRequest } from '../../domain/request';
import type {
  CallContext,
  CallHandler,
  LayerDependencies,
  RateLimitOptions,
} from './IResiliencePolicy';
import { KeyedStateStore } from './KeyedStateStore';
import { PolicyLayerBase } from './PolicyLayerBase';

interface RateWindow {
  /** Admission times, oldest first */
  timestamps: number[];
}

export class RateLimitPolicy<TRequest extends ResilientRequest, TResponse> extends PolicyLayerBase<
  TRequest,
  TResponse
> {
  readonly type = 'rateLimit' as const;

  private readonly windows = new KeyedStateStore<RateWindow>(() => ({ timestamps: [] }));

  constructor(
    inner: CallHandler<TRequest, TResponse>,
    private readonly options: RateLimitOptions,
    dependencies: LayerDependencies = {},
  ) {
    super('rateLimit', inner, dependencies);
  }

  protected async execute(request: TRequest, context: CallContext): Promise<TResponse> {
    const retryAfter = this.tryAdmit(request.target);

    if (retryAfter !== undefined) {
      this.emit('rateLimit.rejected', { target: request.target, retryAfter });
      throw new RateLimitExceededError(request.target, retryAfter);
    }

    return this.inner.call(request, context);
  }

  /**
   * Number of admissions for `target` inside the current window.
   */
  getUsage(target: string): number {
    const cutoff = this.clock.now() - this.options.window;
    return this.windows.peek(target, (window) => window.timestamps.filter((t) => t >= cutoff).length) ?? 0;
  }

  protected override resetState(): void {
    this.windows.clear();
  }

  /**
   * @returns `undefined` when admitted, otherwise milliseconds until a slot frees up
   */
  private tryAdmit(target: string): number | undefined {
    const now = this.clock.now();
    const cutoff = now - this.options.window;

    return this.windows.update(target, (window) => {
      const firstLive = window.timestamps.findIndex((t) => t >= cutoff);
      if (firstLive === -1) {
        window.timestamps = [];
      } else if (firstLive > 0) {
        window.timestamps.splice(0, firstLive);
      }

      if (window.timestamps.length >= this.options.maxRequests) {
        // The oldest admission stays live up to and including oldest + window
        return window.timestamps[0] + this.options.window - now + 1;
      }

      window.timestamps.push(now);
      return undefined;
    });
  }
}
