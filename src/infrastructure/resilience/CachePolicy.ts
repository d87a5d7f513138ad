/**
 * Response cache layer.
 *
 * A live entry for `request.cacheKey` is returned without touching any inner
 * layer. Only successful responses are stored; failures always propagate and
 * never overwrite an entry.
 *
 * Only place this layer in front of idempotent calls.
 *
 * @module infrastructure/resilience/CachePolicy
 */

import type { ResilientRequest } from '../../domain/request';
import { CacheManager } from '../cache';
import type {
  CachePolicyOptions,
  CallContext,
  CallHandler,
  LayerDependencies,
  PolicyStats,
} from './IResiliencePolicy';
import { PolicyLayerBase } from './PolicyLayerBase';

export class CachePolicy<TRequest extends ResilientRequest, TResponse> extends PolicyLayerBase<
  TRequest,
  TResponse
> {
  readonly type = 'cache' as const;

  private readonly cache: CacheManager<string, TResponse>;
  private readonly clone: (value: TResponse) => TResponse;

  constructor(
    inner: CallHandler<TRequest, TResponse>,
    private readonly options: CachePolicyOptions<TResponse>,
    dependencies: LayerDependencies = {},
  ) {
    super('cache', inner, dependencies);
    this.clone = options.clone ?? ((value) => value);
    this.cache = new CacheManager<string, TResponse>(
      { capacity: options.maxEntries, clock: this.clock },
      (cacheKey) => this.emit('cache.evicted', { cacheKey }),
    );
  }

  protected async execute(request: TRequest, context: CallContext): Promise<TResponse> {
    const entry = this.cache.getEntry(request.cacheKey);
    if (entry) {
      this.emit('cache.hit', { cacheKey: request.cacheKey, target: request.target });
      return this.clone(entry.value);
    }

    this.emit('cache.miss', { cacheKey: request.cacheKey, target: request.target });
    const response = await this.inner.call(request, context);
    this.cache.set(request.cacheKey, response, this.options.ttl);
    return this.clone(response);
  }

  /**
   * Drop the entry for one key.
   */
  invalidate(cacheKey: string): boolean {
    return this.cache.delete(cacheKey);
  }

  /**
   * Remove expired entries eagerly.
   */
  prune(): number {
    return this.cache.prune();
  }

  get size(): number {
    return this.cache.size;
  }

  override getStats(): PolicyStats {
    const { hits, misses, size, hitRate } = this.cache.stats();
    return { ...super.getStats(), cache: { hits, misses, size, hitRate } };
  }

  protected override resetState(): void {
    this.cache.clear();
  }
}
