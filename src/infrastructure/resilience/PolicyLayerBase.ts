/**
 * Base class for policy layers.
 *
 * Holds the reference to the next layer, the time source and the event sink,
 * and records statistics around every call. Subclasses implement `execute`
 * and, when they own mutable state, `resetState`.
 *
 * @module infrastructure/resilience/PolicyLayerBase
 */

import type { ResilientRequest } from '../../domain/request';
import { systemClock } from '../time';
import type { Clock } from '../time';
import type {
  CallContext,
  CallHandler,
  IPolicyLayer,
  LayerDependencies,
  PolicyEvent,
  PolicyEventListener,
  PolicyEventType,
  PolicyStats,
  PolicyType,
} from './IResiliencePolicy';
import { PolicyStatsCollector } from './PolicyStatsCollector';

export abstract class PolicyLayerBase<TRequest extends ResilientRequest, TResponse>
  implements IPolicyLayer<TRequest, TResponse>
{
  abstract readonly type: PolicyType;

  protected readonly clock: Clock;
  protected readonly stats: PolicyStatsCollector;
  private readonly listener?: PolicyEventListener;

  constructor(
    readonly name: string,
    protected readonly inner: CallHandler<TRequest, TResponse>,
    dependencies: LayerDependencies = {},
  ) {
    this.clock = dependencies.clock ?? systemClock;
    this.listener = dependencies.onEvent;
    this.stats = new PolicyStatsCollector(this.clock);
  }

  async call(request: TRequest, context: CallContext): Promise<TResponse> {
    const startedAt = this.clock.now();
    try {
      const response = await this.execute(request, context);
      this.stats.recordSuccess(this.clock.now() - startedAt);
      return response;
    } catch (error) {
      this.stats.recordError(error, this.clock.now() - startedAt);
      throw error;
    }
  }

  getStats(): PolicyStats {
    return this.stats.snapshot();
  }

  reset(): void {
    this.stats.reset();
    this.resetState();
  }

  protected abstract execute(request: TRequest, context: CallContext): Promise<TResponse>;

  protected resetState(): void {}

  protected emit(type: PolicyEventType, data?: PolicyEvent['data']): void {
    this.listener?.({
      type,
      policyName: this.name,
      policyType: this.type,
      timestamp: new Date(this.clock.now()),
      data,
    });
  }
}
