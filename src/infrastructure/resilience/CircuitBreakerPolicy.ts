/**
 * Circuit breaker layer.
 *
 * One state machine per target:
 *
 * ```
 *            failures ≥ threshold
 *   CLOSED ───────────────────────▶ OPEN
 *     ▲                              │ ▲
 *     │ probe succeeds   resetTimeout │ │ probe fails
 *     │                  elapsed     ▼ │
 *     └──────────────────────── HALF_OPEN
 * ```
 *
 * The Open → HalfOpen edge is evaluated lazily when a call arrives; there is
 * no background timer. While HalfOpen exactly one probe is in flight and every
 * other call fails fast.
 *
 * Outcomes are classified as:
 * - failure: `TransientError` by default (see `isFailure`)
 * - neutral: cancellation and admission denials from inner layers; nothing
 *   is counted and a neutral probe frees the probe slot
 * - success: everything else, including `PermanentError` (the target answered)
 *
 * @module infrastructure/resilience/CircuitBreakerPolicy
 */

import {
  CircuitOpenError,
  OperationCancelledError,
  RateLimitExceededError,
  TransientError,
} from '../../domain/exceptions';
import type { ResilientRequest } from '../../domain/request';
import { CircuitState } from './IResiliencePolicy';
import type {
  CallContext,
  CallHandler,
  CircuitBreakerOptions,
  LayerDependencies,
  PolicyStats,
} from './IResiliencePolicy';
import { KeyedStateStore } from './KeyedStateStore';
import { PolicyLayerBase } from './PolicyLayerBase';

interface BreakerState {
  status: CircuitState;
  consecutiveFailures: number;
  openedAt: number;
  probeInFlight: boolean;
  /** Forced open; never half-opens until reset */
  isolated: boolean;
}

/**
 * Read-only view of one target's breaker.
 */
export interface CircuitSnapshot {
  status: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  probeInFlight: boolean;
  isolated: boolean;
}

type Admission =
  | { admitted: true; probe: boolean; transition?: CircuitState }
  | { admitted: false; retryAfter: number };

type Outcome = 'success' | 'failure' | 'neutral';

const initialState = (): BreakerState => ({
  status: CircuitState.Closed,
  consecutiveFailures: 0,
  openedAt: 0,
  probeInFlight: false,
  isolated: false,
});

export class CircuitBreakerPolicy<TRequest extends ResilientRequest, TResponse> extends PolicyLayerBase<
  TRequest,
  TResponse
> {
  readonly type = 'circuitBreaker' as const;

  private readonly states = new KeyedStateStore<BreakerState>(initialState);
  private readonly isFailure: (error: unknown) => boolean;

  constructor(
    inner: CallHandler<TRequest, TResponse>,
    private readonly options: CircuitBreakerOptions,
    dependencies: LayerDependencies = {},
  ) {
    super('circuitBreaker', inner, dependencies);
    this.isFailure = options.isFailure ?? ((error) => error instanceof TransientError);
  }

  protected async execute(request: TRequest, context: CallContext): Promise<TResponse> {
    const { target } = request;
    const admission = this.admit(target);

    if (!admission.admitted) {
      this.emit('circuit.rejected', { target, retryAfter: admission.retryAfter });
      throw new CircuitOpenError(target, admission.retryAfter);
    }
    if (admission.transition) {
      this.emitTransition(target, admission.transition);
    }

    let response: TResponse;
    try {
      response = await this.inner.call(request, context);
    } catch (error) {
      this.settle(target, admission.probe, this.classify(error), error);
      throw error;
    }

    this.settle(target, admission.probe, 'success');
    return response;
  }

  /**
   * Current status for a target. Does not apply the lazy Open → HalfOpen
   * transition.
   */
  getState(target: string): CircuitState {
    return this.states.peek(target, (state) => state.status) ?? CircuitState.Closed;
  }

  getSnapshot(target: string): CircuitSnapshot {
    return (
      this.states.peek(target, (state) => ({
        status: state.status,
        consecutiveFailures: state.consecutiveFailures,
        openedAt: state.status === CircuitState.Closed ? undefined : state.openedAt,
        probeInFlight: state.probeInFlight,
        isolated: state.isolated,
      })) ?? {
        status: CircuitState.Closed,
        consecutiveFailures: 0,
        probeInFlight: false,
        isolated: false,
      }
    );
  }

  /**
   * Milliseconds until the next probe may be admitted, or `undefined` when
   * the circuit is not waiting on its reset timeout.
   */
  getTimeUntilClose(target: string): number | undefined {
    const now = this.clock.now();
    return this.states.peek(target, (state) =>
      state.status === CircuitState.Open && !state.isolated
        ? Math.max(0, state.openedAt + this.options.resetTimeout - now)
        : undefined,
    );
  }

  /**
   * Force a target open, e.g. during a known outage. Stays open until
   * `resetTarget` is called.
   */
  isolate(target: string): void {
    const now = this.clock.now();
    const changed = this.states.update(target, (state) => {
      const wasOpen = state.status === CircuitState.Open;
      Object.assign(state, { status: CircuitState.Open, openedAt: now, isolated: true, probeInFlight: false });
      return !wasOpen;
    });
    if (changed) this.emitTransition(target, CircuitState.Open);
  }

  /**
   * Close a single target and clear its counters.
   */
  resetTarget(target: string): void {
    const wasClosed = this.getState(target) === CircuitState.Closed;
    this.states.delete(target);
    if (!wasClosed) this.emitTransition(target, CircuitState.Closed);
  }

  override getStats(): PolicyStats {
    const circuitStates: Record<string, CircuitState> = {};
    for (const target of this.states.keys()) {
      circuitStates[target] = this.getState(target);
    }
    return { ...super.getStats(), circuitStates };
  }

  protected override resetState(): void {
    this.states.clear();
  }

  private admit(target: string): Admission {
    const now = this.clock.now();

    return this.states.update(target, (state): Admission => {
      switch (state.status) {
        case CircuitState.Closed:
          return { admitted: true, probe: false };

        case CircuitState.Open: {
          if (state.isolated) {
            return { admitted: false, retryAfter: Infinity };
          }
          const elapsed = now - state.openedAt;
          if (elapsed < this.options.resetTimeout) {
            return { admitted: false, retryAfter: this.options.resetTimeout - elapsed };
          }
          state.status = CircuitState.HalfOpen;
          state.probeInFlight = true;
          return { admitted: true, probe: true, transition: CircuitState.HalfOpen };
        }

        case CircuitState.HalfOpen:
          if (state.probeInFlight) {
            return { admitted: false, retryAfter: 0 };
          }
          state.probeInFlight = true;
          return { admitted: true, probe: true };
      }
    });
  }

  private settle(target: string, probe: boolean, outcome: Outcome, error?: unknown): void {
    const now = this.clock.now();

    const transition = this.states.update(target, (state): CircuitState | undefined => {
      if (probe) {
        state.probeInFlight = false;
        // A neutral probe leaves the circuit half-open for the next caller
        if (outcome === 'neutral' || state.status !== CircuitState.HalfOpen) return undefined;

        if (outcome === 'success') {
          state.status = CircuitState.Closed;
          state.consecutiveFailures = 0;
          return CircuitState.Closed;
        }
        state.status = CircuitState.Open;
        state.openedAt = now;
        return CircuitState.Open;
      }

      // Late results from calls admitted before the circuit left Closed are ignored
      if (state.status !== CircuitState.Closed || outcome === 'neutral') return undefined;

      if (outcome === 'success') {
        state.consecutiveFailures = 0;
        return undefined;
      }

      state.consecutiveFailures++;
      if (state.consecutiveFailures < this.options.failureThreshold) return undefined;

      state.status = CircuitState.Open;
      state.openedAt = now;
      return CircuitState.Open;
    });

    if (transition) {
      this.emitTransition(target, transition, error);
    }
  }

  private classify(error: unknown): Outcome {
    if (
      error instanceof OperationCancelledError ||
      error instanceof CircuitOpenError ||
      error instanceof RateLimitExceededError
    ) {
      return 'neutral';
    }
    return this.isFailure(error) ? 'failure' : 'success';
  }

  private emitTransition(target: string, to: CircuitState, error?: unknown): void {
    const type =
      to === CircuitState.Open ? 'circuit.open' : to === CircuitState.HalfOpen ? 'circuit.halfOpen' : 'circuit.close';
    this.emit(type, {
      target,
      circuitState: to,
      ...(error instanceof Error && { error }),
    });
  }
}
