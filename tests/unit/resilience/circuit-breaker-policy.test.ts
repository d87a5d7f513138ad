/**
 * @fileoverview Unit tests for the per-target circuit breaker
 */

import {
  CircuitBreakerPolicy,
  CircuitOpenError,
  CircuitState,
  InvokerLayer,
  OperationCancelledError,
  PermanentError,
  TransientError,
} from '../../../src';
import type { CallContext, CircuitBreakerOptions, PolicyEvent } from '../../../src';
import { ManualClock, createInvoker, deferred, request } from '../../helpers/fakes';
import type { TestRequest } from '../../helpers/fakes';

const context: CallContext = { executionId: 'exec-1', attempt: 1 };

describe('CircuitBreakerPolicy', () => {
  let clock: ManualClock;
  let invoker: ReturnType<typeof createInvoker>;
  let events: PolicyEvent[];

  const createBreaker = (
    options: Partial<CircuitBreakerOptions> = {},
  ): CircuitBreakerPolicy<TestRequest, string> =>
    new CircuitBreakerPolicy(
      new InvokerLayer(invoker, {}, { clock }),
      { failureThreshold: 3, resetTimeout: 10_000, ...options },
      { clock, onEvent: (event) => events.push(event) },
    );

  const fail = async (breaker: CircuitBreakerPolicy<TestRequest, string>, times: number): Promise<void> => {
    for (let i = 0; i < times; i++) {
      invoker.mockRejectedValueOnce(new TransientError('503'));
      await expect(breaker.call(request('/a'), context)).rejects.toBeInstanceOf(TransientError);
    }
  };

  beforeEach(() => {
    clock = new ManualClock();
    invoker = createInvoker();
    events = [];
  });

  // ==========================================================================
  // Closed
  // ==========================================================================

  describe('closed', () => {
    it('should open after failureThreshold consecutive transient failures', async () => {
      const breaker = createBreaker();

      await fail(breaker, 2);
      expect(breaker.getState('users-api')).toBe(CircuitState.Closed);

      await fail(breaker, 1);
      expect(breaker.getState('users-api')).toBe(CircuitState.Open);
      expect(events.map((e) => e.type)).toEqual(['circuit.open']);
      expect(events[0].data).toMatchObject({ target: 'users-api', circuitState: CircuitState.Open });
    });

    it('should reset the failure count on success', async () => {
      const breaker = createBreaker();

      await fail(breaker, 2);
      invoker.mockResolvedValueOnce('ok');
      await breaker.call(request('/a'), context);
      await fail(breaker, 2);

      expect(breaker.getSnapshot('users-api')).toEqual({
        status: CircuitState.Closed,
        consecutiveFailures: 2,
        openedAt: undefined,
        probeInFlight: false,
        isolated: false,
      });
    });

    it('should treat permanent errors as a healthy answer', async () => {
      const breaker = createBreaker({ failureThreshold: 1 });
      invoker.mockRejectedValue(new PermanentError('404'));

      await expect(breaker.call(request('/a'), context)).rejects.toBeInstanceOf(PermanentError);
      await expect(breaker.call(request('/a'), context)).rejects.toBeInstanceOf(PermanentError);

      expect(breaker.getState('users-api')).toBe(CircuitState.Closed);
    });

    it('should honour a custom failure predicate', async () => {
      const breaker = createBreaker({
        failureThreshold: 1,
        isFailure: (error) => error instanceof PermanentError,
      });
      invoker.mockRejectedValue(new PermanentError('500 from legacy gateway'));

      await expect(breaker.call(request('/a'), context)).rejects.toBeInstanceOf(PermanentError);

      expect(breaker.getState('users-api')).toBe(CircuitState.Open);
    });

    it('should keep one state machine per target', async () => {
      const breaker = createBreaker({ failureThreshold: 1 });
      await fail(breaker, 1);

      invoker.mockResolvedValue('ok');
      await expect(breaker.call(request('/a', 'orders-api'), context)).resolves.toBe('ok');
      expect(breaker.getState('orders-api')).toBe(CircuitState.Closed);
    });
  });

  // ==========================================================================
  // Open
  // ==========================================================================

  describe('open', () => {
    it('should fail fast without invoking', async () => {
      const breaker = createBreaker();
      await fail(breaker, 3);
      clock.advance(4_000);

      const error = await breaker.call(request('/a'), context).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(error).toMatchObject({ target: 'users-api', retryAfter: 6_000 });
      expect(invoker).toHaveBeenCalledTimes(3);
      expect(breaker.getStats().rejectedCount).toBe(1);
    });

    it('should report the time left before a probe is allowed', async () => {
      const breaker = createBreaker();
      await fail(breaker, 3);
      clock.advance(2_500);

      expect(breaker.getTimeUntilClose('users-api')).toBe(7_500);
      expect(breaker.getTimeUntilClose('orders-api')).toBeUndefined();
    });
  });

  // ==========================================================================
  // Half-open
  // ==========================================================================

  describe('half-open', () => {
    it('should admit exactly one probe once the reset timeout has elapsed', async () => {
      const breaker = createBreaker();
      await fail(breaker, 3);
      clock.advance(10_000);

      const probeResult = deferred<string>();
      invoker.mockImplementationOnce(() => probeResult.promise);

      const probe = breaker.call(request('/a'), context);
      const concurrent = await breaker.call(request('/b'), context).catch((e: unknown) => e);

      expect(breaker.getState('users-api')).toBe(CircuitState.HalfOpen);
      expect(concurrent).toBeInstanceOf(CircuitOpenError);
      expect(concurrent).toMatchObject({ retryAfter: 0 });

      probeResult.resolve('recovered');
      await expect(probe).resolves.toBe('recovered');

      expect(invoker).toHaveBeenCalledTimes(4);
      expect(breaker.getSnapshot('users-api')).toMatchObject({
        status: CircuitState.Closed,
        consecutiveFailures: 0,
        probeInFlight: false,
      });
      expect(events.map((e) => e.type)).toEqual([
        'circuit.open',
        'circuit.halfOpen',
        'circuit.rejected',
        'circuit.close',
      ]);
    });

    it('should reopen with a fresh timeout when the probe fails', async () => {
      const breaker = createBreaker();
      await fail(breaker, 3);
      clock.advance(10_000);

      await fail(breaker, 1);

      expect(breaker.getSnapshot('users-api')).toMatchObject({
        status: CircuitState.Open,
        openedAt: clock.now(),
      });

      clock.advance(9_999);
      await expect(breaker.call(request('/a'), context)).rejects.toMatchObject({ retryAfter: 1 });
    });

    it('should stay half-open when the probe is cancelled', async () => {
      const breaker = createBreaker();
      await fail(breaker, 3);
      clock.advance(10_000);

      invoker.mockRejectedValueOnce(new OperationCancelledError());
      await expect(breaker.call(request('/a'), context)).rejects.toBeInstanceOf(OperationCancelledError);
      expect(breaker.getSnapshot('users-api')).toMatchObject({
        status: CircuitState.HalfOpen,
        probeInFlight: false,
      });

      invoker.mockResolvedValueOnce('ok');
      await expect(breaker.call(request('/a'), context)).resolves.toBe('ok');
      expect(breaker.getState('users-api')).toBe(CircuitState.Closed);
    });
  });

  // ==========================================================================
  // Late results
  // ==========================================================================

  it('should ignore a success that settles after the circuit opened', async () => {
    const breaker = createBreaker({ failureThreshold: 1 });
    const slow = deferred<string>();
    invoker.mockImplementationOnce(() => slow.promise);

    const inFlight = breaker.call(request('/slow'), context);
    await fail(breaker, 1);

    slow.resolve('late');
    await expect(inFlight).resolves.toBe('late');

    expect(breaker.getState('users-api')).toBe(CircuitState.Open);
  });

  // ==========================================================================
  // Manual control
  // ==========================================================================

  describe('manual control', () => {
    it('should keep an isolated target open until it is reset', async () => {
      const breaker = createBreaker();
      invoker.mockResolvedValue('ok');

      breaker.isolate('users-api');
      clock.advance(1_000_000);

      await expect(breaker.call(request('/a'), context)).rejects.toMatchObject({ retryAfter: Infinity });
      expect(breaker.getTimeUntilClose('users-api')).toBeUndefined();

      breaker.resetTarget('users-api');

      await expect(breaker.call(request('/a'), context)).resolves.toBe('ok');
      expect(events.map((e) => e.type)).toEqual(['circuit.open', 'circuit.rejected', 'circuit.close']);
    });

    it('should expose per-target states in its statistics', async () => {
      const breaker = createBreaker({ failureThreshold: 1 });
      await fail(breaker, 1);
      invoker.mockResolvedValue('ok');
      await breaker.call(request('/a', 'orders-api'), context);

      expect(breaker.getStats().circuitStates).toEqual({
        'users-api': CircuitState.Open,
        'orders-api': CircuitState.Closed,
      });
    });

    it('should close every circuit on reset', async () => {
      const breaker = createBreaker({ failureThreshold: 1 });
      await fail(breaker, 1);

      breaker.reset();

      expect(breaker.getState('users-api')).toBe(CircuitState.Closed);
      expect(breaker.getStats().totalExecutions).toBe(0);
    });
  });
});
