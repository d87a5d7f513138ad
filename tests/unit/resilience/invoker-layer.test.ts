/**
 * @fileoverview Unit tests for the invoker adapter: classification,
 * per-attempt timeouts and cancellation
 */

import {
  AttemptTimeoutError,
  ConfigurationError,
  InvokerLayer,
  OperationCancelledError,
  PermanentError,
  RateLimitExceededError,
  TransientError,
} from '../../../src';
import type { CallContext, InvokerLayerOptions, PolicyEvent } from '../../../src';
import { ManualClock, createInvoker, deferred, flushPromises, request } from '../../helpers/fakes';
import type { TestRequest } from '../../helpers/fakes';

const context: CallContext = { executionId: 'exec-1', attempt: 2 };

describe('InvokerLayer', () => {
  let clock: ManualClock;
  let invoker: ReturnType<typeof createInvoker>;
  let events: PolicyEvent[];

  const createLayer = (options: InvokerLayerOptions = {}): InvokerLayer<TestRequest, string> =>
    new InvokerLayer(invoker, options, { clock, onEvent: (event) => events.push(event) });

  beforeEach(() => {
    clock = new ManualClock();
    invoker = createInvoker();
    events = [];
  });

  // ==========================================================================
  // Invocation
  // ==========================================================================

  describe('invocation', () => {
    it('should pass the execution id, attempt number and a live signal', async () => {
      invoker.mockResolvedValue('ok');

      await expect(createLayer().call(request('/a'), context)).resolves.toBe('ok');

      const [req, invocation] = invoker.mock.calls[0];
      expect(req.path).toBe('/a');
      expect(invocation.executionId).toBe('exec-1');
      expect(invocation.attempt).toBe(2);
      expect(invocation.signal.aborted).toBe(false);
      expect(events.map((e) => e.type)).toEqual(['execution.success']);
    });

    it('should record successes and failures', async () => {
      invoker.mockResolvedValueOnce('ok').mockRejectedValueOnce(new PermanentError('400'));
      const layer = createLayer();

      await layer.call(request('/a'), context);
      await layer.call(request('/a'), context).catch(() => undefined);

      expect(layer.getStats()).toMatchObject({ totalExecutions: 2, successCount: 1, failureCount: 1 });
      layer.reset();
      expect(layer.getStats().totalExecutions).toBe(0);
    });
  });

  // ==========================================================================
  // Classification
  // ==========================================================================

  describe('classification', () => {
    it('should wrap unknown errors in TransientError by default', async () => {
      const raw = new Error('socket hang up');
      invoker.mockRejectedValue(raw);

      const error = await createLayer().call(request('/a'), context).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({ message: 'socket hang up', cause: raw });
    });

    it('should wrap non-Error throws as well', async () => {
      invoker.mockRejectedValue('boom');

      await expect(createLayer().call(request('/a'), context)).rejects.toMatchObject({
        kind: 'transient',
        message: 'boom',
      });
    });

    it('should apply a custom classifier', async () => {
      invoker.mockRejectedValue(new Error('HTTP 404'));
      const layer = createLayer({
        classifyError: (error) =>
          error instanceof Error && error.message.includes('404')
            ? new PermanentError(error.message, { cause: error })
            : new TransientError('unknown', { cause: error }),
      });

      await expect(layer.call(request('/a'), context)).rejects.toBeInstanceOf(PermanentError);
    });

    it('should pass resilience errors through untouched', async () => {
      const limited = new RateLimitExceededError('users-api', 300);
      invoker.mockRejectedValue(limited);

      await expect(createLayer().call(request('/a'), context)).rejects.toBe(limited);
    });
  });

  // ==========================================================================
  // Timeouts
  // ==========================================================================

  describe('timeouts', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should fail a slow attempt with AttemptTimeoutError and abort its signal', async () => {
      const slow = deferred<string>();
      invoker.mockImplementation(() => slow.promise);
      const layer = createLayer({ attemptTimeout: 50 });

      const pending = layer.call(request('/a'), context);
      jest.advanceTimersByTime(50);

      const error = await pending.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(AttemptTimeoutError);
      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({ timeoutMs: 50 });
      expect(invoker.mock.calls[0][1].signal.aborted).toBe(true);
      expect(layer.getStats()).toMatchObject({ failureCount: 1, timeoutCount: 1 });
    });

    it('should prefer the per-call timeout over the default', async () => {
      invoker.mockImplementation(() => deferred<string>().promise);
      const layer = createLayer({ attemptTimeout: 1_000 });

      const pending = layer.call(request('/a'), { ...context, timeout: 20 });
      jest.advanceTimersByTime(20);

      await expect(pending).rejects.toMatchObject({ timeoutMs: 20 });
    });

    it.each([NaN, 0, -5, Infinity])(
      'should fall back to the default when the per-call timeout is %p',
      async (timeout) => {
        invoker.mockImplementation(() => deferred<string>().promise);
        const layer = createLayer({ attemptTimeout: 50 });

        const pending = layer.call(request('/a'), { ...context, timeout });
        jest.advanceTimersByTime(50);

        await expect(pending).rejects.toMatchObject({ timeoutMs: 50 });
      },
    );

    it('should run without a timer when neither timeout is usable', async () => {
      const slow = deferred<string>();
      invoker.mockImplementation(() => slow.promise);

      const pending = createLayer().call(request('/a'), { ...context, timeout: 0 });

      expect(jest.getTimerCount()).toBe(0);
      slow.resolve('ok');
      await expect(pending).resolves.toBe('ok');
    });

    it('should reject an unusable default timeout at construction', () => {
      expect(() => createLayer({ attemptTimeout: 0 })).toThrow(ConfigurationError);
    });

    it('should report a result that settles after the timeout', async () => {
      const slow = deferred<string>();
      invoker.mockImplementation(() => slow.promise);
      const layer = createLayer({ attemptTimeout: 50 });

      const pending = layer.call(request('/a'), context);
      jest.advanceTimersByTime(50);
      await pending.catch(() => undefined);

      slow.reject(new Error('connection closed'));
      await flushPromises();

      expect(events.map((e) => e.type)).toEqual(['timeout.triggered', 'execution.failure', 'execution.failure']);
      expect(events[2].data).toMatchObject({ target: 'users-api', late: true });
    });

    it('should clear the timer once the attempt settles', async () => {
      invoker.mockResolvedValue('ok');
      const layer = createLayer({ attemptTimeout: 50 });

      await expect(layer.call(request('/a'), context)).resolves.toBe('ok');

      expect(jest.getTimerCount()).toBe(0);
    });
  });

  // ==========================================================================
  // Cancellation
  // ==========================================================================

  describe('cancellation', () => {
    it('should not invoke when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await createLayer()
        .call(request('/a'), { ...context, signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error).toMatchObject({ message: 'Operation cancelled before attempt' });
      expect(invoker).not.toHaveBeenCalled();
    });

    it('should abandon an in-flight attempt when the caller aborts', async () => {
      const controller = new AbortController();
      invoker.mockImplementation(() => deferred<string>().promise);

      const pending = createLayer().call(request('/a'), { ...context, signal: controller.signal });
      controller.abort('user navigated away');

      const error = await pending.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error).toMatchObject({ cause: 'user navigated away' });
      expect(invoker.mock.calls[0][1].signal.aborted).toBe(true);
    });
  });
});
