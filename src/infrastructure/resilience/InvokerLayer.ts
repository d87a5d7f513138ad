/**
 * Innermost layer: adapts the caller's invoker to the policy stack.
 *
 * - Classifies anything the invoker throws into the error taxonomy, so no raw
 *   transport error crosses the stack.
 * - Enforces the per-attempt timeout. A timed-out attempt has its signal
 *   aborted and fails with `AttemptTimeoutError` (transient).
 * - Turns caller cancellation into `OperationCancelledError`.
 *
 * @module infrastructure/resilience/InvokerLayer
 */

import {
  AttemptTimeoutError,
  ConfigurationError,
  OperationCancelledError,
  ResilienceError,
  TransientError,
  toError,
} from '../../domain/exceptions';
import type { Invoker, ResilientRequest } from '../../domain/request';
import { attemptTimeoutSchema, collectIssues } from '../pipeline/validation';
import { systemClock } from '../time';
import type { Clock } from '../time';
import type {
  CallContext,
  IPolicyLayer,
  LayerDependencies,
  PolicyEventListener,
  PolicyStats,
} from './IResiliencePolicy';
import { PolicyStatsCollector } from './PolicyStatsCollector';

export interface InvokerLayerOptions {
  /**
   * Default per-attempt time budget in milliseconds. A valid per-call `timeout`
   * takes precedence.
   */
  attemptTimeout?: number;

  /**
   * Maps an unknown invoker error to `TransientError` or `PermanentError`.
   * @defaultValue wraps everything in `TransientError`
   */
  classifyError?: (error: unknown) => ResilienceError;
}

const defaultClassifier = (error: unknown): ResilienceError =>
  new TransientError(toError(error).message, { cause: error });

export class InvokerLayer<TRequest extends ResilientRequest, TResponse>
  implements IPolicyLayer<TRequest, TResponse>
{
  readonly name = 'invoker';
  readonly type = 'invoker' as const;

  private readonly clock: Clock;
  private readonly stats: PolicyStatsCollector;
  private readonly listener?: PolicyEventListener;
  private readonly classifyError: (error: unknown) => ResilienceError;

  constructor(
    private readonly invoker: Invoker<TRequest, TResponse>,
    private readonly options: InvokerLayerOptions = {},
    dependencies: LayerDependencies = {},
  ) {
    this.clock = dependencies.clock ?? systemClock;
    this.listener = dependencies.onEvent;
    this.stats = new PolicyStatsCollector(this.clock);
    this.classifyError = options.classifyError ?? defaultClassifier;

    if (options.attemptTimeout !== undefined) {
      const issues = collectIssues(attemptTimeoutSchema, options.attemptTimeout, 'attemptTimeout');
      if (issues.length > 0) {
        throw new ConfigurationError('Invalid invoker options', issues);
      }
    }
  }

  async call(request: TRequest, context: CallContext): Promise<TResponse> {
    const startedAt = this.clock.now();
    try {
      const response = await this.attempt(request, context);
      this.stats.recordSuccess(this.clock.now() - startedAt);
      this.emit('execution.success', request.target);
      return response;
    } catch (error) {
      this.stats.recordError(error, this.clock.now() - startedAt);
      this.emit('execution.failure', request.target, toError(error));
      throw error;
    }
  }

  getStats(): PolicyStats {
    return this.stats.snapshot();
  }

  reset(): void {
    this.stats.reset();
  }

  private async attempt(request: TRequest, context: CallContext): Promise<TResponse> {
    const { signal } = context;
    if (signal?.aborted) {
      throw new OperationCancelledError('Operation cancelled before attempt', { cause: signal.reason });
    }

    const controller = new AbortController();
    // A per-call timeout that is not a usable timer delay falls back to the default
    const timeout =
      context.timeout !== undefined && attemptTimeoutSchema.safeParse(context.timeout).success
        ? context.timeout
        : this.options.attemptTimeout;

    const onCallerAbort = (): void => {
      controller.abort(new OperationCancelledError('Operation cancelled during attempt', { cause: signal?.reason }));
    };
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const timer =
      timeout === undefined
        ? undefined
        : setTimeout(() => {
            const timeoutError = new AttemptTimeoutError(timeout);
            this.emit('timeout.triggered', request.target, timeoutError);
            controller.abort(timeoutError);
          }, timeout);

    // Settles only when the attempt is aborted, with the abort reason
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    const pending = (async () =>
      this.invoker(request, {
        executionId: context.executionId,
        attempt: context.attempt,
        signal: controller.signal,
      }))();

    // An abandoned attempt may still settle later; report it instead of leaking an unhandled rejection
    void pending.catch((lateError: unknown) => {
      if (controller.signal.aborted) {
        this.emit('execution.failure', request.target, toError(lateError), { late: true });
      }
    });

    try {
      return await Promise.race([pending, aborted]);
    } catch (error) {
      throw error instanceof ResilienceError ? error : this.classifyError(error);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private emit(
    type: 'execution.success' | 'execution.failure' | 'timeout.triggered',
    target: string,
    error?: Error,
    extra: Record<string, unknown> = {},
  ): void {
    this.listener?.({
      type,
      policyName: this.name,
      policyType: this.type,
      timestamp: new Date(this.clock.now()),
      data: { target, ...(error && { error }), ...extra },
    });
  }
}
