/**
 * Request and invoker contracts.
 *
 * The policy stack never looks inside a request beyond the two keys below and
 * never looks inside a response at all.
 *
 * @module domain/request/IRequest
 */

/**
 * A request routed through a policy stack.
 *
 * @example
 * ```typescript
 * const request: ResilientRequest = {
 *   cacheKey: 'GET /users/42',
 *   target: 'users-api',
 * };
 * ```
 */
export interface ResilientRequest {
  /**
   * Deterministic key for response caching. Two requests with the same key
   * must be interchangeable for the lifetime of a cache entry.
   */
  readonly cacheKey: string;

  /**
   * Logical destination. Rate limit windows and circuit breaker state are
   * tracked independently per target.
   */
  readonly target: string;
}

/**
 * Information handed to the invoker for a single attempt.
 */
export interface InvocationContext {
  /** Identifier shared by every attempt of one logical call */
  readonly executionId: string;

  /** Attempt number within the logical call (1-indexed) */
  readonly attempt: number;

  /**
   * Aborted when the caller cancels or the attempt times out. Invokers should
   * forward it to their transport.
   */
  readonly signal: AbortSignal;
}

/**
 * The remote call wrapped by a policy stack.
 *
 * Must reject with `TransientError` or `PermanentError` where it can tell the
 * two apart; anything else is classified at the boundary.
 */
export type Invoker<TRequest extends ResilientRequest, TResponse> = (
  request: TRequest,
  context: InvocationContext,
) => Promise<TResponse>;

/**
 * Per-call options accepted by `PolicyStack.call`.
 */
export interface CallOptions {
  /** Cancels the logical call, including any pending retry wait */
  signal?: AbortSignal;

  /**
   * Time budget for each individual invoker attempt, in milliseconds. Values
   * that are not positive finite timer delays are ignored and the stack's
   * default applies.
   */
  timeout?: number;
}
