/**
 * Resilience error taxonomy.
 *
 * Every failure that leaves a policy stack is one of these classes. Retry and
 * circuit breaker decisions are made on the `kind` discriminant, never on
 * message text or on generic `Error` instances.
 *
 * ```
 * ResilienceError
 * ├── TransientError            (retryable)
 * │   └── AttemptTimeoutError
 * ├── PermanentError            (never retried)
 * │   └── OperationCancelledError
 * ├── RateLimitExceededError    (admission denied)
 * ├── CircuitOpenError          (admission denied)
 * └── ConfigurationError        (construction only)
 * ```
 */

/**
 * Discriminant carried by every resilience error.
 */
export type ResilienceErrorKind =
  | 'transient'
  | 'permanent'
  | 'rateLimitExceeded'
  | 'circuitOpen'
  | 'configuration';

/**
 * Base class for all errors raised by the policy layers.
 */
export abstract class ResilienceError extends Error {
  abstract readonly kind: ResilienceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Retryable failure reported by the invoker (timeout, 5xx, connection reset).
 */
export class TransientError extends ResilienceError {
  readonly kind = 'transient' as const;

  constructor(message: string = 'Transient failure', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A single attempt exceeded its time budget.
 */
export class AttemptTimeoutError extends TransientError {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
  }
}

/**
 * Non-retryable failure (malformed request, 4xx, authentication).
 */
export class PermanentError extends ResilienceError {
  readonly kind = 'permanent' as const;

  constructor(message: string = 'Permanent failure', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The caller aborted the logical call.
 */
export class OperationCancelledError extends PermanentError {
  constructor(message: string = 'Operation cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Admission denied by a rate limiter.
 */
export class RateLimitExceededError extends ResilienceError {
  readonly kind = 'rateLimitExceeded' as const;

  constructor(
    public readonly target: string,
    public readonly retryAfter: number,
  ) {
    super(`Rate limit exceeded for target "${target}", retry after ${retryAfter}ms`);
  }
}

/**
 * Admission denied by an open (or probing) circuit breaker.
 */
export class CircuitOpenError extends ResilienceError {
  readonly kind = 'circuitOpen' as const;

  constructor(
    public readonly target: string,
    public readonly retryAfter: number,
  ) {
    super(`Circuit is open for target "${target}"`);
  }
}

/**
 * Invalid policy stack configuration. Raised while building a stack, never
 * while calling one.
 */
export class ConfigurationError extends ResilienceError {
  readonly kind = 'configuration' as const;

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export function isResilienceError(error: unknown): error is ResilienceError {
  return error instanceof ResilienceError;
}

/**
 * True only for errors the retry layer may absorb.
 */
export function isRetryable(error: unknown): error is TransientError {
  return error instanceof TransientError;
}

/**
 * Normalize anything thrown into an `Error` instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
