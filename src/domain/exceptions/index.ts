/**
 * Exception module
 *
 * Error taxonomy shared by every policy layer.
 */

export {
  ResilienceError,
  TransientError,
  AttemptTimeoutError,
  PermanentError,
  OperationCancelledError,
  RateLimitExceededError,
  CircuitOpenError,
  ConfigurationError,
  isResilienceError,
  isRetryable,
  toError,
} from './exceptions';

export type { ResilienceErrorKind } from './exceptions';
