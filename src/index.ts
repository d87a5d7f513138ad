/**
 * @fileoverview resilient-call
 * @description
 * A composable stack of resilience policies (response caching, rate
 * limiting, circuit breaking, retry with backoff) wrapped around an outbound
 * call.
 *
 * ```typescript
 * import { createPolicyStack, consoleLogger } from 'resilient-call';
 *
 * const stack = createPolicyStack<ApiRequest, ApiResponse>(config, invoker, {
 *   logger: consoleLogger,
 * });
 * const response = await stack.call(request);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
