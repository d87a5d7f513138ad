/**
 * Validation rules shared by the fluent builder and the configuration
 * schema. Violations are reported as `path: message` strings and raised
 * together as one `ConfigurationError`.
 */

import { z } from 'zod';
import { LAYER_NAMES } from '../resilience/IResiliencePolicy';
import type { LayerName } from '../resilience/IResiliencePolicy';

export const layerNameSchema = z.enum(['cache', 'rateLimit', 'circuitBreaker', 'retry']);

export const cacheSettingsSchema = z.object({
  ttl: z.number().finite().positive(),
  maxEntries: z.number().int().positive().optional(),
});

export const rateLimitSettingsSchema = z.object({
  maxRequests: z.number().int().positive(),
  window: z.number().finite().positive(),
});

export const circuitBreakerSettingsSchema = z.object({
  failureThreshold: z.number().int().positive(),
  resetTimeout: z.number().finite().nonnegative(),
});

export const fixedBackoffSchema = z.object({
  type: z.literal('fixed'),
  delay: z.number().finite().nonnegative(),
});

export const exponentialBackoffSchema = z.object({
  type: z.literal('exponential'),
  baseDelay: z.number().finite().positive(),
  maxDelay: z.number().finite().positive(),
  jitterFraction: z.number().min(0).max(1).default(0.1),
});

export const backoffSettingsSchema = z
  .discriminatedUnion('type', [fixedBackoffSchema, exponentialBackoffSchema])
  .superRefine((backoff, ctx) => {
    if (backoff.type === 'exponential' && backoff.maxDelay < backoff.baseDelay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxDelay'],
        message: 'must be greater than or equal to baseDelay',
      });
    }
  });

export const maxAttemptsSchema = z.number().int().positive();

/** Largest delay `setTimeout` honours; longer ones fire after 1ms */
export const MAX_TIMER_DELAY = 2_147_483_647;

export const attemptTimeoutSchema = z.number().finite().positive().max(MAX_TIMER_DELAY);

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].filter((segment) => segment !== undefined && segment !== '').join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a value against a schema, collecting issues instead of throwing.
 */
export function collectIssues(schema: z.ZodTypeAny, value: unknown, prefix: string): string[] {
  const result = schema.safeParse(value);
  return result.success ? [] : formatIssues(result.error, prefix);
}

/**
 * Check a requested layer order against the set of configured layers.
 *
 * Each name may appear once, and the order must name exactly the configured
 * layers: naming an unconfigured layer, or leaving a configured one out, is
 * contradictory.
 */
export function validateLayerOrder(order: readonly string[], configured: ReadonlySet<LayerName>): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const name of order) {
    if (!isLayerName(name)) {
      issues.push(`order: unknown layer "${name}"`);
      continue;
    }
    if (seen.has(name)) {
      issues.push(`order: layer "${name}" appears more than once`);
      continue;
    }
    seen.add(name);
    if (!configured.has(name)) {
      issues.push(`order: layer "${name}" is not enabled`);
    }
  }

  for (const name of configured) {
    if (!seen.has(name)) {
      issues.push(`order: enabled layer "${name}" is missing`);
    }
  }

  return issues;
}

export function isLayerName(name: string): name is LayerName {
  return LAYER_NAMES.some((layer) => layer === name);
}
