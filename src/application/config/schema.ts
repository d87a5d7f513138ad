/**
 * Policy stack configuration, validated once at construction with zod.
 *
 * Unknown keys are stripped. Every problem is collected and raised together
 * as one `ConfigurationError`; a stack is never built from a partially valid
 * configuration.
 *
 * @example
 * ```typescript
 * const config = parsePolicyStackConfig({
 *   rateLimit: { enabled: true, maxRequests: 50, window: 1_000 },
 *   circuitBreaker: { enabled: true, failureThreshold: 5, resetTimeout: 30_000 },
 *   retry: {
 *     enabled: true,
 *     maxAttempts: 3,
 *     policy: { type: 'exponential', baseDelay: 100, maxDelay: 2_000 },
 *   },
 *   cache: { enabled: false },
 * });
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../../domain/exceptions';
import {
  attemptTimeoutSchema,
  backoffSettingsSchema,
  cacheSettingsSchema,
  circuitBreakerSettingsSchema,
  formatIssues,
  layerNameSchema,
  maxAttemptsSchema,
  rateLimitSettingsSchema,
  validateLayerOrder,
} from '../../infrastructure/pipeline/validation';
import type { LayerName } from '../../infrastructure/resilience/IResiliencePolicy';

const disabled = z.object({ enabled: z.literal(false) });

const cacheConfigSchema = z.discriminatedUnion('enabled', [
  disabled,
  cacheSettingsSchema.extend({ enabled: z.literal(true) }),
]);

const rateLimitConfigSchema = z.discriminatedUnion('enabled', [
  disabled,
  rateLimitSettingsSchema.extend({ enabled: z.literal(true) }),
]);

const circuitBreakerConfigSchema = z.discriminatedUnion('enabled', [
  disabled,
  circuitBreakerSettingsSchema.extend({ enabled: z.literal(true) }),
]);

const retryConfigSchema = z.discriminatedUnion('enabled', [
  disabled,
  z.object({
    enabled: z.literal(true),
    maxAttempts: maxAttemptsSchema,
    policy: backoffSettingsSchema,
  }),
]);

export const policyStackConfigSchema = z
  .object({
    cache: cacheConfigSchema.optional(),
    rateLimit: rateLimitConfigSchema.optional(),
    circuitBreaker: circuitBreakerConfigSchema.optional(),
    retry: retryConfigSchema.optional(),
    order: z.array(layerNameSchema).optional(),
    attemptTimeout: attemptTimeoutSchema.optional(),
  })
  .superRefine((config, ctx) => {
    if (!config.order) return;
    for (const message of validateLayerOrder(config.order, enabledLayers(config))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  });

export type PolicyStackConfig = z.infer<typeof policyStackConfigSchema>;
export type PolicyStackConfigInput = z.input<typeof policyStackConfigSchema>;

/**
 * Layers switched on in a parsed configuration.
 */
export function enabledLayers(config: Pick<PolicyStackConfig, LayerName>): Set<LayerName> {
  const enabled = new Set<LayerName>();
  if (config.cache?.enabled) enabled.add('cache');
  if (config.rateLimit?.enabled) enabled.add('rateLimit');
  if (config.circuitBreaker?.enabled) enabled.add('circuitBreaker');
  if (config.retry?.enabled) enabled.add('retry');
  return enabled;
}

/**
 * Validate a raw configuration object.
 *
 * @throws {ConfigurationError} With one `path: message` entry per problem
 */
export function parsePolicyStackConfig(input: unknown): PolicyStackConfig {
  const result = policyStackConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid policy stack configuration', formatIssues(result.error));
  }
  return result.data;
}
