import type { PolicyEvent, PolicyEventListener } from '../../infrastructure/resilience/IResiliencePolicy';
import type { ILogger } from './logger';

const WARN_EVENTS = new Set<PolicyEvent['type']>(['circuit.open', 'rateLimit.rejected', 'retry.exhausted']);

/**
 * Route policy events to a logger: admission denials, circuit openings and
 * exhausted retries at `warn`, everything else at `debug`.
 */
export function createEventLogger(logger: ILogger): PolicyEventListener {
  return (event) => {
    const data: NonNullable<PolicyEvent['data']> = event.data ?? {};
    const { target, error, ...rest } = data;
    const message = `[${event.policyName}] ${event.type}${target ? ` target=${target}` : ''}`;
    const details = error ? { ...rest, error: error.message } : rest;

    if (WARN_EVENTS.has(event.type)) {
      logger.warn(message, details);
    } else {
      logger.debug(message, details);
    }
  };
}
