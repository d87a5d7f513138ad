/**
 * Policy stack composition
 */

export { PolicyStackBuilder, createPolicyStackBuilder } from './builder';
export type { StackDependencies } from './builder';
export { PolicyStack } from './PolicyStack';
export type { LayerMap } from './PolicyStack';
