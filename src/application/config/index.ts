export {
  policyStackConfigSchema,
  parsePolicyStackConfig,
  enabledLayers,
} from './schema';
export type { PolicyStackConfig, PolicyStackConfigInput } from './schema';

export { createPolicyStack } from './createPolicyStack';
export type { PolicyStackHooks } from './createPolicyStack';
