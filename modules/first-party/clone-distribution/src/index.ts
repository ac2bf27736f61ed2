/**
 * @plinth/module-clone-distribution
 *
 * First-party code module: each instantiation deploys one EIP-1167 minimal
 * proxy per source implementation.
 */

export type { CloneDistributionConfig, ImplementationConfig } from './manifest.js';
export {
  CLONE_DISTRIBUTION_KIND,
  IMPLEMENTATION_KIND,
  cloneDistributionBytecode,
  decodeCloneDistribution,
  decodeImplementation,
  implementationBytecode,
  minimalProxyBytecode,
  proxyImplementation,
} from './manifest.js';
export { cloneDistribution, cloneDistributionResolver, implementation, minimalProxy } from './programs.js';
