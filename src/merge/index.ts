// Merge engine and configurator
export type { MergeStrategy } from './merge.js';
export {
  MERGE_STRATEGY_ENV,
  applyMergeStrategy,
  mergeDomainCredentials,
  replaceDomainCredentials,
  resolveMergeStrategy,
} from './merge.js';
export type {
  ConfiguratorDeps,
  DescribedConfiguration,
  DescribedCredential,
  DescribedStoreNode,
  NodeSummary,
} from './configurator.js';
export { applyCredentialsConfiguration, describeCredentialsConfiguration } from './configurator.js';
