// Resolution module — credential lookup along the context hierarchy
export type { ListOptions } from './types.js';
export type { CredentialMatcher } from './matchers.js';
export {
  always,
  never,
  withId,
  withScope,
  withScopes,
  withType,
  describedBy,
  withProperty,
  allOf,
  anyOf,
  not,
  firstOrNull,
  dedupById,
} from './matchers.js';
export type { CredentialsResolver, CredentialsResolverDeps } from './credentials-resolver.js';
export { createCredentialsResolver, canReadStore, getDefaultPrincipalOf } from './credentials-resolver.js';
export type { ExecutionResolver, ExecutionResolverDeps } from './execution-resolver.js';
export { createExecutionResolver } from './execution-resolver.js';
