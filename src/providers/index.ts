// Credential providers and their registry
export type {
  CredentialsProvider,
  ProviderTypeRestriction,
  SelectionFilter,
} from './types.js';
export type { ProviderRegistry, ProviderRegistryOptions } from './registry.js';
export { createProviderRegistry } from './registry.js';
export type { SystemProviderOptions } from './system-provider.js';
export { SYSTEM_PROVIDER_ID, createSystemProvider } from './system-provider.js';
export type { ContextProvider, ContextProviderOptions } from './context-provider.js';
export { CONTEXT_PROVIDER_ID, createContextProvider } from './context-provider.js';
export type { UserProvider, UserProviderOptions } from './user-provider.js';
export { USER_PROVIDER_ID, createUserProvider } from './user-provider.js';
export type { RemoteCredentialsSource, RemoteProviderOptions } from './remote-provider.js';
export { createRemoteProvider } from './remote-provider.js';
