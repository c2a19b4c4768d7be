// Credential stores — per-context domain → credentials maps
export type {
  CredentialsStore,
  DomainCredentials,
  DomainCredentialsMap,
  ModifiableCredentialsStore,
  StorePersistence,
} from './types.js';
export { isModifiableStore, requireModifiable } from './types.js';
export type { CredentialsStoreOptions } from './credentials-store.js';
export { createCredentialsStore } from './credentials-store.js';
export {
  countCredentials,
  emptyDomainCredentialsMap,
  mergeCredentialLists,
  mergeDomainEntry,
  toDomainCredentialsMap,
} from './domain-credentials.js';
export type { JsonFilePersistenceOptions } from './persistence.js';
export { createJsonFilePersistence, createMemoryPersistence } from './persistence.js';
export type { CredentialData, StoreFile } from './serialization.js';
export {
  StoreFileSchema,
  credentialFromData,
  credentialToData,
  mapFromStoreFile,
  storeFileFromMap,
} from './serialization.js';
