/**
 * Secrets module — sealing and access of credential secrets.
 * @module secrets
 */
export type {
  ExternalSecretSource,
  SecretAccess,
  SecretAccessOptions,
  SecretVault,
} from './types.js';
export type { SecretAccessor } from './secret-accessor.js';
export { createSecretAccessor } from './secret-accessor.js';
export { createAesSecretVault, decrypt, encrypt, parseMasterKey } from './crypto.js';
export type { EncryptedPayload } from './crypto.js';
