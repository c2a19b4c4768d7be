// ─── Schemas ────────────────────────────────────────────────────
export {
  configCredentialSchema,
  configDomainCredentialsSchema,
  configSecretSchema,
  configStoreNodeSchema,
  credentialsConfigSchema,
  settingsSchema,
} from './schema.js';
export type {
  ConfigCredential,
  ConfigDomainCredentials,
  ConfigSecret,
  ConfigStoreNode,
  CredentialsConfig,
  Settings,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadCredentialsConfig, loadSettings, resolveEnvVars } from './loader.js';
