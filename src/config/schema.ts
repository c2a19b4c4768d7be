/**
 * Zod schemas for the credentials configuration file and runtime settings.
 */
import { z } from 'zod';

import { isParameterExpression } from '@/credentials/credential.js';
import { DomainDataSchema } from '@/stores/serialization.js';

const scopeSchema = z.enum(['SYSTEM', 'GLOBAL', 'USER']);

// ─── Credentials ────────────────────────────────────────────────

/**
 * A configured secret: plaintext (usually a `${ENV_VAR}` placeholder) that
 * gets sealed on apply, or a reference into an external secret source.
 */
export const configSecretSchema = z.union([
  z.object({ plaintext: z.string() }).strict(),
  z
    .object({
      source: z.string().min(1, 'Secret source cannot be empty'),
      key: z.string().min(1, 'Secret key cannot be empty'),
    })
    .strict(),
]);

export const configCredentialSchema = z.object({
  id: z
    .string()
    .default('')
    .refine((id) => !isParameterExpression(id), {
      message: 'Credential id is reserved for parameter expressions',
    }),
  scope: scopeSchema.default('GLOBAL'),
  type: z.string().min(1, 'Credential type cannot be empty'),
  description: z.string().optional(),
  properties: z.record(z.string(), z.string()).default({}),
  secret: configSecretSchema,
});

export const configDomainCredentialsSchema = z.object({
  domain: DomainDataSchema.default({ name: null }),
  credentials: z.array(configCredentialSchema).default([]),
});

/** One store's worth of configuration. */
export const configStoreNodeSchema = z.object({
  domainCredentials: z.array(configDomainCredentialsSchema).default([]),
});

// ─── Configuration File ─────────────────────────────────────────

/**
 * `system` configures the root store of the system provider; each key of
 * `providers` configures the root store of the provider with that id.
 */
export const credentialsConfigSchema = z.object({
  /** `merge` or `replace`; CREDENTIALS_MERGE_STRATEGY applies when absent. */
  mergeStrategy: z.string().optional(),
  system: configStoreNodeSchema.optional(),
  providers: z.record(z.string(), configStoreNodeSchema).default({}),
});

// ─── Settings ───────────────────────────────────────────────────

export const settingsSchema = z.object({
  CREDENTIALS_DATA_DIR: z.string().min(1).default('./data'),
  CREDENTIALS_CONFIG_PATH: z.string().min(1).optional(),
  CREDENTIALS_MERGE_STRATEGY: z.string().optional(),
  CREDENTIALS_PROVIDER_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive('Provider timeout must be a positive integer')
    .default(5000),
  SECRETS_ENCRYPTION_KEY: z.string({ required_error: 'SECRETS_ENCRYPTION_KEY is not set' }),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

// ─── Inferred Types ─────────────────────────────────────────────

export type ConfigSecret = z.infer<typeof configSecretSchema>;
export type ConfigCredential = z.infer<typeof configCredentialSchema>;
export type ConfigDomainCredentials = z.infer<typeof configDomainCredentialsSchema>;
export type ConfigStoreNode = z.infer<typeof configStoreNodeSchema>;
export type CredentialsConfig = z.infer<typeof credentialsConfigSchema>;
export type Settings = z.infer<typeof settingsSchema>;
