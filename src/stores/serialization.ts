/**
 * Persisted store layout, validated with Zod:
 * `{ version: 1, domainCredentials: [{ domain, credentials }] }`.
 *
 * Secrets stay sealed on disk; only the vault payload or the external
 * reference is written.
 */
import { z } from 'zod';

import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { createCredential, validateCredentialId } from '@/credentials/credential.js';
import type { Credential } from '@/credentials/types.js';
import { domainFromData, domainToData } from '@/domains/domain.js';
import { SpecificationDataSchema } from '@/domains/specifications.js';

import { toDomainCredentialsMap } from './domain-credentials.js';
import type { DomainCredentials, DomainCredentialsMap } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────

export const EncryptedPayloadSchema = z.object({
  encryptedValue: z.string().regex(/^[0-9a-f]*$/),
  iv: z.string().regex(/^[0-9a-f]+$/),
  authTag: z.string().regex(/^[0-9a-f]+$/),
});

export const SecretRefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sealed'), payload: EncryptedPayloadSchema }),
  z.object({ kind: z.literal('external'), source: z.string().min(1), key: z.string().min(1) }),
]);

export const CredentialDataSchema = z.object({
  id: z.string().min(1),
  scope: z.enum(['SYSTEM', 'GLOBAL', 'USER']),
  type: z.string().min(1),
  description: z.string().default(''),
  secret: SecretRefSchema,
  properties: z.record(z.string()).default({}),
});

export const DomainDataSchema = z.object({
  name: z.string().nullable(),
  description: z.string().nullable().default(null),
  specifications: z.array(SpecificationDataSchema).default([]),
});

export const StoreFileSchema = z.object({
  version: z.literal(1),
  domainCredentials: z.array(
    z.object({
      domain: DomainDataSchema,
      credentials: z.array(CredentialDataSchema).default([]),
    }),
  ),
});

export type CredentialData = z.infer<typeof CredentialDataSchema>;
export type StoreFile = z.infer<typeof StoreFileSchema>;

// ─── Credentials ────────────────────────────────────────────────

export function credentialToData(credential: Credential): CredentialData {
  return {
    id: credential.id,
    scope: credential.scope,
    type: credential.type,
    description: credential.description,
    secret: credential.secret,
    properties: { ...credential.properties },
  };
}

export function credentialFromData(data: CredentialData): Result<Credential, ValidationError> {
  const id = validateCredentialId(data.id);
  if (!id.ok) return id;
  return ok(createCredential({ ...data, id: id.value }));
}

// ─── Store File ─────────────────────────────────────────────────

export function storeFileFromMap(map: DomainCredentialsMap): StoreFile {
  return {
    version: 1,
    domainCredentials: [...map.values()].map((entry) => ({
      domain: domainToData(entry.domain),
      credentials: entry.credentials.map(credentialToData),
    })),
  };
}

/** Validate raw JSON content and rebuild the map. */
export function mapFromStoreFile(raw: unknown): Result<DomainCredentialsMap, ValidationError> {
  const parsed = StoreFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new ValidationError('Persisted store does not match the expected layout', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }

  const entries: DomainCredentials[] = [];
  for (const entry of parsed.data.domainCredentials) {
    const domain = domainFromData(entry.domain);
    if (!domain.ok) return domain;

    const credentials: Credential[] = [];
    for (const credentialData of entry.credentials) {
      const credential = credentialFromData(credentialData);
      if (!credential.ok) return credential;
      credentials.push(credential.value);
    }
    entries.push({ domain: domain.value, credentials });
  }
  return ok(toDomainCredentialsMap(entries));
}
