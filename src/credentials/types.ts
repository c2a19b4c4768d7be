/**
 * Credential domain types.
 * A credential carries a reference to its secret, never the plaintext;
 * the plaintext is only produced by the secret accessor.
 */
import type { CredentialsScope } from '@/scopes/scope.js';
import type { EncryptedPayload } from '@/secrets/crypto.js';

// ─── Secret References ──────────────────────────────────────────

/** Secret sealed by the SecretVault and stored alongside the credential. */
export interface SealedSecretRef {
  readonly kind: 'sealed';
  readonly payload: EncryptedPayload;
}

/** Secret held by an external source (e.g. a remote secret manager). */
export interface ExternalSecretRef {
  readonly kind: 'external';
  readonly source: string;
  readonly key: string;
}

export type SecretRef = SealedSecretRef | ExternalSecretRef;

// ─── Credential ─────────────────────────────────────────────────

export interface Credential {
  /** Unique within a (store, domain) pair. Never of the form `${...}`. */
  readonly id: string;
  readonly scope: CredentialsScope;
  /** Type tag, see credential-types.ts. */
  readonly type: string;
  readonly description: string;
  readonly secret: SecretRef;
  /** Non-secret attributes such as `username`. */
  readonly properties: Readonly<Record<string, string>>;
}

export interface CredentialInput {
  /** Generated when empty or absent. */
  id?: string;
  /** Default: GLOBAL. */
  scope?: CredentialsScope;
  type: string;
  description?: string;
  secret: SecretRef;
  properties?: Record<string, string>;
}

// ─── Type Table ─────────────────────────────────────────────────

export interface CredentialTypeDefinition {
  readonly tag: string;
  /** Null only for the root tag. */
  readonly parent: string | null;
  readonly displayName: string;
}
