/**
 * Types for secret sealing and access.
 * Plaintext secrets exist only transiently: on the way into the vault when a
 * credential is created, and on the way out of the accessor when it is used.
 * They are NEVER persisted or logged.
 */
import type { EncryptedPayload } from './crypto.js';

// ─── Collaborators ───────────────────────────────────────────────

/** At-rest encryption collaborator. */
export interface SecretVault {
  encrypt(plaintext: string): EncryptedPayload;
  /** Throws if the payload was tampered with or sealed under another key. */
  decrypt(payload: EncryptedPayload): string;
}

/** A remote holder of secrets, addressed by key. */
export interface ExternalSecretSource {
  readonly id: string;
  /** Resolve to the plaintext, or null if the source does not know the key. */
  fetch(key: string, signal: AbortSignal): Promise<string | null>;
}

// ─── Access ─────────────────────────────────────────────────────

/**
 * Outcome of a secret access. `tracked` is true when the usage record was
 * written as part of this access, false for preview/validation access.
 */
export interface SecretAccess {
  value: string;
  tracked: boolean;
}

export interface SecretAccessOptions {
  /** Validation or preview: resolve the secret without tracking usage. */
  preview?: boolean;
  signal?: AbortSignal;
}
