/**
 * AES-256-GCM sealing for credential secrets.
 * Uses Node.js built-in `crypto` module — no external dependencies.
 *
 * The master key comes from settings (SECRETS_ENCRYPTION_KEY, 64 hex chars = 32 bytes).
 */
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { SecretVault } from './types.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // 96-bit IV recommended for GCM
const AUTH_TAG_LENGTH = 16; // 128-bit tag

export interface EncryptedPayload {
  encryptedValue: string; // hex
  iv: string; // hex
  authTag: string; // hex
}

/** Parse a 64-hex-character master key. */
export function parseMasterKey(hex: string): Result<Buffer, ValidationError> {
  if (hex.length !== 64 || !/^[0-9a-fA-F]+$/.test(hex)) {
    return err(
      new ValidationError(
        `SECRETS_ENCRYPTION_KEY must be exactly 64 hex characters (32 bytes). Got ${hex.length.toString()} characters.`,
      ),
    );
  }
  return ok(Buffer.from(hex, 'hex'));
}

/**
 * Encrypt a plaintext string with AES-256-GCM.
 * Returns hex-encoded ciphertext, IV, and auth tag.
 */
export function encrypt(plaintext: string, key: Buffer): EncryptedPayload {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return {
    encryptedValue: encrypted.toString('hex'),
    iv: iv.toString('hex'),
    authTag: authTag.toString('hex'),
  };
}

/**
 * Decrypt a hex-encoded AES-256-GCM ciphertext.
 * Throws if the auth tag is invalid (tampered or wrong key).
 */
export function decrypt(payload: EncryptedPayload, key: Buffer): string {
  const iv = Buffer.from(payload.iv, 'hex');
  const authTag = Buffer.from(payload.authTag, 'hex');
  const encryptedBuffer = Buffer.from(payload.encryptedValue, 'hex');

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);

  const decrypted = Buffer.concat([decipher.update(encryptedBuffer), decipher.final()]);
  return decrypted.toString('utf8');
}

/** SecretVault backed by a single AES-256-GCM master key. */
export function createAesSecretVault(key: Buffer): SecretVault {
  return {
    encrypt: (plaintext) => encrypt(plaintext, key),
    decrypt: (payload) => decrypt(payload, key),
  };
}
