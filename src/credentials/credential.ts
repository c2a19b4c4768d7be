/**
 * Credential construction and identifier rules.
 */
import { nanoid } from 'nanoid';

import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { Credential, CredentialInput } from './types.js';

/** `${...}` is reserved for parameter expressions. */
const RESERVED_ID_PATTERN = /^\$\{.*\}$/;

/** True when `id` is a `${NAME}` parameter expression. */
export function isParameterExpression(id: string): boolean {
  return RESERVED_ID_PATTERN.test(id.trim());
}

/** Extract NAME from `${NAME}`, or null when `id` is not an expression. */
export function parameterNameOf(id: string): string | null {
  const trimmed = id.trim();
  return isParameterExpression(trimmed) ? trimmed.slice(2, -1) : null;
}

/**
 * Validate a credential identifier.
 * Empty identifiers are accepted here; createCredential() generates one for them.
 */
export function validateCredentialId(id: string): Result<string, ValidationError> {
  const trimmed = id.trim();
  if (isParameterExpression(trimmed)) {
    return err(
      new ValidationError(`Credential id "${trimmed}" is reserved for parameter expressions`, {
        id: trimmed,
      }),
    );
  }
  if (/\s/.test(trimmed)) {
    return err(new ValidationError(`Credential id "${trimmed}" must not contain whitespace`, { id: trimmed }));
  }
  return ok(trimmed);
}

/**
 * Build an immutable credential.
 * @throws ValidationError when the identifier is reserved or malformed.
 */
export function createCredential(input: CredentialInput): Credential {
  const validated = validateCredentialId(input.id ?? '');
  if (!validated.ok) {
    throw validated.error;
  }
  return Object.freeze({
    id: validated.value === '' ? nanoid() : validated.value,
    scope: input.scope ?? 'GLOBAL',
    type: input.type,
    description: input.description?.trim() ?? '',
    secret: input.secret,
    properties: Object.freeze({ ...(input.properties ?? {}) }),
  });
}

/** Human-readable name for listings: description, else username, else id. */
export function credentialName(credential: Credential): string {
  if (credential.description !== '') return credential.description;
  const username = credential.properties['username'];
  return username !== undefined && username !== '' ? username : credential.id;
}
