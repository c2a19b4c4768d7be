import { describe, it, expect } from 'vitest';
import {
  createCredential,
  credentialName,
  isParameterExpression,
  parameterNameOf,
  validateCredentialId,
} from './credential.js';
import { isAssignableType, typeLineage } from './credential-types.js';
import { ValidationError } from '@/core/errors.js';
import type { SecretRef } from './types.js';

const secret: SecretRef = { kind: 'external', source: 'remote', key: 'k' };

describe('identifiers', () => {
  it('recognizes parameter expressions', () => {
    expect(isParameterExpression('${DEPLOY_KEY}')).toBe(true);
    expect(isParameterExpression('deploy-key')).toBe(false);
    expect(parameterNameOf(' ${DEPLOY_KEY} ')).toBe('DEPLOY_KEY');
    expect(parameterNameOf('deploy-key')).toBeNull();
  });

  it('rejects reserved and whitespace ids', () => {
    expect(validateCredentialId('${X}').ok).toBe(false);
    expect(validateCredentialId('a b').ok).toBe(false);
    expect(validateCredentialId(' ok-id ')).toEqual({ ok: true, value: 'ok-id' });
  });
});

describe('createCredential', () => {
  it('generates an id when none is given and defaults to GLOBAL', () => {
    const credential = createCredential({ type: 'secret-text', secret });
    expect(credential.id).toMatch(/^[A-Za-z0-9_-]{21}$/);
    expect(credential.scope).toBe('GLOBAL');
    expect(Object.isFrozen(credential)).toBe(true);
  });

  it('throws ValidationError for a reserved id', () => {
    expect(() => createCredential({ id: '${P}', type: 'secret-text', secret })).toThrow(
      ValidationError,
    );
  });

  it('names credentials by description, then username, then id', () => {
    expect(credentialName(createCredential({ id: 'a', type: 't', secret, description: 'Deploy' }))).toBe('Deploy');
    expect(
      credentialName(createCredential({ id: 'a', type: 't', secret, properties: { username: 'bob' } })),
    ).toBe('bob');
    expect(credentialName(createCredential({ id: 'a', type: 't', secret }))).toBe('a');
  });
});

describe('credential types', () => {
  it('follows the parent chain', () => {
    expect(typeLineage('username-password')).toEqual(['username-password', 'standard', 'credential']);
    expect(isAssignableType('username-password', 'standard')).toBe(true);
    expect(isAssignableType('standard', 'username-password')).toBe(false);
  });

  it('treats unknown tags as children of the root only', () => {
    expect(typeLineage('plugin-token')).toEqual(['plugin-token', 'credential']);
    expect(isAssignableType('plugin-token', 'credential')).toBe(true);
    expect(isAssignableType('plugin-token', 'standard')).toBe(false);
  });
});
