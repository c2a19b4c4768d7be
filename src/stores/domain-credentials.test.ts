import { describe, it, expect } from 'vitest';
import { countCredentials, mergeCredentialLists, toDomainCredentialsMap } from './domain-credentials.js';
import { GLOBAL_DOMAIN, createDomain } from '@/domains/domain.js';
import { createTestCredential } from '@/testing/fixtures/credentials.js';

describe('mergeCredentialLists', () => {
  it('replaces by id in place and appends new ids', () => {
    const merged = mergeCredentialLists(
      [createTestCredential({ id: 'a', description: 'old' }), createTestCredential({ id: 'b' })],
      [createTestCredential({ id: 'c' }), createTestCredential({ id: 'a', description: 'new' })],
    );
    expect(merged.map((c) => [c.id, c.description])).toEqual([
      ['a', 'new'],
      ['b', ''],
      ['c', ''],
    ]);
  });
});

describe('toDomainCredentialsMap', () => {
  it('merges repeated domain names with the last occurrence winning', () => {
    const first = createDomain('github', 'first');
    const second = createDomain('github', 'second');
    const map = toDomainCredentialsMap([
      { domain: first, credentials: [createTestCredential({ id: 'a', description: 'one' })] },
      { domain: GLOBAL_DOMAIN, credentials: [] },
      { domain: second, credentials: [createTestCredential({ id: 'a', description: 'two' })] },
    ]);

    expect([...map.keys()]).toEqual(['github', null]);
    expect(map.get('github')?.domain.description).toBe('second');
    expect(map.get('github')?.credentials.map((c) => c.description)).toEqual(['two']);
    expect(countCredentials(map)).toBe(1);
  });
});
