/**
 * Tests for the ProviderRegistry — ordering, enablement, filters and timeouts.
 */
import { describe, it, expect, vi } from 'vitest';
import { createProviderRegistry } from './registry.js';
import type { CredentialsProvider, SelectionFilter, ProviderTypeRestriction } from './types.js';
import { ProviderMissingError, ValidationError } from '@/core/errors.js';
import { createFolderContext, createRootContext } from '@/contexts/context.js';
import { createDiagnostics } from '@/observability/diagnostics.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import { createGrantAccessPolicy } from '@/security/access-policy.js';
import { createCredentialsStore } from '@/stores/credentials-store.js';
import { createMemoryPersistence } from '@/stores/persistence.js';
import type { CredentialsStore } from '@/stores/types.js';
import type { CredentialsScope } from '@/scopes/scope.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

const root = createRootContext();

function storeFor(providerId: string, scopes: CredentialsScope[] = ['GLOBAL']): CredentialsStore {
  return createCredentialsStore({
    id: `${providerId}:root`,
    providerId,
    context: root,
    scopes,
    policy: createGrantAccessPolicy([]),
    persistence: createMemoryPersistence(),
    logger: createMockLogger(),
  });
}

function createProvider(
  id: string,
  overrides?: Partial<CredentialsProvider> & { store?: CredentialsStore },
): CredentialsProvider {
  const store = overrides?.store ?? storeFor(id);
  return {
    id,
    displayName: id,
    priority: 0,
    scopes: ['GLOBAL'],
    isEnabled: () => true,
    storesFor: () => Promise.resolve([store]),
    ...overrides,
  };
}

function createRegistry(options?: {
  diagnostics?: Diagnostics;
  timeoutMs?: number;
  providerFilter?: SelectionFilter;
  typeFilter?: SelectionFilter;
  typeRestrictions?: ProviderTypeRestriction[];
}) {
  return createProviderRegistry({
    logger: createMockLogger(),
    diagnostics: options?.diagnostics ?? createDiagnostics(),
    ...options,
  });
}

describe('ProviderRegistry', () => {
  describe('registration', () => {
    it('orders by priority, ties by registration order', () => {
      const registry = createRegistry();
      registry.register(createProvider('low', { priority: 1 }));
      registry.register(createProvider('high-a', { priority: 10 }));
      registry.register(createProvider('high-b', { priority: 10 }));

      expect(registry.list().map((p) => p.id)).toEqual(['high-a', 'high-b', 'low']);
    });

    it('rejects a duplicate id', () => {
      const registry = createRegistry();
      registry.register(createProvider('a'));
      expect(() => registry.register(createProvider('a'))).toThrow(ValidationError);
    });

    it('unregisters and reports a missing provider for its stores', () => {
      const registry = createRegistry();
      const store = storeFor('gone');
      registry.register(createProvider('gone', { store }));
      expect(registry.providerOf(store).id).toBe('gone');

      expect(registry.unregister('gone')).toBe(true);
      expect(registry.unregister('gone')).toBe(false);
      expect(registry.get('gone')).toBeNull();
      expect(() => registry.providerOf(store)).toThrow(ProviderMissingError);
    });
  });

  describe('storesFor', () => {
    it('collects stores of enabled providers in priority order', async () => {
      const registry = createRegistry();
      registry.register(createProvider('second', { priority: 1 }));
      registry.register(createProvider('first', { priority: 5 }));
      registry.register(createProvider('off', { priority: 9, isEnabled: () => false }));

      const stores = await registry.storesFor(root);
      expect(stores.map((s) => s.providerId)).toEqual(['first', 'second']);
    });

    it('honours the provider filter', async () => {
      const registry = createRegistry({ providerFilter: { kind: 'excludes', ids: ['b'] } });
      registry.register(createProvider('a'));
      registry.register(createProvider('b'));

      expect((await registry.storesFor(root)).map((s) => s.providerId)).toEqual(['a']);
    });

    it('skips a failing provider and records a diagnostic', async () => {
      const diagnostics = createDiagnostics();
      const registry = createRegistry({ diagnostics });
      registry.register(
        createProvider('broken', { storesFor: () => Promise.reject(new Error('boom')) }),
      );
      registry.register(createProvider('ok'));

      expect((await registry.storesFor(root)).map((s) => s.providerId)).toEqual(['ok']);
      expect(diagnostics.list('provider-failure').map((e) => e.message)).toEqual([
        'Provider "broken" failed at "root"',
      ]);
    });

    it('bounds a slow provider without holding up the others', async () => {
      const diagnostics = createDiagnostics();
      const registry = createRegistry({ diagnostics, timeoutMs: 20 });
      const slow = vi.fn(
        (_context: unknown, signal: AbortSignal) =>
          new Promise<CredentialsStore[]>((_resolve, reject) => {
            signal.addEventListener('abort', () => {
              reject(new Error('aborted'));
            });
          }),
      );
      registry.register(createProvider('slow', { storesFor: slow, priority: 10 }));
      registry.register(createProvider('fast'));

      const stores = await registry.storesFor(root);

      expect(stores.map((s) => s.providerId)).toEqual(['fast']);
      expect(diagnostics.list('provider-failure').map((e) => e.message)).toEqual([
        'Provider "slow" timed out at "root"',
      ]);
    });
  });

  describe('lookupScopes', () => {
    it('lists the scopes offered at a context in canonical order', async () => {
      const registry = createRegistry();
      registry.register(createProvider('user-ish', { store: storeFor('user-ish', ['USER']) }));
      registry.register(createProvider('sys', { store: storeFor('sys', ['GLOBAL', 'SYSTEM']) }));

      expect(await registry.lookupScopes(root)).toEqual(['SYSTEM', 'GLOBAL', 'USER']);
    });

    it('drops SYSTEM below the root', async () => {
      const registry = createRegistry();
      const folder = createFolderContext(root, 'team');
      const folderStore = createCredentialsStore({
        id: 'f',
        providerId: 'sys',
        context: folder,
        scopes: ['SYSTEM', 'GLOBAL'],
        policy: createGrantAccessPolicy([]),
        persistence: createMemoryPersistence(),
        logger: createMockLogger(),
      });
      registry.register(createProvider('sys', { store: folderStore }));

      expect(await registry.lookupScopes(folder)).toEqual(['GLOBAL']);
    });
  });

  describe('type applicability', () => {
    it('applies provider type lists, restrictions and the global type filter', () => {
      const registry = createRegistry({
        typeFilter: { kind: 'excludes', ids: ['certificate'] },
        typeRestrictions: [{ providerId: 'narrow', mode: 'includes', types: ['secret-text'] }],
      });
      const narrow = createProvider('narrow');
      const keysOnly = createProvider('keys', { credentialTypes: ['ssh-private-key'] });
      registry.register(narrow);
      registry.register(keysOnly);

      expect(registry.isTypeAllowedFor(narrow, 'secret-text')).toBe(true);
      expect(registry.isTypeAllowedFor(narrow, 'username-password')).toBe(false);
      expect(registry.isTypeAllowedFor(keysOnly, 'ssh-private-key')).toBe(true);
      expect(registry.isTypeAllowedFor(keysOnly, 'secret-text')).toBe(false);
      expect(registry.isTypeApplicable('username-password')).toBe(false);
      expect(registry.isTypeApplicable('certificate')).toBe(false);
      expect(registry.isTypeApplicable('secret-text')).toBe(true);
    });

    it('ignores disabled providers', () => {
      const registry = createRegistry();
      registry.register(createProvider('off', { isEnabled: () => false }));
      expect(registry.isTypeApplicable('secret-text')).toBe(false);
    });
  });
});
