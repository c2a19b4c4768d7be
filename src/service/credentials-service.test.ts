/**
 * Tests for the CredentialsService wiring.
 */
import { describe, it, expect } from 'vitest';
import { createCredentialsService } from './credentials-service.js';
import type { CredentialsService } from './credentials-service.js';
import { credentialsConfigSchema } from '@/config/schema.js';
import { StoreNotModifiableError } from '@/core/errors.js';
import { SYSTEM_PRINCIPAL } from '@/core/types.js';
import { GLOBAL_DOMAIN } from '@/domains/domain.js';
import { createRemoteProvider } from '@/providers/remote-provider.js';
import { createCredentialsStore } from '@/stores/credentials-store.js';
import { emptyDomainCredentialsMap } from '@/stores/domain-credentials.js';
import { createInMemoryUsageRepository } from '@/tracking/memory-usage-repository.js';
import { createTestCredential, createTestVault } from '@/testing/fixtures/credentials.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createTestWorld } from '@/testing/fixtures/world.js';
import type { TestWorld } from '@/testing/fixtures/world.js';

function setup(): { world: TestWorld; service: CredentialsService } {
  const world = createTestWorld();
  const service = createCredentialsService({
    registry: world.registry,
    policy: world.policy,
    vault: createTestVault(),
    usageRepository: createInMemoryUsageRepository(),
    diagnostics: world.diagnostics,
    logger: createMockLogger(),
    env: {},
  });
  return { world, service };
}

describe('createCredentialsService', () => {
  it('lists as the default principal of the context', async () => {
    const { world, service } = setup();
    await service.initialize();

    const atJob = await service.list('credential', world.buildJob);
    const atRoot = await service.list('credential', world.root);

    expect(atJob.map((c) => c.id)).toEqual(['shared', 'folder-only', 'web']);
    expect(atRoot.map((c) => c.id)).toEqual(['sys-1', 'shared', 'web']);
  });

  it('finds by id and exposes the miss through diagnostics only', async () => {
    const { world, service } = setup();

    expect((await service.findById('folder-only', 'credential', world.buildJob))?.id).toBe('folder-only');
    expect(await service.findById('sys-1', 'credential', world.buildJob)).toBeNull();
    expect(service.diagnostics('not-found').map((e) => e.message)).toEqual([
      'No credential "sys-1" for "SYSTEM" at "team/build"',
    ]);
  });

  it('resolves execution parameters through the binder', async () => {
    const { world, service } = setup();
    const execution = {
      id: 'exec-42',
      job: world.buildJob,
      triggeredBy: 'alice',
      parameters: [{ name: 'TOKEN', value: 'alice-key', credentialTyped: true }],
    };

    const found = await service.findForExecution(execution, '${TOKEN}', 'credential');

    expect(found?.id).toBe('alice-key');
    expect(service.binderFor(execution).lookup('TOKEN')).toEqual({
      parameterName: 'TOKEN',
      userId: 'alice',
      credentialId: 'alice-key',
      isDefault: false,
    });
    expect(service.discardExecution('exec-42')).toBe(true);
    expect(service.discardExecution('exec-42')).toBe(false);
  });

  it('tracks each secret access once and previews without tracking', async () => {
    const { world, service } = setup();
    const credential = createTestCredential({ id: 'api', plaintext: 'test-secret' });

    const preview = await service.accessSecret(credential, world.buildJob, { preview: true });
    const first = await service.accessSecret(credential, world.buildJob);
    const second = await service.accessSecret(credential, world.buildJob);

    expect(preview).toEqual({ ok: true, value: { value: 'test-secret', tracked: false } });
    expect(first).toEqual({ ok: true, value: { value: 'test-secret', tracked: true } });
    expect(second.ok && second.value.tracked).toBe(true);
    const usages = await service.usagesOf(credential);
    expect(usages.map((u) => u.contextId)).toEqual(['team/build']);
  });

  it('tracks credentials per context idempotently', async () => {
    const { world, service } = setup();
    const credential = createTestCredential({ id: 'api' });

    await service.trackAll(world.buildJob, [credential, credential]);
    await service.track(world.deployJob, credential);

    const usages = await service.usagesOf(credential);
    expect(usages.map((u) => u.contextId).sort()).toEqual(['team/build', 'team/deploy']);
  });

  it('applies and describes configuration', async () => {
    const { service } = setup();
    const config = credentialsConfigSchema.parse({
      system: {
        domainCredentials: [
          { credentials: [{ id: 'deploy-token', type: 'secret-text', secret: { plaintext: 'test-secret' } }] },
        ],
      },
    });

    const applied = await service.applyConfiguration(config);
    const described = await service.describeConfiguration();

    expect(applied.ok && applied.value.map((s) => s.storeId)).toEqual(['system']);
    expect(described.system?.domainCredentials).toEqual([
      {
        domain: { name: null, description: null, specifications: [] },
        credentials: [{ id: 'deploy-token', scope: 'GLOBAL', type: 'secret-text', description: '', properties: {} }],
      },
    ]);
  });

  it('looks up stores and scopes along the walk', async () => {
    const { world, service } = setup();

    expect((await service.lookupStores(world.buildJob)).map((s) => s.id)).toEqual([
      'context:team/build',
      'context:team',
      'system',
    ]);
    expect(await service.lookupScopes(world.root)).toEqual(['SYSTEM', 'GLOBAL']);
    expect(await service.lookupScopes(world.buildJob)).toEqual(['GLOBAL']);
  });

  it('hands out modifiable stores and refuses read-only ones', async () => {
    const { world, service } = setup();
    world.registry.register(
      createRemoteProvider({
        root: world.root,
        source: { id: 'vault', fetchDomainCredentials: () => Promise.resolve([]) },
        policy: world.policy,
        logger: createMockLogger(),
      }),
    );

    expect((await service.modifiableStore(world.buildJob, 'context:team'))?.id).toBe('context:team');
    expect(await service.modifiableStore(world.buildJob, 'missing')).toBeNull();
    const refused = service.modifiableStore(world.root, 'remote:vault');
    await expect(refused).rejects.toBeInstanceOf(StoreNotModifiableError);
    await expect(refused).rejects.toThrow('Store "remote:vault" does not support modification');
  });

  it('waits for pending writes on shutdown', async () => {
    const { world, service } = setup();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const store = createCredentialsStore({
      id: 'gated:root',
      providerId: 'gated',
      context: world.root,
      scopes: ['GLOBAL'],
      policy: world.policy,
      persistence: {
        load: () => Promise.resolve(emptyDomainCredentialsMap()),
        save: () => gate,
      },
      logger: createMockLogger(),
    });
    world.registry.register({
      id: 'gated',
      displayName: 'Gated',
      priority: 0,
      scopes: ['GLOBAL'],
      isEnabled: () => true,
      storesFor: () => Promise.resolve([store]),
      openStores: () => [store],
    });

    const pending = store.addCredentials(SYSTEM_PRINCIPAL, GLOBAL_DOMAIN, createTestCredential({ id: 'late' }));
    let done = false;
    const shutdown = service.shutdown().then(() => {
      done = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(done).toBe(false);
    release();
    await shutdown;
    expect(done).toBe(true);
    expect(await pending).toBe(true);
  });
});
