/**
 * Tests for the SecretAccessor — plaintext resolution and usage tracking.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createSecretAccessor } from './secret-accessor.js';
import type { ExternalSecretSource } from './types.js';
import { createRootContext } from '@/contexts/context.js';
import { createUsageTracker } from '@/tracking/usage-tracker.js';
import { createInMemoryUsageRepository } from '@/tracking/memory-usage-repository.js';
import type { UsageTracker } from '@/tracking/usage-tracker.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import {
  createExternalTestCredential,
  createTestCredential,
  createTestVault,
} from '@/testing/fixtures/credentials.js';

// ─── Helpers ────────────────────────────────────────────────────

function createSource(values: Record<string, string>): ExternalSecretSource {
  return {
    id: 'remote',
    fetch: vi.fn((key: string) => Promise.resolve(values[key] ?? null)),
  };
}

/** A source that only settles when aborted. */
function createHangingSource(): ExternalSecretSource {
  return {
    id: 'slow',
    fetch: (_key: string, signal: AbortSignal) =>
      new Promise<string | null>((_resolve, reject) => {
        signal.addEventListener('abort', () => {
          reject(new Error('aborted'));
        });
      }),
  };
}

// ─── Tests ───────────────────────────────────────────────────────

describe('SecretAccessor', () => {
  const root = createRootContext();
  let tracker: UsageTracker;

  beforeEach(() => {
    tracker = createUsageTracker({
      usageRepository: createInMemoryUsageRepository(),
      logger: createMockLogger(),
    });
  });

  it('returns the sealed plaintext and tracks exactly once', async () => {
    const accessor = createSecretAccessor({
      vault: createTestVault(),
      usageTracker: tracker,
      logger: createMockLogger(),
    });
    const credential = createTestCredential({ id: 'deploy', plaintext: 'test-secret' });

    const result = await accessor.access(credential, root);

    expect(result).toEqual({ ok: true, value: { value: 'test-secret', tracked: true } });
    const usages = await tracker.usagesOf(credential);
    expect(usages).toHaveLength(1);
    expect(usages[0]?.contextId).toBe('root');
  });

  it('does not track preview access', async () => {
    const accessor = createSecretAccessor({
      vault: createTestVault(),
      usageTracker: tracker,
      logger: createMockLogger(),
    });
    const credential = createTestCredential({ id: 'deploy' });

    const result = await accessor.access(credential, root, { preview: true });

    expect(result).toEqual({ ok: true, value: { value: 'test-secret', tracked: false } });
    expect(await tracker.usagesOf(credential)).toEqual([]);
  });

  it('reports an undecryptable secret as unavailable', async () => {
    const logger = createMockLogger();
    const accessor = createSecretAccessor({
      vault: {
        encrypt: vi.fn(),
        decrypt: () => {
          throw new Error('bad tag');
        },
      },
      usageTracker: tracker,
      logger,
    });

    const result = await accessor.access(createTestCredential({ id: 'deploy' }), root);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CREDENTIAL_UNAVAILABLE');
    expect(result.error.message).toBe(
      'Credential "deploy" is unavailable: sealed secret could not be decrypted',
    );
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('fetches external secrets from the named source', async () => {
    const source = createSource({ 'db/password': 'test-password' });
    const accessor = createSecretAccessor({
      vault: createTestVault(),
      usageTracker: tracker,
      logger: createMockLogger(),
      externalSources: [source],
    });

    const result = await accessor.access(
      createExternalTestCredential('db', 'remote', 'db/password'),
      root,
    );

    expect(result).toEqual({ ok: true, value: { value: 'test-password', tracked: true } });
  });

  it('reports a missing key and an unknown source', async () => {
    const accessor = createSecretAccessor({
      vault: createTestVault(),
      usageTracker: tracker,
      logger: createMockLogger(),
      externalSources: [createSource({})],
    });

    const missing = await accessor.access(createExternalTestCredential('a', 'remote', 'nope'), root);
    const unknown = await accessor.access(createExternalTestCredential('b', 'vault-x', 'k'), root);

    expect(missing.ok ? null : missing.error.message).toBe(
      'Credential "a" is unavailable: secret source "remote" has no such key',
    );
    expect(unknown.ok ? null : unknown.error.message).toBe(
      'Credential "b" is unavailable: unknown secret source "vault-x"',
    );
  });

  it('bounds slow external sources by the timeout', async () => {
    const accessor = createSecretAccessor({
      vault: createTestVault(),
      usageTracker: tracker,
      logger: createMockLogger(),
      externalSources: [createHangingSource()],
      timeoutMs: 20,
    });
    const credential = createExternalTestCredential('slow-one', 'slow', 'k');

    const result = await accessor.access(credential, root);

    expect(result.ok ? null : result.error.message).toBe(
      'Credential "slow-one" is unavailable: secret source timed out',
    );
    expect(await tracker.usagesOf(credential)).toEqual([]);
  });
});
