/**
 * Tests for JSON file persistence, against a temporary directory.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createJsonFilePersistence } from './persistence.js';
import { toDomainCredentialsMap } from './domain-credentials.js';
import { GLOBAL_DOMAIN, createDomain } from '@/domains/domain.js';
import { hostnameSpecification } from '@/domains/specifications.js';
import { createDiagnostics } from '@/observability/diagnostics.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createTestCredential } from '@/testing/fixtures/credentials.js';

describe('createJsonFilePersistence', () => {
  let dir: string;
  let diagnostics: Diagnostics;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'credentials-store-'));
    diagnostics = createDiagnostics();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function persistenceAt(fileName: string) {
    return createJsonFilePersistence({
      filePath: join(dir, 'stores', fileName),
      storeId: 'system:root',
      logger: createMockLogger(),
      diagnostics,
    });
  }

  it('loads a missing file as an empty map', async () => {
    const map = await persistenceAt('missing.json').load();
    expect([...map.keys()]).toEqual([null]);
    expect(diagnostics.list()).toEqual([]);
  });

  it('saves and loads domains, specifications and sealed secrets', async () => {
    const persistence = persistenceAt('root.json');
    const credential = createTestCredential({ id: 'gh', properties: { username: 'bot' } });
    const github = createDomain('github', 'GitHub', [hostnameSpecification('github.com')]);

    await persistence.save(
      toDomainCredentialsMap([
        { domain: GLOBAL_DOMAIN, credentials: [] },
        { domain: github, credentials: [credential] },
      ]),
    );
    const loaded = await persistence.load();

    expect([...loaded.keys()]).toEqual([null, 'github']);
    const entry = loaded.get('github');
    expect(entry?.domain.description).toBe('GitHub');
    expect(entry?.domain.specifications.map((s) => s.toData())).toEqual([
      { type: 'hostname', includes: 'github.com', excludes: null },
    ]);
    expect(entry?.credentials[0]).toEqual(credential);
  });

  it('writes atomically without leaving temporary files', async () => {
    const persistence = persistenceAt('root.json');
    await persistence.save(toDomainCredentialsMap([{ domain: GLOBAL_DOMAIN, credentials: [] }]));

    expect(await readdir(join(dir, 'stores'))).toEqual(['root.json']);
    const written: unknown = JSON.parse(await readFile(join(dir, 'stores', 'root.json'), 'utf-8'));
    expect(written).toEqual({
      version: 1,
      domainCredentials: [
        { domain: { name: null, description: null, specifications: [] }, credentials: [] },
      ],
    });
  });

  it('removes the temporary file when the final rename fails', async () => {
    // A non-empty directory at the target path makes the rename fail.
    await mkdir(join(dir, 'stores', 'taken.json'), { recursive: true });
    await writeFile(join(dir, 'stores', 'taken.json', 'keep'), '', 'utf-8');

    await expect(
      persistenceAt('taken.json').save(toDomainCredentialsMap([{ domain: GLOBAL_DOMAIN, credentials: [] }])),
    ).rejects.toThrow();
    expect(await readdir(join(dir, 'stores'))).toEqual(['taken.json']);
  });

  it('loads malformed JSON as empty and records a diagnostic', async () => {
    await persistenceAt('root.json').save(new Map());
    await writeFile(join(dir, 'stores', 'root.json'), '{ not json', 'utf-8');

    const map = await persistenceAt('root.json').load();

    expect([...map.keys()]).toEqual([null]);
    const events = diagnostics.list('corrupt-state');
    expect(events).toHaveLength(1);
    expect(events[0]?.message).toBe('Store "system:root" loaded as empty: invalid JSON');
  });

  it('loads content with the wrong layout as empty', async () => {
    await persistenceAt('root.json').save(new Map());
    await writeFile(
      join(dir, 'stores', 'root.json'),
      JSON.stringify({ version: 2, domainCredentials: [] }),
      'utf-8',
    );

    const map = await persistenceAt('root.json').load();

    expect(map.get(null)?.credentials).toEqual([]);
    expect(diagnostics.list('corrupt-state')[0]?.message).toBe(
      'Store "system:root" loaded as empty: Persisted store does not match the expected layout',
    );
  });

  it('rejects reserved credential ids on load', async () => {
    await persistenceAt('root.json').save(new Map());
    await writeFile(
      join(dir, 'stores', 'root.json'),
      JSON.stringify({
        version: 1,
        domainCredentials: [
          {
            domain: { name: null },
            credentials: [
              {
                id: '${TOKEN}',
                scope: 'GLOBAL',
                type: 'secret-text',
                secret: { kind: 'external', source: 'remote', key: 'k' },
              },
            ],
          },
        ],
      }),
      'utf-8',
    );

    await persistenceAt('root.json').load();

    expect(diagnostics.list('corrupt-state')).toHaveLength(1);
  });
});
