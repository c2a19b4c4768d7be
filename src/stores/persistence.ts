/**
 * Store persistence: one JSON file per store, or memory for stores that
 * live only as long as the process.
 */
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { nanoid } from 'nanoid';

import { systemErrorCode } from '@/core/errors.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import type { Logger } from '@/observability/logger.js';

import { emptyDomainCredentialsMap } from './domain-credentials.js';
import { mapFromStoreFile, storeFileFromMap } from './serialization.js';
import type { DomainCredentialsMap, StorePersistence } from './types.js';

// ─── Memory ─────────────────────────────────────────────────────

export function createMemoryPersistence(initial?: DomainCredentialsMap): StorePersistence {
  let saved: DomainCredentialsMap = initial ?? emptyDomainCredentialsMap();
  return {
    load: () => Promise.resolve(saved),
    save: (map) => {
      saved = map;
      return Promise.resolve();
    },
  };
}

// ─── JSON File ──────────────────────────────────────────────────

export interface JsonFilePersistenceOptions {
  filePath: string;
  storeId: string;
  logger: Logger;
  diagnostics: Diagnostics;
}

/**
 * Writes go to a temporary sibling first and are renamed into place, so a
 * crash mid-write leaves the previous file intact. Content that fails to
 * parse or validate loads as an empty store, with a warning and a
 * `corrupt-state` diagnostic.
 */
export function createJsonFilePersistence(options: JsonFilePersistenceOptions): StorePersistence {
  const { filePath, storeId, logger, diagnostics } = options;

  function corrupt(reason: string, details: Record<string, unknown>): DomainCredentialsMap {
    logger.warn('Persisted store is corrupt, loading it as empty', {
      component: 'store-persistence',
      storeId,
      filePath,
      reason,
    });
    diagnostics.record('corrupt-state', `Store "${storeId}" loaded as empty: ${reason}`, {
      storeId,
      filePath,
      ...details,
    });
    return emptyDomainCredentialsMap();
  }

  return {
    async load(): Promise<DomainCredentialsMap> {
      let content: string;
      try {
        content = await readFile(filePath, 'utf-8');
      } catch (error) {
        if (systemErrorCode(error) === 'ENOENT') {
          return emptyDomainCredentialsMap();
        }
        throw error;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(content);
      } catch (error) {
        return corrupt('invalid JSON', {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      const map = mapFromStoreFile(raw);
      if (!map.ok) {
        return corrupt(map.error.message, { ...map.error.context });
      }
      return map.value;
    },

    async save(map: DomainCredentialsMap): Promise<void> {
      await mkdir(dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.${nanoid(8)}.tmp`;
      try {
        await writeFile(tempPath, `${JSON.stringify(storeFileFromMap(map), null, 2)}\n`, 'utf-8');
        await rename(tempPath, filePath);
      } catch (error: unknown) {
        await rm(tempPath, { force: true });
        throw error;
      }
      logger.debug('Persisted store', { component: 'store-persistence', storeId, filePath });
    },
  };
}
