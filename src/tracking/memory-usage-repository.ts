/**
 * In-process UsageRepository. Records live as long as the process.
 */
import type { UsageRecord, UsageRepository } from './types.js';

function keyOf(fingerprint: string, contextId: string): string {
  return `${fingerprint}\u0000${contextId}`;
}

export function createInMemoryUsageRepository(): UsageRepository {
  const records = new Map<string, UsageRecord>();

  return {
    find(fingerprint: string, contextId: string): Promise<UsageRecord | null> {
      const record = records.get(keyOf(fingerprint, contextId));
      return Promise.resolve(record ? { ...record } : null);
    },

    save(record: UsageRecord): Promise<UsageRecord> {
      records.set(keyOf(record.fingerprint, record.contextId), { ...record });
      return Promise.resolve({ ...record });
    },

    listByFingerprint(fingerprint: string): Promise<UsageRecord[]> {
      const matches = [...records.values()]
        .filter((r) => r.fingerprint === fingerprint)
        .sort((a, b) => a.firstUsedAt.getTime() - b.firstUsedAt.getTime())
        .map((r) => ({ ...r }));
      return Promise.resolve(matches);
    },
  };
}
