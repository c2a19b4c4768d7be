/**
 * Merge engine — how configured domain credentials combine with what a
 * store already holds.
 */
import { mergeDomainEntry } from '@/stores/domain-credentials.js';
import type { DomainCredentialsMap } from '@/stores/types.js';

export { toDomainCredentialsMap } from '@/stores/domain-credentials.js';

export type MergeStrategy = 'merge' | 'replace';

export const MERGE_STRATEGY_ENV = 'CREDENTIALS_MERGE_STRATEGY';

/**
 * Fold `incoming` into `existing`. Domains join by name and take the
 * incoming metadata; credentials are replaced in place by id or appended.
 * Domains and credentials only `existing` holds are kept, so applying the
 * same input twice changes nothing the second time.
 */
export function mergeDomainCredentials(
  existing: DomainCredentialsMap,
  incoming: DomainCredentialsMap,
): DomainCredentialsMap {
  let merged = existing;
  for (const entry of incoming.values()) {
    merged = mergeDomainEntry(merged, entry);
  }
  return merged;
}

export function replaceDomainCredentials(
  _existing: DomainCredentialsMap,
  incoming: DomainCredentialsMap,
): DomainCredentialsMap {
  return incoming;
}

export function applyMergeStrategy(
  strategy: MergeStrategy,
  existing: DomainCredentialsMap,
  incoming: DomainCredentialsMap,
): DomainCredentialsMap {
  return strategy === 'merge'
    ? mergeDomainCredentials(existing, incoming)
    : replaceDomainCredentials(existing, incoming);
}

/**
 * `merge` (any case) selects merging, anything else replacing. An explicit
 * property wins over the environment.
 */
export function resolveMergeStrategy(
  property: string | undefined,
  env: Readonly<Record<string, string | undefined>> = process.env,
): MergeStrategy {
  const value = property ?? env[MERGE_STRATEGY_ENV];
  return value?.trim().toLowerCase() === 'merge' ? 'merge' : 'replace';
}
