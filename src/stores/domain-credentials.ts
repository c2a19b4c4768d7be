/**
 * Pure operations on domain → credentials maps. Every function returns a new
 * map and leaves its inputs untouched.
 */
import type { Credential } from '@/credentials/types.js';
import { GLOBAL_DOMAIN } from '@/domains/domain.js';

import type { DomainCredentials, DomainCredentialsMap } from './types.js';

/** A map holding only the (empty) global domain. */
export function emptyDomainCredentialsMap(): DomainCredentialsMap {
  return new Map<string | null, DomainCredentials>([
    [null, { domain: GLOBAL_DOMAIN, credentials: [] }],
  ]);
}

/** Replace credentials by id in place, append the rest. */
export function mergeCredentialLists(
  existing: readonly Credential[],
  incoming: readonly Credential[],
): Credential[] {
  const merged = [...existing];
  for (const credential of incoming) {
    const index = merged.findIndex((c) => c.id === credential.id);
    if (index === -1) {
      merged.push(credential);
    } else {
      merged[index] = credential;
    }
  }
  return merged;
}

/**
 * Fold one entry into a map: the entry's domain metadata replaces the
 * existing one, its credentials are merged by id.
 */
export function mergeDomainEntry(
  map: DomainCredentialsMap,
  entry: DomainCredentials,
): DomainCredentialsMap {
  const next = new Map(map);
  const current = next.get(entry.domain.name);
  next.set(entry.domain.name, {
    domain: entry.domain,
    credentials: mergeCredentialLists(current?.credentials ?? [], entry.credentials),
  });
  return next;
}

/**
 * Build a map from a list. Repeated domain names are merged in iteration
 * order, so the last occurrence wins.
 */
export function toDomainCredentialsMap(list: readonly DomainCredentials[]): DomainCredentialsMap {
  return list.reduce<DomainCredentialsMap>(
    (map, entry) => mergeDomainEntry(map, entry),
    new Map<string | null, DomainCredentials>(),
  );
}

export function countCredentials(map: DomainCredentialsMap): number {
  let total = 0;
  for (const entry of map.values()) total += entry.credentials.length;
  return total;
}
