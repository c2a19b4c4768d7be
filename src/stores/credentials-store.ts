/**
 * Domain credentials store — the modifiable store behind the built-in
 * providers.
 *
 * Reads go against the current immutable map. Mutations run one at a time
 * through a promise chain, build a new map, persist it, and only then swap
 * it in; a failed write leaves the previous map in place.
 */
import { PermissionDeniedError } from '@/core/errors.js';
import type { CredentialsContext, Permission, Principal } from '@/core/types.js';
import type { Credential } from '@/credentials/types.js';
import { GLOBAL_DOMAIN } from '@/domains/domain.js';
import type { Domain } from '@/domains/types.js';
import type { Logger } from '@/observability/logger.js';
import type { CredentialsScope } from '@/scopes/scope.js';
import { visibleScopes } from '@/scopes/scope.js';
import type { AccessPolicy } from '@/security/access-policy.js';

import { countCredentials } from './domain-credentials.js';
import type {
  DomainCredentials,
  DomainCredentialsMap,
  ModifiableCredentialsStore,
  StorePersistence,
} from './types.js';

export interface CredentialsStoreOptions {
  id: string;
  providerId: string;
  context: CredentialsContext;
  /** Scopes the owning provider supports. */
  scopes: readonly CredentialsScope[];
  policy: AccessPolicy;
  persistence: StorePersistence;
  logger: Logger;
  ownerId?: string | null;
}

/** Every map a store holds has the global domain, first unless it was added later. */
function withGlobalDomain(map: DomainCredentialsMap): DomainCredentialsMap {
  if (map.has(null)) return map;
  return new Map<string | null, DomainCredentials>([
    [null, { domain: GLOBAL_DOMAIN, credentials: [] }],
    ...map,
  ]);
}

/** Create a modifiable store over `persistence`. State is loaded on first use. */
export function createCredentialsStore(options: CredentialsStoreOptions): ModifiableCredentialsStore {
  const { id, providerId, context, policy, persistence } = options;
  const ownerId = options.ownerId ?? null;
  const logger = options.logger.child({ component: 'credentials-store', storeId: id });

  let current: DomainCredentialsMap = new Map();
  let loading: Promise<void> | null = null;
  let queue: Promise<void> = Promise.resolve();

  async function loadFromPersistence(): Promise<void> {
    current = withGlobalDomain(await persistence.load());
    logger.debug('Loaded store', {
      component: 'credentials-store',
      contextId: context.id,
      domains: current.size,
      credentials: countCredentials(current),
    });
  }

  function ensureLoaded(): Promise<void> {
    loading ??= loadFromPersistence().catch((error: unknown) => {
      loading = null;
      throw error;
    });
    return loading;
  }

  /** Run `task` after every mutation queued before it. */
  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    // The chain only orders work; each caller sees its own failure through `run`.
    queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  function hasPermission(principal: Principal, permission: Permission): boolean {
    if (principal.kind === 'system') return true;
    if (ownerId !== null && principal.id !== ownerId) return false;
    return policy.hasPermission(principal, permission, context);
  }

  function requirePermission(principal: Principal, permission: Permission): void {
    if (!hasPermission(principal, permission)) {
      throw new PermissionDeniedError(principal.id, permission, `store "${id}"`);
    }
  }

  /**
   * Check, compute and commit one mutation. `change` returns the next map,
   * or null when there is nothing to do.
   */
  async function mutate(
    principal: Principal,
    permission: Permission,
    operation: string,
    change: (map: DomainCredentialsMap) => DomainCredentialsMap | null,
  ): Promise<boolean> {
    requirePermission(principal, permission);
    return serialize(async () => {
      await ensureLoaded();
      const next = change(current);
      if (next === null) return false;
      await persistence.save(next);
      current = next;
      logger.info('Store updated', {
        component: 'credentials-store',
        operation,
        principalId: principal.id,
      });
      return true;
    });
  }

  function withEntry(
    map: DomainCredentialsMap,
    name: string | null,
    credentials: readonly Credential[],
  ): DomainCredentialsMap {
    const next = new Map(map);
    const entry = next.get(name);
    if (entry) next.set(name, { domain: entry.domain, credentials });
    return next;
  }

  return {
    id,
    providerId,
    context,
    ownerId,
    modifiable: true,

    getScopes: () => visibleScopes(options.scopes, context),
    hasPermission,

    async getDomains(): Promise<Domain[]> {
      await ensureLoaded();
      return [...current.values()].map((entry) => entry.domain);
    },

    async getCredentials(domain: Domain): Promise<Credential[]> {
      await ensureLoaded();
      return [...(current.get(domain.name)?.credentials ?? [])];
    },

    async snapshot(): Promise<DomainCredentialsMap> {
      await ensureLoaded();
      return current;
    },

    addDomain(principal, domain, credentials = []) {
      return mutate(principal, 'manageDomains', 'addDomain', (map) => {
        const entry = map.get(domain.name);
        if (!entry) {
          return new Map(map).set(domain.name, { domain, credentials: [...credentials] });
        }
        const additions = credentials.filter(
          (c) => !entry.credentials.some((existing) => existing.id === c.id),
        );
        if (additions.length === 0) return null;
        return withEntry(map, domain.name, [...entry.credentials, ...additions]);
      });
    },

    removeDomain(principal, domain) {
      return mutate(principal, 'manageDomains', 'removeDomain', (map) => {
        if (!map.has(domain.name)) return null;
        const next = new Map(map);
        next.delete(domain.name);
        return next;
      });
    },

    updateDomain(principal, existing, replacement) {
      return mutate(principal, 'manageDomains', 'updateDomain', (map) => {
        const entry = map.get(existing.name);
        if (!entry) return null;
        // Renaming onto another domain would silently drop its credentials.
        if (replacement.name !== existing.name && map.has(replacement.name)) return null;
        const next = new Map<string | null, DomainCredentials>();
        for (const [name, value] of map) {
          if (name === existing.name) {
            next.set(replacement.name, { domain: replacement, credentials: value.credentials });
          } else {
            next.set(name, value);
          }
        }
        return next;
      });
    },

    addCredentials(principal, domain, credential) {
      return mutate(principal, 'create', 'addCredentials', (map) => {
        const entry = map.get(domain.name);
        if (!entry || entry.credentials.some((c) => c.id === credential.id)) return null;
        return withEntry(map, domain.name, [...entry.credentials, credential]);
      });
    },

    removeCredentials(principal, domain, credential) {
      return mutate(principal, 'delete', 'removeCredentials', (map) => {
        const entry = map.get(domain.name);
        if (!entry || !entry.credentials.some((c) => c.id === credential.id)) return null;
        return withEntry(
          map,
          domain.name,
          entry.credentials.filter((c) => c.id !== credential.id),
        );
      });
    },

    updateCredentials(principal, domain, existing, replacement) {
      return mutate(principal, 'update', 'updateCredentials', (map) => {
        const entry = map.get(domain.name);
        if (!entry) return null;
        const index = entry.credentials.findIndex((c) => c.id === existing.id);
        if (index === -1) return null;
        const clash = entry.credentials.some(
          (c, i) => i !== index && c.id === replacement.id,
        );
        if (clash) return null;
        const credentials = [...entry.credentials];
        credentials[index] = replacement;
        return withEntry(map, domain.name, credentials);
      });
    },

    async replaceDomainCredentials(principal, next) {
      await mutate(principal, 'manageDomains', 'replaceDomainCredentials', () =>
        withGlobalDomain(next),
      );
    },

    async transformDomainCredentials(principal, transform) {
      await mutate(principal, 'manageDomains', 'transformDomainCredentials', (map) =>
        withGlobalDomain(transform(map)),
      );
    },

    reload() {
      return serialize(async () => {
        loading = null;
        await ensureLoaded();
        logger.info('Store reloaded', { component: 'credentials-store', contextId: context.id });
      });
    },

    flush() {
      return queue;
    },
  };
}
