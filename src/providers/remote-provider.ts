/**
 * Remote provider — a read-only GLOBAL store at the root whose contents come
 * from a remote source. Every read is a bounded remote call; nothing is cached.
 */
import { isSameContext } from '@/contexts/context.js';
import { withTimeout } from '@/core/timeout.js';
import type { CredentialsContext, Permission, Principal } from '@/core/types.js';
import type { Credential } from '@/credentials/types.js';
import type { Domain } from '@/domains/types.js';
import type { Logger } from '@/observability/logger.js';
import type { CredentialsScope } from '@/scopes/scope.js';
import { visibleScopes } from '@/scopes/scope.js';
import type { AccessPolicy } from '@/security/access-policy.js';
import { toDomainCredentialsMap } from '@/stores/domain-credentials.js';
import type { CredentialsStore, DomainCredentials, DomainCredentialsMap } from '@/stores/types.js';

import type { CredentialsProvider } from './types.js';

export interface RemoteCredentialsSource {
  readonly id: string;
  fetchDomainCredentials(signal: AbortSignal): Promise<DomainCredentials[]>;
}

export interface RemoteProviderOptions {
  root: CredentialsContext;
  source: RemoteCredentialsSource;
  policy: AccessPolicy;
  logger: Logger;
  /** Bound on each remote read. Default: 5000ms. */
  timeoutMs?: number;
  priority?: number;
  /** Provider id. Default: `remote:<source id>`. */
  id?: string;
}

const REMOTE_SCOPES: readonly CredentialsScope[] = ['GLOBAL'];

export function createRemoteProvider(options: RemoteProviderOptions): CredentialsProvider {
  const { root, source, policy } = options;
  const providerId = options.id ?? `remote:${source.id}`;
  const timeoutMs = options.timeoutMs ?? 5000;
  const logger = options.logger.child({ component: 'remote-provider', providerId });

  async function fetchMap(signal?: AbortSignal): Promise<DomainCredentialsMap> {
    const list = await withTimeout(
      `Remote source "${source.id}"`,
      timeoutMs,
      (abortSignal) => source.fetchDomainCredentials(abortSignal),
      signal,
    );
    logger.debug('Fetched remote credentials', {
      component: 'remote-provider',
      domains: list.length,
    });
    return toDomainCredentialsMap(list);
  }

  const store: CredentialsStore = {
    id: providerId,
    providerId,
    context: root,
    ownerId: null,
    modifiable: false,
    getScopes: () => visibleScopes(REMOTE_SCOPES, root),
    hasPermission: (principal: Principal, permission: Permission) =>
      principal.kind === 'system' || policy.hasPermission(principal, permission, root),

    async getDomains(signal?: AbortSignal): Promise<Domain[]> {
      return [...(await fetchMap(signal)).values()].map((entry) => entry.domain);
    },
    async getCredentials(domain: Domain, signal?: AbortSignal): Promise<Credential[]> {
      return [...((await fetchMap(signal)).get(domain.name)?.credentials ?? [])];
    },
    snapshot: fetchMap,
  };

  return {
    id: providerId,
    displayName: `Remote (${source.id})`,
    priority: options.priority ?? 50,
    scopes: REMOTE_SCOPES,
    isEnabled: () => true,
    storesFor(context: CredentialsContext): Promise<CredentialsStore[]> {
      return Promise.resolve(isSameContext(context, root) ? [store] : []);
    },
  };
}
