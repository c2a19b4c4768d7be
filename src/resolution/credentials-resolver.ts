/**
 * CredentialsResolver — answers which credentials a principal can use at a
 * context.
 *
 * The walk goes from the context up through its ancestors, nearest first,
 * and within each context through the stores in provider priority order.
 * The first credential seen for an id wins. Stores the principal may not
 * read and stores that fail are skipped; the caller only ever sees fewer
 * results, the reasons go to diagnostics.
 */
import { ancestry, createUserContext, isJobContext } from '@/contexts/context.js';
import type { CredentialsContext, Principal } from '@/core/types.js';
import { SYSTEM_PRINCIPAL } from '@/core/types.js';
import { isAssignableType } from '@/credentials/credential-types.js';
import type { Credential } from '@/credentials/types.js';
import { matchesDomain } from '@/domains/domain.js';
import type { DomainRequirement } from '@/domains/types.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import type { Logger } from '@/observability/logger.js';
import type { ProviderRegistry } from '@/providers/registry.js';
import { isScopeVisible } from '@/scopes/scope.js';
import type { CredentialsStore } from '@/stores/types.js';

import { always, withId } from './matchers.js';
import type { ListOptions } from './types.js';

export interface CredentialsResolver {
  listCredentials(
    type: string,
    context: CredentialsContext,
    principal: Principal,
    options?: ListOptions,
  ): Promise<Credential[]>;

  /** Resolve as the context's default principal. Null when nothing matches. */
  findById(
    id: string,
    type: string,
    context: CredentialsContext,
    requirements?: readonly DomainRequirement[],
    signal?: AbortSignal,
  ): Promise<Credential | null>;

  /** Resolve as `principal`. Null when nothing matches. */
  findByIdAs(
    id: string,
    type: string,
    context: CredentialsContext,
    principal: Principal,
    options?: Omit<ListOptions, 'matcher'>,
  ): Promise<Credential | null>;

  /** A job's run-as principal; the system principal everywhere else. */
  getDefaultPrincipalOf(context: CredentialsContext): Principal;

  /** Every store reachable from `context`, in walk order. */
  lookupStores(context: CredentialsContext, signal?: AbortSignal): Promise<CredentialsStore[]>;
}

export interface CredentialsResolverDeps {
  registry: ProviderRegistry;
  diagnostics: Diagnostics;
  logger: Logger;
}

/** Whether `principal` may read credentials out of `store`. */
export function canReadStore(store: CredentialsStore, principal: Principal): boolean {
  if (principal.kind === 'system') return true;
  return store.ownerId !== null
    ? store.hasPermission(principal, 'useOwn')
    : store.hasPermission(principal, 'useItem');
}

export function getDefaultPrincipalOf(context: CredentialsContext): Principal {
  return isJobContext(context) ? context.runAs : SYSTEM_PRINCIPAL;
}

export function createCredentialsResolver(deps: CredentialsResolverDeps): CredentialsResolver {
  const { registry, diagnostics, logger } = deps;

  function contextsToSearch(
    context: CredentialsContext,
    principal: Principal,
    includeUserContext: boolean,
  ): CredentialsContext[] {
    const chain = ancestry(context);
    if (includeUserContext && principal.kind === 'user') {
      return [createUserContext(principal.id), ...chain];
    }
    return chain;
  }

  async function readStore(
    store: CredentialsStore,
    context: CredentialsContext,
    signal?: AbortSignal,
  ) {
    try {
      return await store.snapshot(signal);
    } catch (error) {
      logger.warn('Credentials store read failed, skipping it', {
        component: 'credentials-resolver',
        storeId: store.id,
        providerId: store.providerId,
        contextId: context.id,
        error: error instanceof Error ? error.message : String(error),
      });
      diagnostics.record('provider-failure', `Store "${store.id}" could not be read`, {
        storeId: store.id,
        providerId: store.providerId,
        contextId: context.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  const resolver: CredentialsResolver = {
    async listCredentials(
      type: string,
      context: CredentialsContext,
      principal: Principal,
      options?: ListOptions,
    ): Promise<Credential[]> {
      const requirements = options?.requirements ?? [];
      const matcher = options?.matcher ?? always;
      const signal = options?.signal;
      const found = new Map<string, Credential>();

      for (const current of contextsToSearch(context, principal, options?.includeUserContext ?? false)) {
        for (const store of await registry.storesFor(current, signal)) {
          if (!canReadStore(store, principal)) {
            diagnostics.record('read-denied', `Principal "${principal.id}" may not read store "${store.id}"`, {
              principalId: principal.id,
              storeId: store.id,
              contextId: context.id,
            });
            continue;
          }

          const provider = registry.providerOf(store);
          const offered = store.getScopes();
          const snapshot = await readStore(store, current, signal);
          if (snapshot === null) continue;

          for (const entry of snapshot.values()) {
            if (!matchesDomain(entry.domain, requirements)) continue;
            for (const credential of entry.credentials) {
              if (found.has(credential.id)) continue;
              if (
                offered.includes(credential.scope) &&
                isScopeVisible(credential.scope, context) &&
                isAssignableType(credential.type, type) &&
                registry.isTypeAllowedFor(provider, credential.type) &&
                matcher(credential)
              ) {
                found.set(credential.id, credential);
              }
            }
          }
        }
      }

      logger.debug('Listed credentials', {
        component: 'credentials-resolver',
        contextId: context.id,
        principalId: principal.id,
        type,
        count: found.size,
      });
      return [...found.values()];
    },

    findById(id, type, context, requirements, signal) {
      return resolver.findByIdAs(id, type, context, getDefaultPrincipalOf(context), {
        requirements,
        signal,
      });
    },

    async findByIdAs(id, type, context, principal, options) {
      const [match] = await resolver.listCredentials(type, context, principal, {
        ...options,
        matcher: withId(id),
      });
      if (match === undefined) {
        diagnostics.record('not-found', `No credential "${id}" for "${principal.id}" at "${context.id}"`, {
          credentialId: id,
          principalId: principal.id,
          contextId: context.id,
          type,
        });
        return null;
      }
      return match;
    },

    getDefaultPrincipalOf,

    async lookupStores(context: CredentialsContext, signal?: AbortSignal): Promise<CredentialsStore[]> {
      const stores: CredentialsStore[] = [];
      for (const current of ancestry(context)) {
        stores.push(...(await registry.storesFor(current, signal)));
      }
      return stores;
    },
  };

  return resolver;
}
