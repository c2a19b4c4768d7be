/**
 * Context provider — one store per folder or job, holding GLOBAL
 * credentials visible to that context and everything below it.
 */
import type { CredentialsContext } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AccessPolicy } from '@/security/access-policy.js';
import { createCredentialsStore } from '@/stores/credentials-store.js';
import type { CredentialsStore, ModifiableCredentialsStore, StorePersistence } from '@/stores/types.js';

import type { CredentialsProvider } from './types.js';

export const CONTEXT_PROVIDER_ID = 'context';

const DEFAULT_KINDS: readonly string[] = ['folder', 'job'];

export interface ContextProviderOptions {
  policy: AccessPolicy;
  persistenceFor: (storeId: string) => StorePersistence;
  logger: Logger;
  priority?: number;
  /** Context kinds that get a store. Default: folder, job. */
  kinds?: readonly string[];
}

export interface ContextProvider extends CredentialsProvider {
  /** The store of `context`, created on first use; null for other kinds. */
  storeOf(context: CredentialsContext): ModifiableCredentialsStore | null;
}

export function createContextProvider(options: ContextProviderOptions): ContextProvider {
  const kinds = options.kinds ?? DEFAULT_KINDS;
  const stores = new Map<string, ModifiableCredentialsStore>();

  function storeOf(context: CredentialsContext): ModifiableCredentialsStore | null {
    if (!kinds.includes(context.kind)) return null;
    let store = stores.get(context.id);
    if (!store) {
      const id = `${CONTEXT_PROVIDER_ID}:${context.id}`;
      store = createCredentialsStore({
        id,
        providerId: CONTEXT_PROVIDER_ID,
        context,
        scopes: ['GLOBAL'],
        policy: options.policy,
        persistence: options.persistenceFor(id),
        logger: options.logger,
      });
      stores.set(context.id, store);
    }
    return store;
  }

  return {
    id: CONTEXT_PROVIDER_ID,
    displayName: 'Folders and jobs',
    priority: options.priority ?? 100,
    scopes: ['GLOBAL'],
    isEnabled: () => true,
    storesFor(context: CredentialsContext): Promise<CredentialsStore[]> {
      const store = storeOf(context);
      return Promise.resolve(store ? [store] : []);
    },
    storeOf,
    openStores: () => [...stores.values()],
  };
}
