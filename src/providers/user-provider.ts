/**
 * User provider — one personal store per user, holding USER credentials.
 * Only the owner (with `useOwn`) and the system principal may read it.
 */
import { isUserContext } from '@/contexts/context.js';
import type { CredentialsContext, UserContext } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AccessPolicy } from '@/security/access-policy.js';
import { createCredentialsStore } from '@/stores/credentials-store.js';
import type { CredentialsStore, ModifiableCredentialsStore, StorePersistence } from '@/stores/types.js';

import type { CredentialsProvider } from './types.js';

export const USER_PROVIDER_ID = 'user';

export interface UserProviderOptions {
  policy: AccessPolicy;
  persistenceFor: (storeId: string) => StorePersistence;
  logger: Logger;
  priority?: number;
}

export interface UserProvider extends CredentialsProvider {
  storeOf(context: UserContext): ModifiableCredentialsStore;
}

export function createUserProvider(options: UserProviderOptions): UserProvider {
  const stores = new Map<string, ModifiableCredentialsStore>();

  function storeOf(context: UserContext): ModifiableCredentialsStore {
    let store = stores.get(context.userId);
    if (!store) {
      const id = `${USER_PROVIDER_ID}:${context.userId}`;
      store = createCredentialsStore({
        id,
        providerId: USER_PROVIDER_ID,
        context,
        scopes: ['USER'],
        policy: options.policy,
        persistence: options.persistenceFor(id),
        logger: options.logger,
        ownerId: context.userId,
      });
      stores.set(context.userId, store);
    }
    return store;
  }

  return {
    id: USER_PROVIDER_ID,
    displayName: 'Users',
    priority: options.priority ?? 100,
    scopes: ['USER'],
    isEnabled: () => true,
    storesFor(context: CredentialsContext): Promise<CredentialsStore[]> {
      return Promise.resolve(isUserContext(context) ? [storeOf(context)] : []);
    },
    storeOf,
    openStores: () => [...stores.values()],
  };
}
