/**
 * System provider — the root context's store, holding SYSTEM and GLOBAL
 * credentials.
 */
import { isSameContext } from '@/contexts/context.js';
import type { CredentialsContext } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AccessPolicy } from '@/security/access-policy.js';
import { createCredentialsStore } from '@/stores/credentials-store.js';
import type { CredentialsStore, ModifiableCredentialsStore, StorePersistence } from '@/stores/types.js';

import type { CredentialsProvider } from './types.js';

export const SYSTEM_PROVIDER_ID = 'system';

export interface SystemProviderOptions {
  root: CredentialsContext;
  policy: AccessPolicy;
  persistenceFor: (storeId: string) => StorePersistence;
  logger: Logger;
  priority?: number;
}

export function createSystemProvider(options: SystemProviderOptions): CredentialsProvider {
  const { root } = options;
  const store = createCredentialsStore({
    id: SYSTEM_PROVIDER_ID,
    providerId: SYSTEM_PROVIDER_ID,
    context: root,
    scopes: ['SYSTEM', 'GLOBAL'],
    policy: options.policy,
    persistence: options.persistenceFor(SYSTEM_PROVIDER_ID),
    logger: options.logger,
  });

  return {
    id: SYSTEM_PROVIDER_ID,
    displayName: 'System',
    priority: options.priority ?? 100,
    scopes: ['SYSTEM', 'GLOBAL'],
    isEnabled: () => true,
    storesFor(context: CredentialsContext): Promise<CredentialsStore[]> {
      return Promise.resolve(isSameContext(context, root) ? [store] : []);
    },
    rootStore: (): ModifiableCredentialsStore => store,
    openStores: () => [store],
  };
}
