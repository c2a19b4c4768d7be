/**
 * A small credentials world for resolution tests.
 *
 *   root            system store: sys-1 (SYSTEM), shared, web (example.com)
 *   └── team        folder store: shared, folder-only
 *       ├── build   job, runs as the system principal
 *       └── deploy  job, runs as alice
 *   user:alice      alice-key (USER)
 */
import {
  createFolderContext,
  createJobContext,
  createRootContext,
} from '@/contexts/context.js';
import type { CredentialsContext, JobContext } from '@/core/types.js';
import { userPrincipal } from '@/core/types.js';
import { GLOBAL_DOMAIN, createDomain } from '@/domains/domain.js';
import { hostnameSpecification } from '@/domains/specifications.js';
import { createDiagnostics } from '@/observability/diagnostics.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import { createContextProvider } from '@/providers/context-provider.js';
import type { ContextProvider } from '@/providers/context-provider.js';
import { createProviderRegistry } from '@/providers/registry.js';
import type { ProviderRegistry, ProviderRegistryOptions } from '@/providers/registry.js';
import { createSystemProvider } from '@/providers/system-provider.js';
import type { CredentialsProvider } from '@/providers/types.js';
import { createUserProvider } from '@/providers/user-provider.js';
import type { UserProvider } from '@/providers/user-provider.js';
import type { AccessGrant, AccessPolicy } from '@/security/access-policy.js';
import { createGrantAccessPolicy } from '@/security/access-policy.js';
import { toDomainCredentialsMap } from '@/stores/domain-credentials.js';
import { createMemoryPersistence } from '@/stores/persistence.js';
import type { DomainCredentialsMap, StorePersistence } from '@/stores/types.js';

import { createTestCredential } from './credentials.js';
import { createMockLogger } from './logger.js';

export const WEB_DOMAIN = createDomain('web', 'Example web', [hostnameSpecification('example.com')]);

/** alice may use her own and item credentials everywhere. */
export const DEFAULT_GRANTS: readonly AccessGrant[] = [
  { principalId: 'alice', permissions: ['useOwn', 'useItem'] },
];

function seededStores(): Map<string, DomainCredentialsMap> {
  return new Map<string, DomainCredentialsMap>([
    [
      'system',
      toDomainCredentialsMap([
        {
          domain: GLOBAL_DOMAIN,
          credentials: [
            createTestCredential({ id: 'sys-1', scope: 'SYSTEM' }),
            createTestCredential({ id: 'shared', description: 'from root' }),
          ],
        },
        {
          domain: WEB_DOMAIN,
          credentials: [createTestCredential({ id: 'web', type: 'secret-text' })],
        },
      ]),
    ],
    [
      'context:team',
      toDomainCredentialsMap([
        {
          domain: GLOBAL_DOMAIN,
          credentials: [
            createTestCredential({ id: 'shared', description: 'from folder' }),
            createTestCredential({ id: 'folder-only' }),
          ],
        },
      ]),
    ],
    [
      'user:alice',
      toDomainCredentialsMap([
        {
          domain: GLOBAL_DOMAIN,
          credentials: [createTestCredential({ id: 'alice-key', scope: 'USER' })],
        },
      ]),
    ],
  ]);
}

export interface TestWorld {
  root: CredentialsContext;
  folder: CredentialsContext;
  buildJob: JobContext;
  deployJob: JobContext;
  policy: AccessPolicy;
  diagnostics: Diagnostics;
  registry: ProviderRegistry;
  contextProvider: ContextProvider;
  userProvider: UserProvider;
  systemProvider: CredentialsProvider;
}

export function createTestWorld(options?: {
  grants?: readonly AccessGrant[];
  registry?: Omit<ProviderRegistryOptions, 'logger' | 'diagnostics'>;
}): TestWorld {
  const root = createRootContext();
  const folder = createFolderContext(root, 'team');
  const buildJob = createJobContext(folder, 'build');
  const deployJob = createJobContext(folder, 'deploy', { runAs: userPrincipal('alice') });

  const policy = createGrantAccessPolicy(options?.grants ?? DEFAULT_GRANTS);
  const diagnostics = createDiagnostics();
  const logger = createMockLogger();
  const seeds = seededStores();
  const persistenceFor = (storeId: string): StorePersistence =>
    createMemoryPersistence(seeds.get(storeId));

  const systemProvider = createSystemProvider({ root, policy, persistenceFor, logger });
  const contextProvider = createContextProvider({ policy, persistenceFor, logger });
  const userProvider = createUserProvider({ policy, persistenceFor, logger });

  const registry = createProviderRegistry({ logger, diagnostics, ...options?.registry });
  registry.register(systemProvider);
  registry.register(contextProvider);
  registry.register(userProvider);

  return {
    root,
    folder,
    buildJob,
    deployJob,
    policy,
    diagnostics,
    registry,
    contextProvider,
    userProvider,
    systemProvider,
  };
}
