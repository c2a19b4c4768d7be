/**
 * Configurator — applies a credentials configuration to provider root
 * stores, and exports the current state back in the same shape.
 *
 * Every target store is resolved and every node converted before anything
 * is written, so a configuration that names an unknown provider or holds an
 * invalid credential changes nothing.
 */
import { CredentialsError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { SYSTEM_PRINCIPAL } from '@/core/types.js';
import { ConfigError } from '@/config/loader.js';
import type { ConfigCredential, ConfigStoreNode, CredentialsConfig } from '@/config/schema.js';
import { createCredential } from '@/credentials/credential.js';
import type { Credential, SecretRef } from '@/credentials/types.js';
import { domainFromData, domainToData } from '@/domains/domain.js';
import type { DomainData } from '@/domains/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ProviderRegistry } from '@/providers/registry.js';
import { SYSTEM_PROVIDER_ID } from '@/providers/system-provider.js';
import type { SecretVault } from '@/secrets/types.js';
import type { CredentialsScope } from '@/scopes/scope.js';
import { countCredentials, toDomainCredentialsMap } from '@/stores/domain-credentials.js';
import type { DomainCredentials, DomainCredentialsMap, ModifiableCredentialsStore } from '@/stores/types.js';

import type { MergeStrategy } from './merge.js';
import { applyMergeStrategy, resolveMergeStrategy } from './merge.js';

export interface ConfiguratorDeps {
  registry: ProviderRegistry;
  vault: SecretVault;
  logger: Logger;
  /** Consulted for CREDENTIALS_MERGE_STRATEGY. Default: process.env. */
  env?: Readonly<Record<string, string | undefined>>;
}

/** What one configuration node did to its store. */
export interface NodeSummary {
  node: string;
  storeId: string;
  strategy: MergeStrategy;
  domains: number;
  credentials: number;
}

// ─── Conversion ─────────────────────────────────────────────────

function secretOf(configured: ConfigCredential['secret'], vault: SecretVault): SecretRef {
  if ('plaintext' in configured) {
    return { kind: 'sealed', payload: vault.encrypt(configured.plaintext) };
  }
  return { kind: 'external', source: configured.source, key: configured.key };
}

function toMap(
  node: string,
  storeNode: ConfigStoreNode,
  vault: SecretVault,
): Result<DomainCredentialsMap, ConfigError> {
  const entries: DomainCredentials[] = [];
  for (const entry of storeNode.domainCredentials) {
    const domain = domainFromData(entry.domain);
    if (!domain.ok) {
      return err(new ConfigError(`Node "${node}": ${domain.error.message}`, { node }));
    }

    const credentials: Credential[] = [];
    for (const configured of entry.credentials) {
      try {
        credentials.push(
          createCredential({
            id: configured.id,
            scope: configured.scope,
            type: configured.type,
            description: configured.description,
            properties: configured.properties,
            secret: secretOf(configured.secret, vault),
          }),
        );
      } catch (error) {
        if (!(error instanceof CredentialsError)) throw error;
        return err(new ConfigError(`Node "${node}": ${error.message}`, { node, ...error.context }));
      }
    }
    entries.push({ domain: domain.value, credentials });
  }
  return ok(toDomainCredentialsMap(entries));
}

function rootStoreOf(registry: ProviderRegistry, providerId: string): ModifiableCredentialsStore | null {
  return registry.get(providerId)?.rootStore?.() ?? null;
}

// ─── Apply ──────────────────────────────────────────────────────

/**
 * Apply `config`: the `system` node goes to the system provider's root
 * store, each `providers` node to the root store of that provider.
 */
export async function applyCredentialsConfiguration(
  config: CredentialsConfig,
  deps: ConfiguratorDeps,
): Promise<Result<NodeSummary[], ConfigError>> {
  const { registry, vault, logger } = deps;
  const strategy = resolveMergeStrategy(config.mergeStrategy, deps.env);

  const nodes: [string, string, ConfigStoreNode][] = [];
  if (config.system) nodes.push(['system', SYSTEM_PROVIDER_ID, config.system]);
  for (const [providerId, storeNode] of Object.entries(config.providers)) {
    nodes.push([providerId, providerId, storeNode]);
  }

  const plan: { node: string; store: ModifiableCredentialsStore; map: DomainCredentialsMap }[] = [];
  for (const [node, providerId, storeNode] of nodes) {
    const store = rootStoreOf(registry, providerId);
    if (store === null) {
      return err(
        new ConfigError(`Node "${node}": provider "${providerId}" has no configurable store`, {
          node,
          providerId,
        }),
      );
    }
    const map = toMap(node, storeNode, vault);
    if (!map.ok) return map;
    plan.push({ node, store, map: map.value });
  }

  const summaries: NodeSummary[] = [];
  for (const { node, store, map } of plan) {
    await store.transformDomainCredentials(SYSTEM_PRINCIPAL, (existing) =>
      applyMergeStrategy(strategy, existing, map),
    );
    const applied = await store.snapshot();
    const summary: NodeSummary = {
      node,
      storeId: store.id,
      strategy,
      domains: applied.size,
      credentials: countCredentials(applied),
    };
    logger.info('Applied credentials configuration', { component: 'configurator', ...summary });
    summaries.push(summary);
  }
  return ok(summaries);
}

// ─── Describe ───────────────────────────────────────────────────

export interface DescribedCredential {
  id: string;
  scope: CredentialsScope;
  type: string;
  description: string;
  properties: Record<string, string>;
}

export interface DescribedStoreNode {
  domainCredentials: { domain: DomainData; credentials: DescribedCredential[] }[];
}

export interface DescribedConfiguration {
  system?: DescribedStoreNode;
  providers: Record<string, DescribedStoreNode>;
}

async function describeStore(store: ModifiableCredentialsStore): Promise<DescribedStoreNode> {
  const map = await store.snapshot();
  return {
    domainCredentials: [...map.values()].map((entry) => ({
      domain: domainToData(entry.domain),
      credentials: entry.credentials.map((credential) => ({
        id: credential.id,
        scope: credential.scope,
        type: credential.type,
        description: credential.description,
        properties: { ...credential.properties },
      })),
    })),
  };
}

/** Export the configurable stores in configuration shape. Secrets are left out. */
export async function describeCredentialsConfiguration(
  deps: Pick<ConfiguratorDeps, 'registry'>,
): Promise<DescribedConfiguration> {
  const described: DescribedConfiguration = { providers: {} };
  for (const provider of deps.registry.list()) {
    const store = provider.rootStore?.() ?? null;
    if (store === null) continue;
    if (provider.id === SYSTEM_PROVIDER_ID) {
      described.system = await describeStore(store);
    } else {
      described.providers[provider.id] = await describeStore(store);
    }
  }
  return described;
}
