/**
 * Credentials Service — the public entry point. Wires resolution, execution
 * bindings, usage tracking, secret access and configuration over one
 * provider registry.
 */
import type { Execution } from '@/bindings/types.js';
import type { ParameterBinder } from '@/bindings/parameter-binder.js';
import { createParameterBinderRegistry } from '@/bindings/parameter-binder.js';
import type { ConfigError } from '@/config/loader.js';
import type { CredentialsConfig } from '@/config/schema.js';
import type { CredentialUnavailableError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import type { CredentialsContext, Principal } from '@/core/types.js';
import type { Credential } from '@/credentials/types.js';
import type { DomainRequirement } from '@/domains/types.js';
import type { DescribedConfiguration, NodeSummary } from '@/merge/configurator.js';
import { applyCredentialsConfiguration, describeCredentialsConfiguration } from '@/merge/configurator.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import type { Logger } from '@/observability/logger.js';
import type { DiagnosticEvent, DiagnosticKind } from '@/observability/types.js';
import type { ProviderRegistry } from '@/providers/registry.js';
import { createCredentialsResolver } from '@/resolution/credentials-resolver.js';
import { createExecutionResolver } from '@/resolution/execution-resolver.js';
import type { ListOptions } from '@/resolution/types.js';
import type { CredentialsScope } from '@/scopes/scope.js';
import type { AccessPolicy } from '@/security/access-policy.js';
import { createSecretAccessor } from '@/secrets/secret-accessor.js';
import type { ExternalSecretSource, SecretAccess, SecretAccessOptions, SecretVault } from '@/secrets/types.js';
import type { CredentialsStore, ModifiableCredentialsStore } from '@/stores/types.js';
import { requireModifiable } from '@/stores/types.js';
import type { UsageRecord, UsageRepository } from '@/tracking/types.js';
import { createUsageTracker } from '@/tracking/usage-tracker.js';

// ─── Types ──────────────────────────────────────────────────────

export interface CredentialsServiceDeps {
  registry: ProviderRegistry;
  policy: AccessPolicy;
  vault: SecretVault;
  usageRepository: UsageRepository;
  diagnostics: Diagnostics;
  logger: Logger;
  externalSources?: readonly ExternalSecretSource[];
  /** Bound on each external secret fetch. Default: 5000ms. */
  secretTimeoutMs?: number;
  /** Consulted for CREDENTIALS_MERGE_STRATEGY. Default: process.env. */
  env?: Readonly<Record<string, string | undefined>>;
}

export interface CredentialsService {
  /** Load the persisted state of every configurable store. */
  initialize(): Promise<void>;
  /** Wait for every pending store write. */
  shutdown(): Promise<void>;

  /** Credentials usable at `context`, as `principal` (default: the context's default principal). */
  list(
    type: string,
    context: CredentialsContext,
    principal?: Principal,
    options?: ListOptions,
  ): Promise<Credential[]>;
  findById(
    id: string,
    type: string,
    context: CredentialsContext,
    requirements?: readonly DomainRequirement[],
  ): Promise<Credential | null>;
  /** Resolve a plain id or a `${PARAM}` reference made by a running job. */
  findForExecution(
    execution: Execution,
    idOrExpression: string,
    type: string,
    requirements?: readonly DomainRequirement[],
  ): Promise<Credential | null>;

  track(context: CredentialsContext, credential: Credential): Promise<UsageRecord>;
  trackAll(context: CredentialsContext, credentials: readonly Credential[]): Promise<UsageRecord[]>;
  usagesOf(credential: Credential): Promise<UsageRecord[]>;
  accessSecret(
    credential: Credential,
    context: CredentialsContext,
    options?: SecretAccessOptions,
  ): Promise<Result<SecretAccess, CredentialUnavailableError>>;

  binderFor(execution: Execution): ParameterBinder;
  /** Drop the bindings of a finished execution. */
  discardExecution(executionId: string): boolean;

  applyConfiguration(config: CredentialsConfig): Promise<Result<NodeSummary[], ConfigError>>;
  describeConfiguration(): Promise<DescribedConfiguration>;

  lookupStores(context: CredentialsContext): Promise<CredentialsStore[]>;
  /**
   * The store `storeId` found along the walk from `context`, for administrative
   * mutations; null when absent. Throws StoreNotModifiableError for read-only stores.
   */
  modifiableStore(context: CredentialsContext, storeId: string): Promise<ModifiableCredentialsStore | null>;
  lookupScopes(context: CredentialsContext): Promise<CredentialsScope[]>;
  /** Administrative view of recorded anomalies. */
  diagnostics(kind?: DiagnosticKind): DiagnosticEvent[];
}

// ─── Service Factory ────────────────────────────────────────────

/**
 * Create a CredentialsService instance.
 */
export function createCredentialsService(deps: CredentialsServiceDeps): CredentialsService {
  const { registry, policy, vault, diagnostics, logger } = deps;

  const resolver = createCredentialsResolver({ registry, diagnostics, logger });
  const binders = createParameterBinderRegistry({ logger });
  const executions = createExecutionResolver({ resolver, binders, policy, diagnostics, logger });
  const usageTracker = createUsageTracker({ usageRepository: deps.usageRepository, logger });
  const secretAccessor = createSecretAccessor({
    vault,
    usageTracker,
    logger,
    externalSources: deps.externalSources,
    timeoutMs: deps.secretTimeoutMs,
  });

  function configurableStores(): ModifiableCredentialsStore[] {
    return registry
      .list()
      .map((provider) => provider.rootStore?.() ?? null)
      .filter((store): store is ModifiableCredentialsStore => store !== null);
  }

  function openStores(): ModifiableCredentialsStore[] {
    return registry.list().flatMap((provider) => provider.openStores?.() ?? []);
  }

  return {
    async initialize(): Promise<void> {
      const stores = configurableStores();
      await Promise.all(stores.map((store) => store.reload()));
      logger.info('Credentials service initialized', {
        component: 'credentials-service',
        providers: registry.list().map((p) => p.id),
        stores: stores.length,
      });
    },

    async shutdown(): Promise<void> {
      const stores = openStores();
      logger.info('Waiting for pending store writes', {
        component: 'credentials-service',
        stores: stores.length,
      });
      await Promise.all(stores.map((store) => store.flush()));
    },

    list(type, context, principal, options) {
      return resolver.listCredentials(
        type,
        context,
        principal ?? resolver.getDefaultPrincipalOf(context),
        options,
      );
    },

    findById(id, type, context, requirements) {
      return resolver.findById(id, type, context, requirements);
    },

    findForExecution(execution, idOrExpression, type, requirements) {
      return executions.findForExecution(execution, idOrExpression, type, requirements);
    },

    track: (context, credential) => usageTracker.track(context, credential),
    trackAll: (context, credentials) => usageTracker.trackAll(context, credentials),
    usagesOf: (credential) => usageTracker.usagesOf(credential),
    accessSecret: (credential, context, options) => secretAccessor.access(credential, context, options),

    binderFor: (execution) => binders.binderFor(execution),

    discardExecution(executionId: string): boolean {
      const discarded = binders.discard(executionId);
      if (discarded) {
        logger.debug('Discarded execution bindings', {
          component: 'credentials-service',
          executionId,
        });
      }
      return discarded;
    },

    applyConfiguration(config) {
      return applyCredentialsConfiguration(config, { registry, vault, logger, env: deps.env });
    },

    describeConfiguration: () => describeCredentialsConfiguration({ registry }),

    lookupStores: (context) => resolver.lookupStores(context),
    async modifiableStore(context, storeId) {
      const store = (await resolver.lookupStores(context)).find((s) => s.id === storeId);
      return store ? requireModifiable(store, 'modification') : null;
    },
    lookupScopes: (context) => registry.lookupScopes(context),
    diagnostics: (kind) => diagnostics.list(kind),
  };
}
