/**
 * ProviderRegistry — ordered set of credential providers.
 *
 * Providers are consulted highest priority first, ties in registration
 * order. Every provider call is bounded by a timeout; a provider that fails
 * or times out contributes nothing and the failure goes to diagnostics.
 */
import { ProviderMissingError, ProviderTimeoutError, ValidationError } from '@/core/errors.js';
import { withTimeout } from '@/core/timeout.js';
import type { CredentialsContext } from '@/core/types.js';
import { isAssignableType } from '@/credentials/credential-types.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import type { Logger } from '@/observability/logger.js';
import type { CredentialsScope } from '@/scopes/scope.js';
import { CREDENTIALS_SCOPES } from '@/scopes/scope.js';
import type { CredentialsStore } from '@/stores/types.js';

import type { CredentialsProvider, ProviderTypeRestriction, SelectionFilter } from './types.js';

export interface ProviderRegistry {
  /** @throws ValidationError when a provider with the same id is registered. */
  register(provider: CredentialsProvider): void;
  unregister(providerId: string): boolean;
  get(providerId: string): CredentialsProvider | null;
  /** All registered providers, priority order. */
  list(): CredentialsProvider[];

  /** Enabled by itself and admitted by the provider filter. */
  isEnabled(provider: CredentialsProvider): boolean;
  /** Whether any enabled provider may hold credentials of `type`. */
  isTypeApplicable(type: string): boolean;
  /** Whether `provider` may contribute credentials of `type`. */
  isTypeAllowedFor(provider: CredentialsProvider, type: string): boolean;

  /** Stores of every enabled provider at `context`, priority order. */
  storesFor(context: CredentialsContext, signal?: AbortSignal): Promise<CredentialsStore[]>;
  /** Scopes offered by the stores at `context`, in canonical order. */
  lookupScopes(context: CredentialsContext, signal?: AbortSignal): Promise<CredentialsScope[]>;
  /** @throws ProviderMissingError when the store's provider is gone. */
  providerOf(store: CredentialsStore): CredentialsProvider;
}

export interface ProviderRegistryOptions {
  logger: Logger;
  diagnostics: Diagnostics;
  /** Bound on each provider call. Default: 5000ms. */
  timeoutMs?: number;
  providerFilter?: SelectionFilter;
  typeFilter?: SelectionFilter;
  typeRestrictions?: readonly ProviderTypeRestriction[];
}

function admits(filter: SelectionFilter, id: string): boolean {
  switch (filter.kind) {
    case 'none':
      return true;
    case 'includes':
      return filter.ids.includes(id);
    case 'excludes':
      return !filter.ids.includes(id);
  }
}

/** Type filters match by assignability, so `standard` covers its subtypes. */
function admitsType(filter: SelectionFilter, type: string): boolean {
  switch (filter.kind) {
    case 'none':
      return true;
    case 'includes':
      return filter.ids.some((tag) => isAssignableType(type, tag));
    case 'excludes':
      return !filter.ids.some((tag) => isAssignableType(type, tag));
  }
}

/** Create an empty ProviderRegistry. */
export function createProviderRegistry(options: ProviderRegistryOptions): ProviderRegistry {
  const { logger, diagnostics } = options;
  const timeoutMs = options.timeoutMs ?? 5000;
  const providerFilter: SelectionFilter = options.providerFilter ?? { kind: 'none' };
  const typeFilter: SelectionFilter = options.typeFilter ?? { kind: 'none' };
  const restrictions = options.typeRestrictions ?? [];

  // Registration order is kept by the array; list() sorts stably by priority.
  const providers: CredentialsProvider[] = [];

  function ordered(): CredentialsProvider[] {
    return [...providers].sort((a, b) => b.priority - a.priority);
  }

  function isEnabled(provider: CredentialsProvider): boolean {
    return provider.isEnabled() && admits(providerFilter, provider.id);
  }

  function isTypeAllowedFor(provider: CredentialsProvider, type: string): boolean {
    if (!admitsType(typeFilter, type)) return false;
    if (
      provider.credentialTypes !== undefined &&
      !provider.credentialTypes.some((tag) => isAssignableType(type, tag))
    ) {
      return false;
    }
    return restrictions
      .filter((r) => r.providerId === provider.id)
      .every((r) => {
        const listed = r.types.some((tag) => isAssignableType(type, tag));
        return r.mode === 'includes' ? listed : !listed;
      });
  }

  async function storesOf(
    provider: CredentialsProvider,
    context: CredentialsContext,
    signal?: AbortSignal,
  ): Promise<CredentialsStore[]> {
    try {
      return await withTimeout(
        `Provider "${provider.id}"`,
        timeoutMs,
        (abortSignal) => provider.storesFor(context, abortSignal),
        signal,
      );
    } catch (error) {
      const reason = error instanceof ProviderTimeoutError ? 'timed out' : 'failed';
      logger.warn(`Credentials provider ${reason}, skipping it`, {
        component: 'provider-registry',
        providerId: provider.id,
        contextId: context.id,
        error: error instanceof Error ? error.message : String(error),
      });
      diagnostics.record('provider-failure', `Provider "${provider.id}" ${reason} at "${context.id}"`, {
        providerId: provider.id,
        contextId: context.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  const registry: ProviderRegistry = {
    register(provider: CredentialsProvider): void {
      if (providers.some((p) => p.id === provider.id)) {
        throw new ValidationError(`Provider "${provider.id}" is already registered`, {
          providerId: provider.id,
        });
      }
      logger.info('Registering credentials provider', {
        component: 'provider-registry',
        providerId: provider.id,
        priority: provider.priority,
        scopes: provider.scopes,
      });
      providers.push(provider);
    },

    unregister(providerId: string): boolean {
      const index = providers.findIndex((p) => p.id === providerId);
      if (index === -1) return false;
      providers.splice(index, 1);
      logger.info('Unregistered credentials provider', {
        component: 'provider-registry',
        providerId,
      });
      return true;
    },

    get(providerId: string): CredentialsProvider | null {
      return providers.find((p) => p.id === providerId) ?? null;
    },

    list: ordered,
    isEnabled,
    isTypeAllowedFor,

    isTypeApplicable(type: string): boolean {
      return providers.some((p) => isEnabled(p) && isTypeAllowedFor(p, type));
    },

    async storesFor(context: CredentialsContext, signal?: AbortSignal): Promise<CredentialsStore[]> {
      const enabled = ordered().filter(isEnabled);
      const perProvider = await Promise.all(enabled.map((p) => storesOf(p, context, signal)));
      return perProvider.flat();
    },

    async lookupScopes(context: CredentialsContext, signal?: AbortSignal): Promise<CredentialsScope[]> {
      const stores = await registry.storesFor(context, signal);
      const offered = new Set(stores.flatMap((s) => s.getScopes()));
      return CREDENTIALS_SCOPES.filter((scope) => offered.has(scope));
    },

    providerOf(store: CredentialsStore): CredentialsProvider {
      const provider = providers.find((p) => p.id === store.providerId);
      if (!provider) {
        throw new ProviderMissingError(store.providerId, store.id);
      }
      return provider;
    },
  };

  return registry;
}
