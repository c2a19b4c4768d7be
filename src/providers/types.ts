/**
 * Credential provider types.
 *
 * A provider is a registered factory of stores. The registry asks each
 * enabled provider, in priority order, for its stores at a context.
 */
import type { CredentialsContext } from '@/core/types.js';
import type { CredentialsScope } from '@/scopes/scope.js';
import type { CredentialsStore, ModifiableCredentialsStore } from '@/stores/types.js';

export interface CredentialsProvider {
  readonly id: string;
  readonly displayName: string;
  /** Higher first; ties keep registration order. */
  readonly priority: number;
  readonly scopes: readonly CredentialsScope[];
  /** Credential types this provider may hold. Omitted: any type. */
  readonly credentialTypes?: readonly string[];

  isEnabled(): boolean;
  /** Stores at `context`; empty when the provider does not apply there. */
  storesFor(context: CredentialsContext, signal: AbortSignal): Promise<CredentialsStore[]>;
  /** The store the configurator writes this provider's configuration into. */
  rootStore?(): ModifiableCredentialsStore | null;
  /** Modifiable stores this provider has opened so far. */
  openStores?(): ModifiableCredentialsStore[];
}

// ─── Filters ────────────────────────────────────────────────────

/** Which providers (by id) or credential types (by tag) are in play. */
export type SelectionFilter =
  | { readonly kind: 'none' }
  | { readonly kind: 'includes'; readonly ids: readonly string[] }
  | { readonly kind: 'excludes'; readonly ids: readonly string[] };

/** Restricts which credential types one provider may contribute. */
export interface ProviderTypeRestriction {
  readonly providerId: string;
  readonly mode: 'includes' | 'excludes';
  readonly types: readonly string[];
}
