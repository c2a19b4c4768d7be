/**
 * Credential store types.
 *
 * A store owns a domain → credentials map for one context and belongs to one
 * provider. Reads are lock-free against an immutable snapshot; mutations are
 * serialized per store and swap in a new snapshot once persisted.
 */
import { StoreNotModifiableError } from '@/core/errors.js';
import type { CredentialsContext, Permission, Principal } from '@/core/types.js';
import type { Credential } from '@/credentials/types.js';
import type { Domain } from '@/domains/types.js';
import type { CredentialsScope } from '@/scopes/scope.js';

// ─── Domain Credentials ─────────────────────────────────────────

export interface DomainCredentials {
  readonly domain: Domain;
  readonly credentials: readonly Credential[];
}

/** Keyed by domain name; `null` is the global domain. Iteration order is stable. */
export type DomainCredentialsMap = ReadonlyMap<string | null, DomainCredentials>;

// ─── Stores ─────────────────────────────────────────────────────

export interface CredentialsStore {
  readonly id: string;
  readonly providerId: string;
  readonly context: CredentialsContext;
  /** Set for per-user stores: only this user (or the system principal) may use it. */
  readonly ownerId: string | null;
  readonly modifiable: boolean;

  /** The provider's declared scopes that are visible at this store's context. */
  getScopes(): CredentialsScope[];
  hasPermission(principal: Principal, permission: Permission): boolean;

  getDomains(signal?: AbortSignal): Promise<Domain[]>;
  /** Credentials of `domain`; empty when the store does not hold the domain. */
  getCredentials(domain: Domain, signal?: AbortSignal): Promise<Credential[]>;
  snapshot(signal?: AbortSignal): Promise<DomainCredentialsMap>;
}

/**
 * Mutations throw PermissionDeniedError when `principal` lacks the
 * permission, and resolve to false when there was nothing to change.
 */
export interface ModifiableCredentialsStore extends CredentialsStore {
  readonly modifiable: true;

  addDomain(principal: Principal, domain: Domain, credentials?: readonly Credential[]): Promise<boolean>;
  removeDomain(principal: Principal, domain: Domain): Promise<boolean>;
  updateDomain(principal: Principal, current: Domain, replacement: Domain): Promise<boolean>;

  addCredentials(principal: Principal, domain: Domain, credential: Credential): Promise<boolean>;
  removeCredentials(principal: Principal, domain: Domain, credential: Credential): Promise<boolean>;
  updateCredentials(
    principal: Principal,
    domain: Domain,
    current: Credential,
    replacement: Credential,
  ): Promise<boolean>;

  /** Swap the whole map in one step. */
  replaceDomainCredentials(principal: Principal, next: DomainCredentialsMap): Promise<void>;
  /** Compute the next map from the current one, in the same queue as every other mutation. */
  transformDomainCredentials(
    principal: Principal,
    transform: (current: DomainCredentialsMap) => DomainCredentialsMap,
  ): Promise<void>;

  /** Re-read persisted state, replacing the in-memory map. */
  reload(): Promise<void>;
  /** Resolves once every mutation queued so far has settled. */
  flush(): Promise<void>;
}

export function isModifiableStore(store: CredentialsStore): store is ModifiableCredentialsStore {
  return store.modifiable && 'replaceDomainCredentials' in store;
}

/** Narrow `store` for `operation`, or throw StoreNotModifiableError. */
export function requireModifiable(store: CredentialsStore, operation: string): ModifiableCredentialsStore {
  if (!isModifiableStore(store)) throw new StoreNotModifiableError(store.id, operation);
  return store;
}

// ─── Persistence ────────────────────────────────────────────────

export interface StorePersistence {
  /** Missing or unreadable state loads as an empty map. */
  load(): Promise<DomainCredentialsMap>;
  save(map: DomainCredentialsMap): Promise<void>;
}
