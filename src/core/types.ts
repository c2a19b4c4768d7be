// ─── Contexts ────────────────────────────────────────────────────

/** Context kinds known to the core. Plugins may define further kinds. */
export type KnownContextKind = 'root' | 'folder' | 'job' | 'user' | 'agent';

/**
 * A node in the administrative hierarchy.
 * `getParent()` returns null at the root and for user contexts.
 */
export interface CredentialsContext {
  readonly id: string;
  /** One of KnownContextKind, or a plugin-defined kind. */
  readonly kind: string;
  readonly displayName: string;
  getParent(): CredentialsContext | null;
}

/** A job/item context. Its executions run as `runAs`. */
export interface JobContext extends CredentialsContext {
  readonly kind: 'job';
  readonly runAs: Principal;
}

/** A user's personal context. */
export interface UserContext extends CredentialsContext {
  readonly kind: 'user';
  readonly userId: string;
}

// ─── Principals ──────────────────────────────────────────────────

export type PrincipalKind = 'system' | 'user' | 'anonymous';

/** The identity a resolution or mutation is performed as. */
export interface Principal {
  readonly id: string;
  readonly kind: PrincipalKind;
}

export const SYSTEM_PRINCIPAL: Principal = { id: 'SYSTEM', kind: 'system' };
export const ANONYMOUS_PRINCIPAL: Principal = { id: 'anonymous', kind: 'anonymous' };

/** Build a principal for a named user. */
export function userPrincipal(userId: string): Principal {
  return { id: userId, kind: 'user' };
}

// ─── Permissions ─────────────────────────────────────────────────

export type Permission =
  | 'view'
  | 'create'
  | 'update'
  | 'delete'
  | 'manageDomains'
  /** Supply one's own (user-scoped) credentials to an execution. */
  | 'useOwn'
  /** Use the credentials available to an item. */
  | 'useItem';

