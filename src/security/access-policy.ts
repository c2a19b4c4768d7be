/**
 * AccessPolicy — answers whether a principal holds a permission in a context.
 *
 * Grants attach to a context and are inherited by everything below it; a
 * grant without a context applies everywhere, including user contexts,
 * which sit outside the hierarchy.
 */
import { ancestry } from '@/contexts/context.js';
import type { CredentialsContext, Permission, Principal } from '@/core/types.js';

export interface AccessGrant {
  /** Principal id, or `*` for every user principal. */
  principalId: string;
  permissions: readonly Permission[];
  /** Omitted: everywhere. */
  contextId?: string;
}

export interface AccessPolicy {
  hasPermission(principal: Principal, permission: Permission, context: CredentialsContext): boolean;
}

/** The system principal holds every permission. */
export function createGrantAccessPolicy(grants: readonly AccessGrant[]): AccessPolicy {
  return {
    hasPermission(principal: Principal, permission: Permission, context: CredentialsContext): boolean {
      if (principal.kind === 'system') return true;

      const contextIds = new Set(ancestry(context).map((c) => c.id));
      return grants.some(
        (grant) =>
          (grant.principalId === principal.id ||
            (grant.principalId === '*' && principal.kind === 'user')) &&
          grant.permissions.includes(permission) &&
          (grant.contextId === undefined || contextIds.has(grant.contextId)),
      );
    },
  };
}

/** Only the system principal holds permissions. */
export const SYSTEM_ONLY_POLICY: AccessPolicy = createGrantAccessPolicy([]);
