/**
 * Credential scopes — the visibility tier of a credential.
 */
import type { CredentialsContext } from '@/core/types.js';

export type CredentialsScope = 'SYSTEM' | 'GLOBAL' | 'USER';

/** All scopes, most restricted first. */
export const CREDENTIALS_SCOPES: readonly CredentialsScope[] = ['SYSTEM', 'GLOBAL', 'USER'];

const DISPLAY_NAMES: Record<CredentialsScope, string> = {
  SYSTEM: 'System (administrative contexts only)',
  GLOBAL: 'Global (this context and everything below it)',
  USER: 'User (the owning user only)',
};

/** Contexts where SYSTEM credentials are in play. */
const SYSTEM_VISIBLE_KINDS: ReadonlySet<string> = new Set(['root', 'agent']);

export function scopeDisplayName(scope: CredentialsScope): string {
  return DISPLAY_NAMES[scope];
}

/**
 * Whether credentials of `scope` are visible from `context`.
 *
 * USER is structurally visible everywhere; whether a user store is reached
 * at all is decided by the context walk.
 */
export function isScopeVisible(scope: CredentialsScope, context: CredentialsContext): boolean {
  switch (scope) {
    case 'SYSTEM':
      return SYSTEM_VISIBLE_KINDS.has(context.kind);
    case 'GLOBAL':
      return true;
    case 'USER':
      return true;
    default:
      return false;
  }
}

/** Scopes from `declared` that are visible at `context`, in declared order. */
export function visibleScopes(
  declared: readonly CredentialsScope[],
  context: CredentialsContext,
): CredentialsScope[] {
  return declared.filter((scope) => isScopeVisible(scope, context));
}

export function isCredentialsScope(value: unknown): value is CredentialsScope {
  return value === 'SYSTEM' || value === 'GLOBAL' || value === 'USER';
}

/** Parse a scope name case-insensitively. Returns null for unknown names. */
export function parseScope(value: string): CredentialsScope | null {
  const upper = value.trim().toUpperCase();
  return isCredentialsScope(upper) ? upper : null;
}
