/**
 * Credential matchers — composable predicates used to filter listings.
 */
import { isAssignableType } from '@/credentials/credential-types.js';
import type { Credential } from '@/credentials/types.js';
import type { CredentialsScope } from '@/scopes/scope.js';

export type CredentialMatcher = (credential: Credential) => boolean;

export const always: CredentialMatcher = () => true;

export const never: CredentialMatcher = () => false;

export function withId(id: string): CredentialMatcher {
  const wanted = id.trim();
  return (credential) => credential.id === wanted;
}

export function withScope(scope: CredentialsScope): CredentialMatcher {
  return (credential) => credential.scope === scope;
}

export function withScopes(...scopes: CredentialsScope[]): CredentialMatcher {
  const set = new Set(scopes);
  return (credential) => set.has(credential.scope);
}

/** Matches the type and its subtypes. */
export function withType(type: string): CredentialMatcher {
  return (credential) => isAssignableType(credential.type, type);
}

export function describedBy(description: string): CredentialMatcher {
  return (credential) => credential.description === description;
}

export function withProperty(name: string, value: string): CredentialMatcher {
  return (credential) => credential.properties[name] === value;
}

export function allOf(...matchers: CredentialMatcher[]): CredentialMatcher {
  return (credential) => matchers.every((m) => m(credential));
}

export function anyOf(...matchers: CredentialMatcher[]): CredentialMatcher {
  return (credential) => matchers.some((m) => m(credential));
}

export function not(matcher: CredentialMatcher): CredentialMatcher {
  return (credential) => !matcher(credential);
}

export function firstOrNull(
  credentials: readonly Credential[],
  matcher: CredentialMatcher,
): Credential | null {
  return credentials.find(matcher) ?? null;
}

/** Keep the first credential of each id. */
export function dedupById(credentials: readonly Credential[]): Credential[] {
  const seen = new Set<string>();
  return credentials.filter((credential) => {
    if (seen.has(credential.id)) return false;
    seen.add(credential.id);
    return true;
  });
}
