/**
 * Static table of credential type tags. Assignability follows the parent chain,
 * so asking for `standard` also yields `username-password` credentials.
 */
import type { CredentialTypeDefinition } from './types.js';

export const ROOT_CREDENTIAL_TYPE = 'credential';

export const BUILTIN_CREDENTIAL_TYPES: readonly CredentialTypeDefinition[] = [
  { tag: ROOT_CREDENTIAL_TYPE, parent: null, displayName: 'Any credential' },
  { tag: 'standard', parent: ROOT_CREDENTIAL_TYPE, displayName: 'Standard credential' },
  { tag: 'username-password', parent: 'standard', displayName: 'Username with password' },
  { tag: 'secret-text', parent: 'standard', displayName: 'Secret text' },
  { tag: 'certificate', parent: 'standard', displayName: 'Certificate' },
  { tag: 'ssh-private-key', parent: 'standard', displayName: 'SSH private key' },
  { tag: 'secret-file', parent: 'standard', displayName: 'Secret file' },
];

const PARENTS: ReadonlyMap<string, string | null> = new Map(
  BUILTIN_CREDENTIAL_TYPES.map((t): [string, string | null] => [t.tag, t.parent]),
);

/** Tags from `tag` up to the root, nearest first. Unknown tags go straight to the root. */
export function typeLineage(tag: string): string[] {
  const lineage = [tag];
  if (!PARENTS.has(tag)) {
    return tag === ROOT_CREDENTIAL_TYPE ? lineage : [...lineage, ROOT_CREDENTIAL_TYPE];
  }
  let parent = PARENTS.get(tag) ?? null;
  while (parent !== null && !lineage.includes(parent)) {
    lineage.push(parent);
    parent = PARENTS.get(parent) ?? null;
  }
  return lineage;
}

/** Whether a credential of type `actual` can be used where `wanted` is asked for. */
export function isAssignableType(actual: string, wanted: string): boolean {
  return typeLineage(actual).includes(wanted);
}
