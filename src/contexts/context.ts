/**
 * Context factories and the hierarchy walk.
 *
 * Every context exposes `getParent()`; the resolution engine only ever walks
 * through that capability, so plugin-defined kinds need no special casing.
 */
import type {
  CredentialsContext,
  JobContext,
  Principal,
  UserContext,
} from '@/core/types.js';
import { SYSTEM_PRINCIPAL } from '@/core/types.js';

// ─── Factories ──────────────────────────────────────────────────

/** Create the root (administrative) context. */
export function createRootContext(displayName = 'Root'): CredentialsContext {
  return { id: 'root', kind: 'root', displayName, getParent: () => null };
}

/** Create a folder nested under `parent`. */
export function createFolderContext(
  parent: CredentialsContext,
  name: string,
): CredentialsContext {
  return {
    id: childId(parent, name),
    kind: 'folder',
    displayName: name,
    getParent: () => parent,
  };
}

/**
 * Create a job/item context. Executions of the job run as `runAs`,
 * which defaults to the system principal.
 */
export function createJobContext(
  parent: CredentialsContext,
  name: string,
  options?: { runAs?: Principal },
): JobContext {
  return {
    id: childId(parent, name),
    kind: 'job',
    displayName: name,
    runAs: options?.runAs ?? SYSTEM_PRINCIPAL,
    getParent: () => parent,
  };
}

/** Create an agent/node context attached to the root. */
export function createAgentContext(
  root: CredentialsContext,
  name: string,
): CredentialsContext {
  return {
    id: `agent:${name}`,
    kind: 'agent',
    displayName: name,
    getParent: () => root,
  };
}

/** Create a user's personal context. User contexts are leaves with no parent. */
export function createUserContext(userId: string): UserContext {
  return {
    id: `user:${userId}`,
    kind: 'user',
    userId,
    displayName: userId,
    getParent: () => null,
  };
}

/** Create a context of a kind the core does not know about. */
export function createCustomContext(
  kind: string,
  id: string,
  parent: CredentialsContext | null,
  displayName = id,
): CredentialsContext {
  return { id, kind, displayName, getParent: () => parent };
}

function childId(parent: CredentialsContext, name: string): string {
  return parent.kind === 'root' ? name : `${parent.id}/${name}`;
}

// ─── Guards ─────────────────────────────────────────────────────

export function isJobContext(context: CredentialsContext): context is JobContext {
  return context.kind === 'job' && 'runAs' in context;
}

export function isUserContext(context: CredentialsContext): context is UserContext {
  return context.kind === 'user' && 'userId' in context;
}

// ─── Hierarchy Walk ─────────────────────────────────────────────

/** The context followed by its ancestors, nearest first. */
export function ancestry(context: CredentialsContext): CredentialsContext[] {
  const chain: CredentialsContext[] = [];
  const seen = new Set<CredentialsContext>();
  let current: CredentialsContext | null = context;
  while (current !== null && !seen.has(current)) {
    seen.add(current);
    chain.push(current);
    current = current.getParent();
  }
  return chain;
}

/** Contexts are the same when both kind and id agree; ids alone repeat across kinds. */
export function isSameContext(a: CredentialsContext, b: CredentialsContext): boolean {
  return a.kind === b.kind && a.id === b.id;
}

/** True when `ancestor` appears in the ancestry of `context` (inclusive). */
export function isWithin(context: CredentialsContext, ancestor: CredentialsContext): boolean {
  return ancestry(context).some((c) => isSameContext(c, ancestor));
}
