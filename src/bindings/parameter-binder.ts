/**
 * Parameter binder — per-execution map from parameter name to the credential
 * it was bound to. Last write wins.
 */
import type { Logger } from '@/observability/logger.js';

import type { Execution, ParameterBinding } from './types.js';

export interface ParameterBinder {
  bind(userId: string | null, parameterName: string, credentialId: string, isDefault: boolean): void;
  unbind(parameterName: string): boolean;
  lookup(parameterName: string): ParameterBinding | null;
  isEmpty(): boolean;
  list(): ParameterBinding[];
}

export function createParameterBinder(): ParameterBinder {
  const bindings = new Map<string, ParameterBinding>();

  return {
    bind(userId, parameterName, credentialId, isDefault) {
      bindings.set(parameterName, { parameterName, userId, credentialId, isDefault });
    },
    unbind: (parameterName) => bindings.delete(parameterName),
    lookup: (parameterName) => bindings.get(parameterName) ?? null,
    isEmpty: () => bindings.size === 0,
    list: () => [...bindings.values()],
  };
}

// ─── Registry ───────────────────────────────────────────────────

export interface ParameterBinderRegistry {
  /**
   * The binder of `execution`, created on first request and seeded from its
   * credential-typed parameters, attributed to the triggering user.
   */
  binderFor(execution: Execution): ParameterBinder;
  /** Drop the binder of a finished execution. */
  discard(executionId: string): boolean;
  size(): number;
}

export function createParameterBinderRegistry(deps: { logger: Logger }): ParameterBinderRegistry {
  const { logger } = deps;
  const binders = new Map<string, ParameterBinder>();

  return {
    binderFor(execution: Execution): ParameterBinder {
      const existing = binders.get(execution.id);
      if (existing) return existing;

      const binder = createParameterBinder();
      for (const parameter of execution.parameters) {
        if (!parameter.credentialTyped) continue;
        binder.bind(
          execution.triggeredBy,
          parameter.name,
          parameter.value,
          parameter.isDefault ?? false,
        );
      }
      binders.set(execution.id, binder);
      logger.debug('Created parameter binder', {
        component: 'parameter-binder',
        executionId: execution.id,
        contextId: execution.job.id,
        bindings: binder.list().length,
      });
      return binder;
    },

    discard(executionId: string): boolean {
      return binders.delete(executionId);
    },

    size: () => binders.size,
  };
}
