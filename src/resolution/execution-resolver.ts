/**
 * Execution resolution — resolves a credential reference made by a running
 * job, where the reference may be a `${PARAM}` expression bound to a value
 * the triggering user supplied.
 */
import { parameterNameOf } from '@/credentials/credential.js';
import type { Credential } from '@/credentials/types.js';
import type { Principal } from '@/core/types.js';
import { ANONYMOUS_PRINCIPAL, userPrincipal } from '@/core/types.js';
import type { Execution, ParameterBinding } from '@/bindings/types.js';
import type { ParameterBinderRegistry } from '@/bindings/parameter-binder.js';
import type { DomainRequirement } from '@/domains/types.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import type { Logger } from '@/observability/logger.js';
import type { AccessPolicy } from '@/security/access-policy.js';

import type { CredentialsResolver } from './credentials-resolver.js';
import { dedupById, firstOrNull, withId } from './matchers.js';

export interface ExecutionResolver {
  findForExecution(
    execution: Execution,
    idOrExpression: string,
    type: string,
    requirements?: readonly DomainRequirement[],
    signal?: AbortSignal,
  ): Promise<Credential | null>;
}

export interface ExecutionResolverDeps {
  resolver: CredentialsResolver;
  binders: ParameterBinderRegistry;
  policy: AccessPolicy;
  diagnostics: Diagnostics;
  logger: Logger;
}

export function createExecutionResolver(deps: ExecutionResolverDeps): ExecutionResolver {
  const { resolver, binders, policy, diagnostics, logger } = deps;

  return {
    async findForExecution(execution, idOrExpression, type, requirements, signal) {
      const { job } = execution;
      const listAs = (principal: Principal): Promise<Credential[]> =>
        resolver.listCredentials(type, job, principal, {
          requirements,
          includeUserContext: true,
          signal,
        });

      let id = idOrExpression.trim();
      let binding: ParameterBinding | null = null;
      const parameterName = parameterNameOf(idOrExpression);
      if (parameterName !== null) {
        binding = binders.binderFor(execution).lookup(parameterName);
        if (binding === null) {
          diagnostics.record('not-found', `Parameter "${parameterName}" is not bound in execution "${execution.id}"`, {
            executionId: execution.id,
            contextId: job.id,
            parameterName,
          });
          return null;
        }
        id = binding.credentialId;
      }

      const candidates: Credential[] = [];
      if (binding === null || binding.isDefault) {
        candidates.push(...(await listAs(job.runAs)));
      } else {
        const supplier = binding.userId !== null ? userPrincipal(binding.userId) : ANONYMOUS_PRINCIPAL;
        if (binding.userId !== null && policy.hasPermission(supplier, 'useOwn', job)) {
          candidates.push(...(await listAs(supplier)));
        }
        if (policy.hasPermission(supplier, 'useItem', job)) {
          candidates.push(...(await listAs(job.runAs)));
        }
      }

      const found = firstOrNull(dedupById(candidates), withId(id));
      logger.debug('Resolved execution credential', {
        component: 'execution-resolver',
        executionId: execution.id,
        contextId: job.id,
        credentialId: id,
        found: found !== null,
      });
      if (found === null) {
        diagnostics.record('not-found', `No credential "${id}" for execution "${execution.id}"`, {
          executionId: execution.id,
          contextId: job.id,
          credentialId: id,
          parameterName,
        });
      }
      return found;
    },
  };
}
