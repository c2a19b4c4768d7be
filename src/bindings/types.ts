/**
 * Execution and parameter binding types.
 *
 * Bindings are runtime only: they live as long as the execution they belong
 * to and are never persisted.
 */
import type { JobContext } from '@/core/types.js';

/** Which credential a parameter resolved to, and who supplied it. */
export interface ParameterBinding {
  readonly parameterName: string;
  /** The user who supplied the value; null for defaults and system triggers. */
  readonly userId: string | null;
  readonly credentialId: string;
  readonly isDefault: boolean;
}

/** A parameter value of an execution. Only credential-typed values are bound. */
export interface ExecutionParameter {
  readonly name: string;
  readonly value: string;
  readonly credentialTyped: boolean;
  /** The value is the parameter's configured default. */
  readonly isDefault?: boolean;
}

/** One run of a job. */
export interface Execution {
  readonly id: string;
  readonly job: JobContext;
  /** The user who triggered this run directly, if any. */
  readonly triggeredBy: string | null;
  readonly parameters: readonly ExecutionParameter[];
}
