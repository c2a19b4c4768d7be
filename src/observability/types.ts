// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  contextId?: string;
  storeId?: string;
  providerId?: string;
  credentialId?: string;
  executionId?: string;
  component: string;
  [key: string]: unknown;
}

// ─── Diagnostics ────────────────────────────────────────────────

/**
 * Anomalies kept off the public resolution API.
 * `read-denied` and `not-found` let an administrator tell apart the two
 * outcomes that callers see as the same empty result.
 */
export type DiagnosticKind =
  | 'corrupt-state'
  | 'provider-failure'
  | 'read-denied'
  | 'not-found';

export interface DiagnosticEvent {
  kind: DiagnosticKind;
  message: string;
  at: Date;
  details: Record<string, unknown>;
}
