/**
 * Diagnostics — bounded in-memory record of anomalies.
 *
 * This is the administrative side channel: corrupt persisted state, failing
 * providers and the reasons behind empty resolution results end up here
 * instead of surfacing as errors on the public API.
 */
import type { DiagnosticEvent, DiagnosticKind } from './types.js';

export interface Diagnostics {
  record(kind: DiagnosticKind, message: string, details?: Record<string, unknown>): void;
  /** Most recent events, oldest first. */
  list(kind?: DiagnosticKind): DiagnosticEvent[];
  clear(): void;
}

export interface DiagnosticsOptions {
  /** Maximum events retained. Default: 500. */
  capacity?: number;
}

/** Create a ring-buffer diagnostics recorder. */
export function createDiagnostics(options?: DiagnosticsOptions): Diagnostics {
  const capacity = options?.capacity ?? 500;
  const events: DiagnosticEvent[] = [];

  return {
    record(kind: DiagnosticKind, message: string, details?: Record<string, unknown>): void {
      events.push({ kind, message, at: new Date(), details: details ?? {} });
      if (events.length > capacity) {
        events.splice(0, events.length - capacity);
      }
    },

    list(kind?: DiagnosticKind): DiagnosticEvent[] {
      return kind === undefined ? [...events] : events.filter((e) => e.kind === kind);
    },

    clear(): void {
      events.length = 0;
    },
  };
}
