// Structured logging + administrative diagnostics
export type { DiagnosticEvent, DiagnosticKind, LogContext, LogLevel } from './types.js';

export type { Logger } from './logger.js';
export { createLogger } from './logger.js';

export type { Diagnostics, DiagnosticsOptions } from './diagnostics.js';
export { createDiagnostics } from './diagnostics.js';
