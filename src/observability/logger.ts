import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for credentials-core. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'credentials-core',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'secret',
        'password',
        'plaintext',
        'value',
        '*.secret',
        '*.password',
        '*.plaintext',
      ],
      censor: '[REDACTED]',
    },
  });

  return adaptPino(pinoInstance);
}

/**
 * pino takes (object, message); the Logger interface takes (message, context).
 */
function adaptPino(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => { instance.debug(context ?? {}, msg); },
    info: (msg, context) => { instance.info(context ?? {}, msg); },
    warn: (msg, context) => { instance.warn(context ?? {}, msg); },
    error: (msg, context) => { instance.error(context ?? {}, msg); },
    fatal: (msg, context) => { instance.fatal(context ?? {}, msg); },
    child: (bindings) => adaptPino(instance.child(bindings)),
  };
}
