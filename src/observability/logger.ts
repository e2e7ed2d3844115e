import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for runwarden. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** Where log lines go. The CLI uses stderr so stdout carries only results. */
  destination?: 'stdout' | 'stderr';
}

/**
 * Adapt a pino instance to the `(msg, context)` call shape used across
 * the codebase. pino itself wants the merge object first.
 */
function wrapPino(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => { instance.debug(context ?? {}, msg); },
    info: (msg, context) => { instance.info(context ?? {}, msg); },
    warn: (msg, context) => { instance.warn(context ?? {}, msg); },
    error: (msg, context) => { instance.error(context ?? {}, msg); },
    fatal: (msg, context) => { instance.fatal(context ?? {}, msg); },
    child: (bindings) => wrapPino(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: LoggerOptions): Logger {
  const fd = options?.destination === 'stderr' ? 2 : 1;
  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'runwarden',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: ['*.password', '*.secret', '*.token', 'environmentVariables'],
      censor: '[REDACTED]',
    },
  };

  const pinoInstance = process.env['NODE_ENV'] === 'development'
    ? pino({
      ...pinoOptions,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: fd } },
    })
    : pino(pinoOptions, pino.destination(fd));

  return wrapPino(pinoInstance);
}
