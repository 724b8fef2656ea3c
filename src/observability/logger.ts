import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for huddle-core. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Adapts pino's `(object, message)` call order to our `(message, context)` order.
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

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** Write to stderr, for processes whose stdout carries a protocol. */
  stderr?: boolean;
}

/** Create a structured pino logger instance. */
export function createLogger(options?: LoggerOptions): Logger {
  const fd = options?.stderr ? 2 : 1;
  const pretty = process.env['NODE_ENV'] === 'development';
  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'huddle-core',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, destination: fd } }
      : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'botToken',
        'signingSecret',
        'token',
        '*.apiKey',
        '*.botToken',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  };
  const pinoInstance = pretty ? pino(pinoOptions) : pino(pinoOptions, pino.destination(fd));

  return wrapPino(pinoInstance);
}
