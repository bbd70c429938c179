import pino from 'pino';
import { getSettings } from '../config/settings.js';
import type { LogLevel } from '../config/settings.js';

/**
 * Logging abstraction used across frameport. Currently backed by pino.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;
  /** Create a child logger that adds `bindings` to every entry. */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Minimum level. Default: `FRAMEPORT_LOG_LEVEL`, else `'info'`. */
  readonly level?: LogLevel;
  /** Fields attached to every entry. */
  readonly context?: Record<string, unknown>;
  /** Destination stream. Default: stdout. */
  readonly destination?: pino.DestinationStream;
}

class PinoLogger implements Logger {
  constructor(private readonly logger: pino.Logger) {}

  trace(message: string, context?: Record<string, unknown>): void {
    this.logger.trace(context ?? {}, message);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.logger.error(withError(context, error), message);
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.logger.fatal(withError(context, error), message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

function withError(context: Record<string, unknown> | undefined, error: unknown): Record<string, unknown> {
  if (error instanceof Error) return { ...context, err: error };
  if (error !== undefined) return { ...context, error };
  return { ...context };
}

/** Build a pino-backed logger. */
export function createLogger(options?: LoggerOptions): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options?.level ?? getSettings().logLevel,
    base: { name: 'frameport', ...options?.context },
  };
  const instance = options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  return new PinoLogger(instance);
}

let defaultLogger: Logger | null = null;

/** Shared logger for components constructed without one. */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}
