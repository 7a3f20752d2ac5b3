/**
 * Structured logging sink
 *
 * Every component receives a Logger explicitly (constructor or call argument)
 * instead of writing to a shared console. Background jobs bind their own
 * child logger so their lines carry the job key.
 */

import pino from "pino";

export type LogFields = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

/**
 * Minimal shape shared by pino loggers and Fastify's request/app loggers
 */
export interface PinoLike {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  child(bindings: LogFields): PinoLike;
}

/**
 * Adapt a pino (or Fastify) logger to the Logger interface
 */
export function fromPino(base: PinoLike): Logger {
  return {
    debug: (message, fields) => base.debug(fields ?? {}, message),
    info: (message, fields) => base.info(fields ?? {}, message),
    warn: (message, fields) => base.warn(fields ?? {}, message),
    error: (message, fields) => base.error(fields ?? {}, message),
    child: (bindings) => fromPino(base.child(bindings)),
  };
}

export interface CreateLoggerOptions {
  level?: LogLevel | "silent";
  name?: string;
}

/**
 * Create a standalone pino-backed logger
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return fromPino(
    pino({
      name: options.name,
      level: options.level ?? "info",
    })
  );
}

/**
 * Logger that drops everything (tests, library callers that don't care)
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: "silent" });
}

/**
 * Flatten an unknown error into log fields
 */
export function errorFields(error: unknown): LogFields {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}
