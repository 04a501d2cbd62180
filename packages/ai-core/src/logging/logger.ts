/**
 * Pino Logger Factory
 *
 * Structured logging via pino. Components receive a module logger through
 * their options; there is no process-wide default instance.
 */

import pino, { type LoggerOptions, type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty-print through pino-pretty (development only) */
  pretty?: boolean;
  /** Bindings attached to every line */
  base?: Record<string, unknown>;
  transport?: LoggerOptions["transport"];
}

/**
 * Logger surface used across the codebase: message first, data second.
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.VITEST ? "silent" : "info";
}

/**
 * Create a pino logger instance.
 */
export function createPinoLogger(config: LoggerConfig = {}): PinoLogger {
  const options: LoggerOptions = {
    level: config.level ?? defaultLevel(),
    base: { service: "ragline", ...config.base },
  };

  if (config.transport) {
    options.transport = config.transport;
  } else if (config.pretty ?? process.env.NODE_ENV === "development") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

/**
 * Create a root logger wrapper.
 */
export function createLogger(config: LoggerConfig & { module?: string } = {}): Logger {
  const base = createPinoLogger(config);
  return wrapLogger(config.module ? base.child({ module: config.module }) : base);
}

/**
 * Derive a module logger from a parent, or build a fresh one.
 */
export function createModuleLogger(module: string, parent?: Logger): Logger {
  return parent ? parent.child({ module }) : createLogger({ module });
}

export function wrapLogger(logger: PinoLogger): Logger {
  return {
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, error, data) => {
      if (error instanceof Error) {
        logger.error({ ...data, err: error }, msg);
      } else if (error !== undefined) {
        logger.error({ ...data, err: String(error) }, msg);
      } else if (data) {
        logger.error(data, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

/**
 * Logger that discards everything. Handy in tests.
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => noopLogger,
};
