import pino from "pino";
import type { LogConfig } from "./config";

export interface LogMeta {
  book?: string;
  page?: number;
  batch?: number;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

/**
 * Creates a Pino-backed logger.
 *
 * `structured: false` routes output through pino-pretty for terminal use;
 * otherwise newline-delimited JSON is written to stdout.
 */
export function createLogger(config: LogConfig): Logger {
  const pinoLogger = pino({
    level: config.level,
    ...(config.structured === false && {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    }),
  });
  return wrap(pinoLogger);
}

function wrap(instance: pino.Logger): Logger {
  return {
    debug: (message, meta) => instance.debug(meta ?? {}, message),
    info: (message, meta) => instance.info(meta ?? {}, message),
    warn: (message, meta) => instance.warn(meta ?? {}, message),
    error: (message, meta) => instance.error(meta ?? {}, message),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/**
 * Logger that drops everything. Used by tests and library callers that
 * bring their own reporting.
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => nullLogger,
};
