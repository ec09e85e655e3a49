import { pino } from "pino";

import type { DestinationStream, Logger } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export interface LoggerFactoryOptions {
  /** Name bound to every record (pino's `name` field). */
  name?: string;
  /**
   * Minimum level to emit.
   * @default process.env.LOG_LEVEL, then "info"
   */
  level?: LoggerLevels | "silent";
  /** Static fields merged into every record. */
  bindings?: LoggerMeta;
  /** Where records are written. Defaults to stdout. */
  destination?: DestinationStream;
}

const LEVELS: readonly string[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

const isLevel = (value: string): value is LoggerLevels | "silent" =>
  LEVELS.includes(value);

const resolveLevel = (level?: LoggerLevels | "silent") => {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLevel(fromEnv) ? fromEnv : "info";
};

/**
 * Builds a level-method logger over pino.
 * Errors passed as the message are logged under pino's `err` key
 * so their stack is serialized.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoOptions = {
    name: options.name,
    level: resolveLevel(options.level),
    base: options.bindings ?? {},
  };
  const pinoLogger: Logger = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      pinoLogger[level](meta ?? {}, message);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, pinoLogger };
};

export default loggerFactory;
