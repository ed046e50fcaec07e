import { pino } from "pino";
import { isMainThread, parentPort } from "node:worker_threads";

import type { DestinationStream, Logger as PinoLogger } from "pino";

export const LOGGER_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LoggerLevels = (typeof LOGGER_LEVELS)[number];
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;
export interface WorkerLoggerPostMessageType {
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
  type: "message";
}

export interface LoggerFactoryOptions {
  name?: string;
  /**
   * Falls back to `process.env.LOG_LEVEL`, then `"info"`.
   */
  level?: LoggerLevels;
  /**
   * Where records are written. Defaults to stdout.
   */
  destination?: DestinationStream;
}

export class InvalidLogLevelError extends Error {
  constructor(public readonly level: string) {
    super(
      `Invalid log level "${level}", expected one of: ${LOGGER_LEVELS.join(", ")}`,
    );
    this.name = "InvalidLogLevelError";
  }
}

const isLoggerLevel = (value: string): value is LoggerLevels =>
  LOGGER_LEVELS.some((level) => level === value);

export const resolveLogLevel = (
  level: string | undefined = process.env.LOG_LEVEL,
): LoggerLevels => {
  if (level === undefined || level === "") {
    return "info";
  }
  if (!isLoggerLevel(level)) {
    throw new InvalidLogLevelError(level);
  }
  return level;
};

/**
 * This logger can be used
 * in both the main thread and worker threads.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoOptions = {
    name: options.name,
    level: resolveLogLevel(options.level),
  };
  const pinoLogger: PinoLogger = options.destination
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
      //If inside a worker thread
      if (!isMainThread) {
        const postMessage: WorkerLoggerPostMessageType = {
          type: "message",
          level,
          message,
          meta,
        };
        //NOTE: meta must survive the structured clone algorithm
        parentPort?.postMessage(postMessage);

        return;
      }
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
