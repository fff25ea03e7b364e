import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

import { getRuntimeConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: "nbkit",
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

let defaultLogger: Logger | null = null;

/**
 * Error-reporting channel used when callers pass no logger: JSON lines on
 * stderr, so cell failures never mix with what cells print to stdout.
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger(getRuntimeConfig().logLevel, pino.destination(2));
  return defaultLogger;
}
