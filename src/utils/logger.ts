/**
 * Pino-based Logger Utility
 *
 * Provides structured logging with pretty printing and dynamic level control.
 * While the interactive viewer owns the terminal, logs go to a file
 * destination or nowhere.
 */

import pino, { type Logger as PinoLogger, type DestinationStream } from "pino";
import type { LogLevel } from "../settings/types.js";

export type { LogLevel };

/**
 * Logger configuration options
 */
export interface LoggerOptions {
  level?: LogLevel;
  tuiMode?: boolean;
  /** Where logs go in TUI mode; omitted means logging is silenced */
  tuiDestination?: DestinationStream;
}

// Singleton logger instance
let loggerInstance: PinoLogger | null = null;
let isTuiMode = false;

function createLogger(options: LoggerOptions = {}): PinoLogger {
  const level = options.level ?? "info";

  if (options.tuiMode) {
    isTuiMode = true;
    if (options.tuiDestination) {
      return pino({ level }, options.tuiDestination);
    }
    return pino({ level: "silent" });
  }

  isTuiMode = false;
  if (level === "silent") {
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: 2,
      },
    },
  });
}

/**
 * Create a file destination for TUI mode.
 */
export function createFileDestination(path: string): DestinationStream {
  return pino.destination({ dest: path, mkdir: true, sync: false });
}

/**
 * Check if logger is in TUI mode
 */
export function isLoggerInTuiMode(): boolean {
  return isTuiMode;
}

/**
 * Initialize the logger with custom options.
 * Can be called multiple times to reconfigure.
 * Note: TUI mode requires recreation of the logger instance.
 */
export function initLogger(options: LoggerOptions = {}): void {
  const needsRecreation = (options.tuiMode !== undefined && options.tuiMode !== isTuiMode) || options.tuiDestination !== undefined;

  if (loggerInstance && !needsRecreation) {
    loggerInstance.level = options.level ?? "info";
  } else {
    loggerInstance = createLogger(options);
  }
}

/**
 * Get the singleton logger instance.
 * Creates a default logger if not initialized.
 */
export function getLogger(): PinoLogger {
  loggerInstance ??= createLogger();
  return loggerInstance;
}

/**
 * Change the log level dynamically.
 */
export function setLogLevel(level: LogLevel): void {
  const logger = getLogger();
  logger.level = level;
}
