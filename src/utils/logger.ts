/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

/**
 * Minimal logging surface shared by every component. Components accept one
 * through their options so callers can route output elsewhere.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

let currentLogLevel: LogLevel = LogLevel.INFO; // Default level

/**
 * Sets the current logging level for the application.
 * @param level - The desired log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Parses a level name such as `debug` or `WARN`. Unknown values yield undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toUpperCase()) {
    case "ERROR":
      return LogLevel.ERROR;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "INFO":
      return LogLevel.INFO;
    case "DEBUG":
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

/**
 * Provides logging functionalities with level control.
 */
export const logger: Logger = {
  /**
   * Logs a debug message if the current log level is DEBUG or higher.
   */
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  /**
   * Logs an info message if the current log level is INFO or higher.
   */
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message); // Using console.log for INFO
    }
  },
  /**
   * Logs a warning message if the current log level is WARN or higher.
   */
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  /**
   * Logs an error message (always logs).
   */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
