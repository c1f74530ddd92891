export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const LogLevels = Object.freeze({
  DEBUG: "DEBUG",
  INFO: "INFO",
  WARNING: "WARNING",
  ERROR: "ERROR"
});

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels];

const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3
});

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_RANK, value);
}

export type ConsoleOutput = Pick<Console, "debug" | "log" | "warn" | "error">;

export function createNoopLogger(): Logger {
  return {
    debug() {},
    info() {},
    warn() {},
    error() {}
  };
}

/**
 * Console-backed logger used by the worker entry point. Calls below
 * `minLevel` are dropped.
 */
export function createConsoleLogger(
  component: string,
  minLevel: LogLevel = LogLevels.INFO,
  output: ConsoleOutput = console
): Logger {
  const prefix = `[${component}]`;
  const threshold = LOG_LEVEL_RANK[minLevel];
  const emit = (
    level: LogLevel,
    write: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>
  ): void => {
    if (LOG_LEVEL_RANK[level] < threshold) {
      return;
    }
    write(prefix, message, context ? JSON.stringify(context) : "");
  };

  return {
    debug(message, context) {
      emit(LogLevels.DEBUG, output.debug, message, context);
    },
    info(message, context) {
      emit(LogLevels.INFO, output.log, message, context);
    },
    warn(message, context) {
      emit(LogLevels.WARNING, output.warn, message, context);
    },
    error(message, context) {
      emit(LogLevels.ERROR, output.error, message, context);
    }
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
