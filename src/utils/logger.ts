/**
 * Logger Utility
 *
 * Structured console logging for the gateway. Each entry is a message plus
 * an optional field object. Debug and info output is only written when
 * debug mode is enabled; warnings and errors are always written.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

/**
 * Logger interface accepted by every component
 */
export interface Logger {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
}

const PREFIX = "[Switchyard]";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const write = (level: LogLevel, message: string, fields?: LogFields): void => {
  const args: unknown[] = fields ? [PREFIX, message, fields] : [PREFIX, message];
  switch (level) {
    case "error":
      console.error(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    default:
      console.log(...args);
  }
};

/**
 * No-op logger that discards all messages
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a console logger that writes entries at or above `level`
 */
export const createConsoleLogger = (options: { level?: LogLevel } = {}): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const at =
    (level: LogLevel) =>
    (message: string, fields?: LogFields): void => {
      if (LEVEL_ORDER[level] >= threshold) {
        write(level, message, fields);
      }
    };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
};

/**
 * Global debug state
 */
let globalDebugEnabled = false;

/**
 * Set global debug state
 */
export const setDebugEnabled = (enabled: boolean): void => {
  globalDebugEnabled = enabled;
};

/**
 * Check if debug is enabled
 */
export const isDebugEnabled = (): boolean => globalDebugEnabled;

/**
 * Default logger. Reads the debug flag on every call, so toggling it
 * affects components that were created earlier.
 */
const defaultLogger: Logger = {
  debug: (message, fields) => {
    if (globalDebugEnabled) write("debug", message, fields);
  },
  info: (message, fields) => {
    if (globalDebugEnabled) write("info", message, fields);
  },
  warn: (message, fields) => write("warn", message, fields),
  error: (message, fields) => write("error", message, fields),
};

/**
 * Get the default logger
 */
export const getLogger = (): Logger => defaultLogger;

/**
 * Message of an unknown thrown value, for log fields
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
