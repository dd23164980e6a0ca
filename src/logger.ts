/**
 * Component-tagged console logger.
 *
 * Every line is prefixed with the component tag (e.g. `[Pipeline]`) so correction
 * decisions stay greppable in worker logs. Pass `silentLogger` in tests.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger for a sub-component, e.g. `[Pipeline:IdRepair]` */
  child(tag: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function createLogger(tag: string, minLevel: LogLevel = "info"): Logger {
  const enabled = (level: LogLevel) =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const prefix = `[${tag}]`;

  return {
    debug(message, ...args) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...args);
    },
    child(childTag) {
      return createLogger(`${tag}:${childTag}`, minLevel);
    },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
