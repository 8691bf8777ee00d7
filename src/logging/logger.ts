/**
 * Console Logger
 *
 * Leveled wrapper around console output. Every line carries a bracketed
 * component prefix, e.g. `[ToolRegistry] Loaded 3 tool(s)`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

/**
 * Create a logger for one component. The level threshold is global so that
 * `setLogLevel` applies to loggers created before it was called.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}

/** Shorten long payloads before they go into a log line. */
export function preview(text: string, max = 200): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}
