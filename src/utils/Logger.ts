/**
 * Module-scoped structured logger.
 * Supports log levels, filtering, custom sinks, and module-prefixed output.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const defaultSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Resolve a level name such as `"info"` (case-insensitive).
 * Unknown or missing names fall back to `fallback`.
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel): LogLevel {
  if (!name) return fallback;
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? fallback;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL, LogLevel.WARN);
let currentSink: LogSink = defaultSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Set the minimum log level globally. Messages below this level are suppressed. */
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  static getLevel(): LogLevel {
    return currentLevel;
  }

  /** Replace the default console output with a custom sink. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? defaultSink;
  }

  /** Convenience factory, equivalent to `new Logger(context)`. */
  static withContext(context: string): Logger {
    return new Logger(context);
  }

  debug(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.DEBUG) return;
    currentSink(LogLevel.DEBUG, `[${this.module}]`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.INFO) return;
    currentSink(LogLevel.INFO, `[${this.module}]`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.WARN) return;
    currentSink(LogLevel.WARN, `[${this.module}]`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    currentSink(LogLevel.ERROR, `[${this.module}]`, message, ...args);
  }
}
