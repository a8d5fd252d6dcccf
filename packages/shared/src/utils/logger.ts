/**
 * Structured Logging Utility
 * Provides consistent logging across the bridge, the agent and the CLI.
 *
 * One line per event: `[time] LEVEL component="bridge" key=value - message`.
 * Keys and block contents must never be passed as context.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  component: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Structured logger with context support
 */
export class Logger {
  constructor(
    private component: string,
    private minLevel: LogLevel = "info",
    private readonly bound: Partial<LogContext> = {},
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private format(level: LogLevel, message: string, context?: Partial<LogContext>): string {
    const timestamp = new Date().toISOString();
    const ctx = { component: this.component, ...this.bound, ...context };
    const contextStr = Object.entries(ctx)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(" ");
    return `[${timestamp}] ${level.toUpperCase()} ${contextStr} - ${message}`;
  }

  debug(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("debug")) {
      console.debug(this.format("debug", message, context));
    }
  }

  info(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("info")) {
      console.info(this.format("info", message, context));
    }
  }

  warn(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, context));
    }
  }

  error(message: string, error?: Error, context?: Partial<LogContext>): void {
    if (this.shouldLog("error")) {
      const errorContext = error
        ? { ...context, error: error.message, stack: error.stack }
        : context;
      console.error(this.format("error", message, errorContext));
    }
  }

  /**
   * Create child logger with additional context
   */
  child(additionalContext: Partial<LogContext>): Logger {
    return new Logger(this.component, this.minLevel, {
      ...this.bound,
      ...additionalContext,
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Parse a LOG_LEVEL style value, falling back when unset or unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

/**
 * Create logger instance
 */
export function createLogger(component: string, level: LogLevel = "info"): Logger {
  return new Logger(component, level);
}
