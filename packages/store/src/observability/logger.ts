/**
 * Structured logging to stderr
 * One JSON object per line so stdout stays free for command output
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  #minLevel: LogLevel;
  #enabled = true;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  #shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  #log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.#shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    console.error(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.#log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.#log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.#log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.#log("error", event, data);
  }
}

const envLevel = process.env.CATALOG_LOG_LEVEL ?? "info";

// Singleton logger instance
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");
