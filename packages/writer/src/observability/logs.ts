/**
 * Structured logging for writer operations
 * Logs go to stderr as JSON lines so stdout stays free for command output
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  index?: string;
  kind?: string;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

/**
 * Minimal logging surface accepted by writer components
 */
export interface LoggerLike {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

export type LogSink = (line: string) => void;

export class Logger implements LoggerLike {
  #minLevel: LogLevel;
  #enabled = true;
  #sink: LogSink;

  constructor(minLevel: LogLevel = "info", sink: LogSink = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }
}

/**
 * Flatten an unknown error into log fields
 */
export function errorFields(err: unknown): { err_code: string; err_message: string } {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : err.name;
    return { err_code: code, err_message: err.message };
  }
  return { err_code: "UNKNOWN", err_message: String(err) };
}

function levelFromEnv(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

/**
 * Global logger instance
 */
export const logger = new Logger(levelFromEnv(process.env.SPANSTORE_LOG_LEVEL));
