/**
 * Logger that keeps events in memory
 */

import type { LoggerLike, LogLevel } from "@spanstore/writer";

export interface RecordedLog {
  level: LogLevel;
  event: string;
  data: Record<string, unknown>;
}

export class RecordingLogger implements LoggerLike {
  readonly entries: RecordedLog[] = [];

  debug(event: string, data: Record<string, unknown> = {}): void {
    this.entries.push({ level: "debug", event, data });
  }

  info(event: string, data: Record<string, unknown> = {}): void {
    this.entries.push({ level: "info", event, data });
  }

  warn(event: string, data: Record<string, unknown> = {}): void {
    this.entries.push({ level: "warn", event, data });
  }

  error(event: string, data: Record<string, unknown> = {}): void {
    this.entries.push({ level: "error", event, data });
  }

  events(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.event);
  }
}
