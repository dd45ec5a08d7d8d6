/**
 * Output rendering helpers
 */

import type { IndexNames, IndexingMode } from "@spanstore/writer";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * Human-readable routing for one span start time
 */
export function formatIndexNames(mode: IndexingMode, names: IndexNames): string[] {
  return [
    `mode: ${mode}`,
    `span index: ${names.spanIndex}`,
    `service index: ${names.serviceIndex === "" ? "(none)" : names.serviceIndex}`,
  ];
}

export interface WriteSummary {
  written: number;
  failed: number;
}

export function formatWriteSummary(summary: WriteSummary): string {
  const total = summary.written + summary.failed;
  return `Wrote ${summary.written} of ${total} ${total === 1 ? "span" : "spans"}`;
}
