/**
 * Command timing
 *
 * Durations always go to the shared metrics registry; with
 * SPANSTORE_CLI_DEBUG=1 they are also echoed to stderr.
 */

import { metrics as defaultMetrics, type MetricsRegistry } from "@spanstore/writer";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Echo a metric line to stderr in verbose mode
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Run a command body, recording `spanstore.cli.duration_ms{command,result}`
 */
export async function withTiming<T>(
  command: string,
  fn: () => Promise<T>,
  registry: MetricsRegistry = defaultMetrics
): Promise<T> {
  const start = Date.now();
  let result: "ok" | "error" = "error";

  try {
    const value = await fn();
    result = "ok";
    return value;
  } finally {
    const duration = Date.now() - start;
    registry.observe("spanstore.cli.duration_ms", duration, { command, result });
    emitMetric(`cli.${command}`, { duration_ms: duration, result });
  }
}
