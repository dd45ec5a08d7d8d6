/**
 * Span builders for tests
 */

import type { Span } from "@spanstore/writer";

/**
 * Build a span with sensible defaults, overriding any field
 */
export function makeSpan(overrides: Partial<Span> = {}): Span {
  return {
    traceId: "0000000000000001",
    spanId: "00000000000000a1",
    operationName: "GET /orders",
    references: [],
    flags: 1,
    startTime: new Date("2024-03-07T12:00:00.000Z"),
    duration: 1500,
    tags: [],
    logs: [],
    process: { serviceName: "checkout", tags: [] },
    ...overrides,
  };
}

/**
 * Build a span for a given service and operation
 */
export function makeServiceSpan(serviceName: string, operationName: string, startTime?: Date): Span {
  return makeSpan({
    operationName,
    process: { serviceName, tags: [] },
    ...(startTime ? { startTime } : {}),
  });
}
