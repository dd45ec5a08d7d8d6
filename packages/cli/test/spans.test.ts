import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseSpanInput } from "../src/lib/spans.js";
import { CliError } from "../src/lib/errors.js";

const minimal = {
  traceId: "t1",
  spanId: "a1",
  operationName: "GET /orders",
  startTime: "2024-03-07T12:00:00Z",
  duration: 1500,
  process: { serviceName: "checkout" },
};

describe("parseSpanInput", () => {
  it("should parse a JSON array and apply defaults", () => {
    const [span] = parseSpanInput(JSON.stringify([minimal]), "spans.json");

    expect(span).toEqual({
      traceId: "t1",
      spanId: "a1",
      operationName: "GET /orders",
      references: [],
      flags: 0,
      startTime: new Date("2024-03-07T12:00:00.000Z"),
      duration: 1500,
      tags: [],
      logs: [],
      process: { serviceName: "checkout", tags: [] },
    });
  });

  it("should parse NDJSON, skipping blank lines", () => {
    const text = [
      JSON.stringify(minimal),
      "",
      JSON.stringify({ ...minimal, spanId: "a2", startTime: 1709812800000 }),
      "",
    ].join("\n");

    const spans = parseSpanInput(text, "spans.ndjson");

    expect(spans.map((span) => span.spanId)).toEqual(["a1", "a2"]);
    expect(spans[1]?.startTime.toISOString()).toBe("2024-03-07T12:00:00.000Z");
  });

  it("should convert log timestamps and keep typed tag values", () => {
    const [span] = parseSpanInput(
      JSON.stringify([
        {
          ...minimal,
          tags: [
            { key: "error", value: true },
            { key: "http.status_code", value: 500 },
          ],
          logs: [{ timestamp: "2024-03-07T12:00:00.250Z", fields: [{ key: "event", value: "retry" }] }],
        },
      ]),
      "spans.json"
    );

    expect(span?.tags).toEqual([
      { key: "error", value: true },
      { key: "http.status_code", value: 500 },
    ]);
    expect(span?.logs[0]?.timestamp.toISOString()).toBe("2024-03-07T12:00:00.250Z");
  });

  it("should return no spans for empty input", () => {
    expect(parseSpanInput("  \n", "spans.json")).toEqual([]);
  });

  it("should name the line of invalid NDJSON", () => {
    const text = `${JSON.stringify(minimal)}\n{not json`;

    expect(() => parseSpanInput(text, "spans.ndjson")).toThrow(InvalidArgumentError);
    expect(() => parseSpanInput(text, "spans.ndjson")).toThrow(/^Invalid JSON in spans\.ndjson line 2: /);
  });

  it("should list the invalid fields of a span", () => {
    const { duration: _duration, ...missingDuration } = minimal;
    const text = JSON.stringify([minimal, { ...missingDuration, flags: -1 }]);

    expect(() => parseSpanInput(text, "spans.json")).toThrow(CliError);
    expect(() => parseSpanInput(text, "spans.json")).toThrow(
      "Invalid span #2 in spans.json: flags: Number must be greater than or equal to 0; duration: Required"
    );
  });
});
