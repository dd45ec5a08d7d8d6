/**
 * Tests for span → storage document conversion
 */

import { describe, it, expect } from "vitest";
import { makeSpan } from "@spanstore/testkit";
import { createSpanConverter } from "./converter.js";
import type { Span } from "./types.js";

const START_MS = 1709812800000; // 2024-03-07T12:00:00Z

function richSpan(): Span {
  return makeSpan({
    traceId: "trace-1",
    spanId: "span-2",
    startTime: new Date(START_MS),
    duration: 2500,
    references: [
      { refType: "FOLLOWS_FROM", traceId: "trace-1", spanId: "span-0" },
      { refType: "CHILD_OF", traceId: "trace-1", spanId: "span-1" },
    ],
    tags: [
      { key: "http.method", value: "GET" },
      { key: "http.status_code", value: 200 },
      { key: "error", value: true },
      { key: "ratio", value: 0.5 },
      { key: "payload", value: new Uint8Array([1, 255]) },
    ],
    logs: [{ timestamp: new Date(START_MS + 250), fields: [{ key: "event", value: "retry" }] }],
    process: { serviceName: "checkout", tags: [{ key: "host.name", value: "web-1" }] },
  });
}

describe("FromDomainConverter", () => {
  describe("default settings", () => {
    const doc = createSpanConverter().fromDomain(richSpan());

    it("should convert ids, times and references", () => {
      expect(doc).toMatchObject({
        traceID: "trace-1",
        spanID: "span-2",
        parentSpanID: "span-1",
        flags: 1,
        operationName: "GET /orders",
        startTime: START_MS * 1000,
        startTimeMillis: START_MS,
        duration: 2500,
        references: [
          { refType: "FOLLOWS_FROM", traceID: "trace-1", spanID: "span-0" },
          { refType: "CHILD_OF", traceID: "trace-1", spanID: "span-1" },
        ],
      });
    });

    it("should keep every tag as a typed string pair", () => {
      expect(doc.tags).toEqual([
        { key: "http.method", type: "string", value: "GET" },
        { key: "http.status_code", type: "int64", value: "200" },
        { key: "error", type: "bool", value: "true" },
        { key: "ratio", type: "float64", value: "0.5" },
        { key: "payload", type: "binary", value: "01ff" },
      ]);
      expect(doc.tag).toBeUndefined();
    });

    it("should convert logs to microseconds", () => {
      expect(doc.logs).toEqual([
        { timestamp: (START_MS + 250) * 1000, fields: [{ key: "event", type: "string", value: "retry" }] },
      ]);
    });

    it("should embed the process", () => {
      expect(doc.process).toEqual({
        serviceName: "checkout",
        tags: [{ key: "host.name", type: "string", value: "web-1" }],
      });
    });
  });

  describe("tag flattening", () => {
    it("should move every non-binary tag into fields when allTagsAsFields is set", () => {
      const doc = createSpanConverter({ allTagsAsFields: true }).fromDomain(richSpan());

      expect(doc.tag).toEqual({
        "http@method": "GET",
        "http@status_code": 200,
        error: true,
        ratio: 0.5,
      });
      expect(doc.tags).toEqual([{ key: "payload", type: "binary", value: "01ff" }]);
      expect(doc.process).toEqual({ serviceName: "checkout", tags: [], tag: { "host@name": "web-1" } });
    });

    it("should move only allowlisted keys", () => {
      const doc = createSpanConverter({
        tagKeysAsFields: ["error", "host.name"],
        tagDotReplacement: "_",
      }).fromDomain(richSpan());

      expect(doc.tag).toEqual({ error: true });
      expect(doc.tags.map((kv) => kv.key)).toEqual(["http.method", "http.status_code", "ratio", "payload"]);
      expect(doc.process.tag).toEqual({ host_name: "web-1" });
    });
  });

  describe("parent span", () => {
    it("should ignore CHILD_OF references to another trace", () => {
      const doc = createSpanConverter().fromDomain(
        makeSpan({ references: [{ refType: "CHILD_OF", traceId: "other", spanId: "x" }] })
      );

      expect(doc.parentSpanID).toBeUndefined();
    });

    it("should ignore FOLLOWS_FROM references", () => {
      const doc = createSpanConverter().fromDomain(
        makeSpan({ references: [{ refType: "FOLLOWS_FROM", traceId: "0000000000000001", spanId: "x" }] })
      );

      expect(doc.parentSpanID).toBeUndefined();
    });
  });

  it("should copy warnings when present", () => {
    const doc = createSpanConverter().fromDomain(makeSpan({ warnings: ["clock skew adjusted"] }));

    expect(doc.warnings).toEqual(["clock skew adjusted"]);
  });

  it("should omit empty warnings", () => {
    expect(createSpanConverter().fromDomain(makeSpan({ warnings: [] })).warnings).toBeUndefined();
  });
});
