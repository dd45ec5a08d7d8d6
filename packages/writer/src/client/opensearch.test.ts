/**
 * Tests for OpenSearch bulk encoding
 */

import { describe, it, expect } from "vitest";
import { parseBulkResponse, toBulkBody } from "./opensearch.js";

describe("toBulkBody", () => {
  it("should emit an action line and a source line per request", () => {
    const body = toBulkBody([
      { index: "span-2024-03-07", kind: "span", body: { spanID: "a" } },
      { index: "service-2024-03-07", kind: "service", id: "f1", body: { serviceName: "checkout" } },
    ]);

    expect(body).toBe(
      [
        '{"index":{"_index":"span-2024-03-07"}}',
        '{"spanID":"a"}',
        '{"index":{"_index":"service-2024-03-07","_id":"f1"}}',
        '{"serviceName":"checkout"}',
        "",
      ].join("\n")
    );
  });
});

describe("parseBulkResponse", () => {
  it("should map successful items", () => {
    const results = parseBulkResponse(
      { took: 3, errors: false, items: [{ index: { status: 201 } }, { index: { status: 200 } }] },
      2
    );

    expect(results).toEqual([{ ok: true }, { ok: true }]);
  });

  it("should report item errors with type and reason", () => {
    const results = parseBulkResponse(
      {
        errors: true,
        items: [
          { index: { status: 201 } },
          { index: { status: 400, error: { type: "mapper_parsing_exception", reason: "failed to parse" } } },
          { index: { status: 429 } },
        ],
      },
      3
    );

    expect(results).toEqual([
      { ok: true },
      { ok: false, error: "mapper_parsing_exception: failed to parse" },
      { ok: false, error: "status 429" },
    ]);
  });

  it("should report items missing from the response", () => {
    expect(parseBulkResponse({ errors: false, items: [] }, 1)).toEqual([
      { ok: false, error: "missing bulk item result" },
    ]);
  });

  it("should reject a body that is not a bulk response", () => {
    expect(() => parseBulkResponse({ acknowledged: true }, 1)).toThrow();
  });
});
