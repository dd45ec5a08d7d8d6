/**
 * Tests for ServiceIndexWriter
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  HOUR_MS,
  ManualClock,
  RecordingLogger,
  RecordingStoreClient,
  makeServiceSpan,
} from "@spanstore/testkit";
import { WriteCache } from "./cache.js";
import { createSpanConverter } from "./converter.js";
import { ServiceIndexWriter, serviceFingerprint } from "./service-writer.js";
import type { DbSpan } from "./types.js";

const converter = createSpanConverter();

function dbSpan(service: string, operation: string): DbSpan {
  return converter.fromDomain(makeServiceSpan(service, operation));
}

// Lets rejected side-writes reach their catch handlers
const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("serviceFingerprint", () => {
  it("should be stable for the same entry", () => {
    const service = { serviceName: "checkout", operationName: "GET /orders" };
    expect(serviceFingerprint("service-2024-03-07", service)).toBe(
      serviceFingerprint("service-2024-03-07", { ...service })
    );
  });

  it("should differ by index, service and operation", () => {
    const base = serviceFingerprint("idx", { serviceName: "a", operationName: "op" });

    expect(serviceFingerprint("idx2", { serviceName: "a", operationName: "op" })).not.toBe(base);
    expect(serviceFingerprint("idx", { serviceName: "b", operationName: "op" })).not.toBe(base);
    expect(serviceFingerprint("idx", { serviceName: "a", operationName: "op2" })).not.toBe(base);
  });

  it("should not collide when fields shift between service and operation", () => {
    expect(serviceFingerprint("idx", { serviceName: "ab", operationName: "c" })).not.toBe(
      serviceFingerprint("idx", { serviceName: "a", operationName: "bc" })
    );
  });

  it("should be 16 hex characters", () => {
    expect(serviceFingerprint("idx", { serviceName: "a", operationName: "b" })).toMatch(/^[0-9a-f]{16}$/);
  });
});

describe("ServiceIndexWriter", () => {
  let clock: ManualClock;
  let client: RecordingStoreClient;
  let logger: RecordingLogger;
  let writer: ServiceIndexWriter;

  beforeEach(() => {
    clock = new ManualClock();
    client = new RecordingStoreClient();
    logger = new RecordingLogger();
    writer = new ServiceIndexWriter({
      client: () => client,
      logger,
      cache: new WriteCache({ ttlMs: 12 * HOUR_MS, now: clock.now }),
    });
  });

  it("should write the service/operation pair keyed by its fingerprint", () => {
    writer.write("service-2024-03-07", dbSpan("checkout", "GET /orders"));

    const service = { serviceName: "checkout", operationName: "GET /orders" };
    expect(client.documents).toEqual([
      {
        index: "service-2024-03-07",
        kind: "service",
        id: serviceFingerprint("service-2024-03-07", service),
        body: service,
      },
    ]);
  });

  it("should write an entry at most once within the TTL", () => {
    for (let i = 0; i < 5; i++) {
      writer.write("service-2024-03-07", dbSpan("checkout", "GET /orders"));
      clock.advance(HOUR_MS);
    }

    expect(client.documents).toHaveLength(1);
  });

  it("should write the entry again after the TTL expires", () => {
    writer.write("service-2024-03-07", dbSpan("checkout", "GET /orders"));
    clock.advance(12 * HOUR_MS);
    writer.write("service-2024-03-07", dbSpan("checkout", "GET /orders"));

    expect(client.documents).toHaveLength(2);
  });

  it("should write distinct operations and indices separately", () => {
    writer.write("service-2024-03-07", dbSpan("checkout", "GET /orders"));
    writer.write("service-2024-03-07", dbSpan("checkout", "POST /orders"));
    writer.write("service-2024-03-08", dbSpan("checkout", "GET /orders"));

    expect(client.documents.map((doc) => doc.index)).toEqual([
      "service-2024-03-07",
      "service-2024-03-07",
      "service-2024-03-08",
    ]);
  });

  it("should swallow and log a rejected write, then mark the entry", async () => {
    client.failWhen((op) => op === "indexDocument");

    expect(() => writer.write("service-2024-03-07", dbSpan("checkout", "GET /orders"))).not.toThrow();
    writer.write("service-2024-03-07", dbSpan("checkout", "GET /orders"));
    await settle();

    expect(client.calls).toEqual(["indexDocument:service:service-2024-03-07"]);
    expect(logger.entries).toEqual([
      {
        level: "warn",
        event: "service.write_failed",
        data: {
          index: "service-2024-03-07",
          service: "checkout",
          operation: "GET /orders",
          err_code: "Error",
          err_message: "simulated indexDocument failure",
        },
      },
    ]);
  });

  it("should swallow a client factory that throws", () => {
    const throwing = new ServiceIndexWriter({
      client: () => {
        throw new Error("client unavailable");
      },
      logger,
      cache: new WriteCache({ ttlMs: HOUR_MS, now: clock.now }),
    });

    expect(() => throwing.write("service-2024-03-07", dbSpan("checkout", "GET /orders"))).not.toThrow();
    expect(logger.events("warn")).toEqual(["service.write_failed"]);
  });
});
