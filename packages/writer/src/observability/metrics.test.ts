/**
 * Tests for in-process metrics
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MetricsRegistry, WriteMetrics } from "./metrics.js";

describe("MetricsRegistry", () => {
  let registry: MetricsRegistry;

  beforeEach(() => {
    registry = new MetricsRegistry();
  });

  it("should count per label set", () => {
    registry.inc("writes", { kind: "span" });
    registry.inc("writes", { kind: "span" });
    registry.inc("writes", { kind: "service" });

    expect(registry.getCounter("writes", { kind: "span" })).toBe(2);
    expect(registry.getCounter("writes", { kind: "service" })).toBe(1);
    expect(registry.getCounter("writes")).toBe(0);
  });

  it("should summarize histograms", () => {
    for (let i = 1; i <= 100; i++) {
      registry.observe("latency_ms", i);
    }

    expect(registry.getHistogram("latency_ms")).toEqual({
      count: 100,
      sum: 5050,
      p50: 50,
      p95: 95,
      p99: 99,
    });
  });

  it("should return null for an unknown histogram", () => {
    expect(registry.getHistogram("missing")).toBeNull();
  });

  it("should snapshot with sorted label keys", () => {
    registry.inc("writes", { kind: "span", index: "a" });
    registry.observe("latency_ms", 5);

    const snapshot = registry.snapshot();
    expect(snapshot.counters).toEqual({ 'writes{index="a",kind="span"}': 1 });
    expect(snapshot.histograms.latency_ms?.count).toBe(1);
  });

  it("should reset everything", () => {
    registry.inc("writes");
    registry.reset();

    expect(registry.snapshot()).toEqual({ counters: {}, histograms: {} });
  });
});

describe("WriteMetrics", () => {
  it("should record successes and failures", async () => {
    const registry = new MetricsRegistry();
    const writeMetrics = new WriteMetrics(registry, "index_create");

    await writeMetrics.track(async () => "ok");
    await expect(
      writeMetrics.track(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(registry.getCounter("spanstore.index_create.attempts")).toBe(2);
    expect(registry.getCounter("spanstore.index_create.inserts")).toBe(1);
    expect(registry.getCounter("spanstore.index_create.errors")).toBe(1);
    expect(registry.getHistogram("spanstore.index_create.latency_ms", { result: "ok" })?.count).toBe(1);
    expect(registry.getHistogram("spanstore.index_create.latency_ms", { result: "err" })?.count).toBe(1);
  });
});
