/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseHours, parseJson, parseList, parsePositiveInt, parseTime } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parsePositiveInt", () => {
    it("should parse valid positive integers", () => {
      expect(parsePositiveInt("1", "--n")).toBe(1);
      expect(parsePositiveInt(" 500 ", "--n")).toBe(500);
      expect(parsePositiveInt("100000", "--n")).toBe(100000);
    });

    it("should reject zero, negatives and non-numbers", () => {
      expect(() => parsePositiveInt("0", "--n")).toThrow(InvalidArgumentError);
      expect(() => parsePositiveInt("-1", "--n")).toThrow("--n must be a positive integer");
      expect(() => parsePositiveInt("1.5", "--n")).toThrow("--n must be a positive integer");
      expect(() => parsePositiveInt("abc", "--n")).toThrow("--n must be a positive integer");
    });

    it("should reject values > 100000", () => {
      expect(() => parsePositiveInt("100001", "--n")).toThrow("--n must be <= 100000");
    });
  });

  describe("parseHours", () => {
    it("should convert hours to milliseconds", () => {
      expect(parseHours("12", "--ttl")).toBe(43_200_000);
      expect(parseHours("0.5", "--ttl")).toBe(1_800_000);
      expect(parseHours("0", "--ttl")).toBe(0);
    });

    it("should reject negative or malformed values", () => {
      expect(() => parseHours("-1", "--ttl")).toThrow("--ttl must be a non-negative number of hours");
      expect(() => parseHours("1h", "--ttl")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseTime", () => {
    it("should parse ISO-8601 timestamps", () => {
      expect(parseTime("2024-03-07T12:00:00Z", "--time").toISOString()).toBe("2024-03-07T12:00:00.000Z");
    });

    it("should parse epoch milliseconds", () => {
      expect(parseTime("1709812800000", "--time").toISOString()).toBe("2024-03-07T12:00:00.000Z");
    });

    it("should reject unparseable times", () => {
      expect(() => parseTime("yesterday", "--time")).toThrow(
        "--time must be an ISO-8601 timestamp or epoch milliseconds"
      );
    });
  });

  describe("parseList", () => {
    it("should split and trim, dropping empty items", () => {
      expect(parseList("http.method, error,,db.type ")).toEqual(["http.method", "error", "db.type"]);
      expect(parseList("")).toEqual([]);
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJson("[1,2]", "test")).toEqual([1, 2]);
    });

    it("should strip a byte order mark", () => {
      expect(parseJson('\uFEFF{"a":1}', "test")).toEqual({ a: 1 });
    });

    it("should name the source on invalid JSON", () => {
      expect(() => parseJson("{bad", "template.json")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{bad", "template.json")).toThrow(/^Invalid JSON in template\.json: /);
    });
  });
});
