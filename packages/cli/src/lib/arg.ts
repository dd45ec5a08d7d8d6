/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a positive integer argument
 */
export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) === 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Bulk requests beyond this size are rejected by most clusters
  if (parsed > 100000) {
    throw new InvalidArgumentError(`${name} must be <= 100000`);
  }

  return parsed;
}

/**
 * Parse a duration in hours into milliseconds
 */
export function parseHours(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative number of hours`);
  }

  return Math.round(Number.parseFloat(trimmed) * 60 * 60 * 1000);
}

/**
 * Parse an ISO-8601 timestamp or epoch milliseconds
 */
export function parseTime(value: string, name: string): Date {
  const trimmed = value.trim();
  const date = /^\d+$/.test(trimmed) ? new Date(Number.parseInt(trimmed, 10)) : new Date(trimmed);

  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`${name} must be an ISO-8601 timestamp or epoch milliseconds`);
  }

  return date;
}

/**
 * Parse a comma-separated list, dropping empty items
 */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
