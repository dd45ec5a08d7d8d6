/**
 * Span input parsing for the write command
 * Accepts a JSON array of spans or newline-delimited JSON
 */

import { z } from "zod";
import type { Span } from "@spanstore/writer";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

const TimeSchema = z
  .union([z.string().datetime({ offset: true }), z.number().int().nonnegative()])
  .transform((value) => new Date(value));

const KeyValueSchema = z.object({
  key: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean()]),
});

const ReferenceSchema = z.object({
  refType: z.enum(["CHILD_OF", "FOLLOWS_FROM"]),
  traceId: z.string().min(1),
  spanId: z.string().min(1),
});

export const SpanInputSchema = z.object({
  traceId: z.string().min(1),
  spanId: z.string().min(1),
  operationName: z.string().min(1),
  references: z.array(ReferenceSchema).default([]),
  flags: z.number().int().nonnegative().default(0),
  startTime: TimeSchema,
  duration: z.number().int().nonnegative(),
  tags: z.array(KeyValueSchema).default([]),
  logs: z.array(z.object({ timestamp: TimeSchema, fields: z.array(KeyValueSchema) })).default([]),
  process: z.object({
    serviceName: z.string().min(1),
    tags: z.array(KeyValueSchema).default([]),
  }),
  warnings: z.array(z.string()).optional(),
});

function splitRecords(text: string, source: string): unknown[] {
  const trimmed = text.trim();
  if (trimmed === "") {
    return [];
  }

  if (trimmed.startsWith("[")) {
    return z.array(z.unknown()).parse(parseJson(trimmed, source));
  }

  return trimmed
    .split(/\r?\n/)
    .map((line, i) => ({ line: line.trim(), number: i + 1 }))
    .filter(({ line }) => line !== "")
    .map(({ line, number }) => parseJson(line, `${source} line ${number}`));
}

/**
 * Parse and validate spans
 * @throws CliError listing the invalid fields of the first bad span
 */
export function parseSpanInput(text: string, source: string): Span[] {
  return splitRecords(text, source).map((record, i) => {
    const result = SpanInputSchema.safeParse(record);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new CliError(`Invalid span #${i + 1} in ${source}: ${issues}`);
    }
    return result.data;
  });
}
