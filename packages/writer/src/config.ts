/**
 * Zod schema for span writer settings
 * Applies defaults and reports every invalid field at once
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_DATE_LAYOUT } from "./date-layout.js";

const HOUR_MS = 60 * 60 * 1000;

export const SERVICE_CACHE_TTL_DEFAULT_MS = 12 * HOUR_MS;
export const INDEX_CACHE_TTL_DEFAULT_MS = 48 * HOUR_MS;
export const SERVICE_CACHE_SIZE_DEFAULT = 100_000;
export const INDEX_CACHE_SIZE_DEFAULT = 5;

// Index names are lowercase and may not contain these characters
const indexPrefixPattern = /^[^A-Z\\/*?"<>| ,#:]*$/;

/**
 * A zero TTL means "use the default", matching an unset value
 */
function ttlSchema(defaultMs: number) {
  return z
    .number()
    .int()
    .nonnegative()
    .default(defaultMs)
    .transform((ms) => (ms === 0 ? defaultMs : ms));
}

export const WriterSettingsSchema = z.object({
  indexPrefix: z
    .string()
    .regex(indexPrefixPattern, "indexPrefix must be lowercase and free of \\ / * ? \" < > | , # : and spaces")
    .default(""),
  spanDateLayout: z.string().min(1).default(DEFAULT_DATE_LAYOUT),
  serviceDateLayout: z.string().min(1).default(DEFAULT_DATE_LAYOUT),
  allTagsAsFields: z.boolean().default(false),
  tagKeysAsFields: z.array(z.string().min(1)).default([]),
  tagDotReplacement: z.string().default("@"),
  archive: z.boolean().default(false),
  useReadWriteAliases: z.boolean().default(false),
  serviceCacheTTLMs: ttlSchema(SERVICE_CACHE_TTL_DEFAULT_MS),
  indexCacheTTLMs: ttlSchema(INDEX_CACHE_TTL_DEFAULT_MS),
  createIndicesOnWrite: z.boolean().default(false),
});

/**
 * Settings as accepted from callers (every field optional)
 */
export type WriterSettingsInput = z.input<typeof WriterSettingsSchema>;

/**
 * Settings after defaults are applied
 */
export type WriterSettings = z.output<typeof WriterSettingsSchema>;

/**
 * Validate settings and apply defaults
 * @throws ConfigError listing every invalid field
 */
export function parseWriterSettings(input: unknown): WriterSettings {
  const result = WriterSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigError(issues, { cause: result.error });
  }
  return result.data;
}
