/**
 * Typed views of commander option bags
 */

import { z } from "zod";
import type { Command } from "commander";
import type { WriterSettingsInput } from "@spanstore/writer";
import { parseList } from "./arg.js";
import { resolveIndexPrefix } from "./env.js";

export const GlobalOptionsSchema = z.object({
  url: z.string().optional(),
  indexPrefix: z.string().optional(),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type GlobalOptions = z.output<typeof GlobalOptionsSchema>;

export const IndexOptionsSchema = z.object({
  archive: z.boolean().default(false),
  rollover: z.boolean().default(false),
  spanDateLayout: z.string().optional(),
  serviceDateLayout: z.string().optional(),
});

export type IndexOptions = z.output<typeof IndexOptionsSchema>;

/**
 * Read the program-level options
 */
export function globalOptions(program: Command): GlobalOptions {
  return GlobalOptionsSchema.parse(program.opts());
}

/**
 * Declare the options that select an indexing mode
 */
export function addIndexOptions(command: Command): Command {
  return command
    .option("--archive", "Route spans to the archive index")
    .option("--rollover", "Write through rollover aliases instead of dated indices")
    .option("--span-date-layout <layout>", "Date layout of span index names (yyyy, yy, MM, dd, HH)")
    .option("--service-date-layout <layout>", "Date layout of service index names");
}

/**
 * Declare the options that control tag handling
 */
export function addTagOptions(command: Command): Command {
  return command
    .option("--all-tags-as-fields", "Store every tag as an object field")
    .option("--tag-keys-as-fields <keys>", "Comma-separated tag keys to store as object fields", parseList)
    .option("--tag-dot-replacement <char>", "Replacement for dots in tag field names");
}

/**
 * Writer settings shared by every command that routes spans
 */
export function indexSettings(global: GlobalOptions, index: IndexOptions): WriterSettingsInput {
  return {
    indexPrefix: resolveIndexPrefix(global.indexPrefix),
    archive: index.archive,
    useReadWriteAliases: index.rollover,
    spanDateLayout: index.spanDateLayout,
    serviceDateLayout: index.serviceDateLayout,
  };
}
