/**
 * index-names: show where a span would be written
 */

import type { Command } from "commander";
import { z } from "zod";
import { createIndexPolicy, parseWriterSettings, resolveIndexNames } from "@spanstore/writer";
import { parseTime } from "../lib/arg.js";
import { IndexOptionsSchema, addIndexOptions, globalOptions, indexSettings } from "../lib/options.js";
import { formatIndexNames, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

const IndexNamesOptionsSchema = IndexOptionsSchema.extend({
  time: z.date().optional(),
  json: z.boolean().default(false),
});

export function registerIndexNamesCommand(program: Command): void {
  addIndexOptions(
    program
      .command("index-names")
      .description("Show the indices a span starting at --time is written to")
      .option("--time <time>", "Span start time, ISO-8601 or epoch ms (default: now)", (value: string) =>
        parseTime(value, "--time")
      )
      .option("--json", "Output as JSON")
  ).action(async (rawOptions: unknown) => {
    await withTiming("index_names", async () => {
      const options = IndexNamesOptionsSchema.parse(rawOptions);
      const settings = parseWriterSettings(indexSettings(globalOptions(program), options));
      const policy = createIndexPolicy(settings);
      const names = resolveIndexNames(policy, options.time ?? new Date());

      if (options.json) {
        printJson({ mode: policy.mode, ...names });
        return;
      }

      printLines(formatIndexNames(policy.mode, names));
    });
  });
}
