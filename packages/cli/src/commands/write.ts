/**
 * write: convert spans from a file and submit them to the store
 */

import type { Command } from "commander";
import { z } from "zod";
import { SpanWriter, parseWriterSettings } from "@spanstore/writer";
import { parseHours, parsePositiveInt } from "../lib/arg.js";
import { resolveConnection, resolveFile } from "../lib/env.js";
import { CliError, formatCliError } from "../lib/errors.js";
import { readTextFile } from "../lib/io.js";
import {
  IndexOptionsSchema,
  addIndexOptions,
  addTagOptions,
  globalOptions,
  indexSettings,
} from "../lib/options.js";
import { formatWriteSummary, printJson, type WriteSummary } from "../lib/render.js";
import { parseSpanInput } from "../lib/spans.js";
import { withTiming } from "../lib/telemetry.js";
import type { CommandContext } from "./context.js";

const WriteOptionsSchema = IndexOptionsSchema.extend({
  allTagsAsFields: z.boolean().default(false),
  tagKeysAsFields: z.array(z.string()).default([]),
  tagDotReplacement: z.string().optional(),
  createIndices: z.boolean().default(false),
  bulkActions: z.number().int().positive().optional(),
  serviceCacheTtl: z.number().nonnegative().optional(),
  indexCacheTtl: z.number().nonnegative().optional(),
  json: z.boolean().default(false),
});

export function registerWriteCommand(program: Command, context: CommandContext): void {
  const command = program
    .command("write <file>")
    .description("Write spans from a JSON array or NDJSON file")
    .option("--create-indices", "Create each dated span index before its first write")
    .option("--bulk-actions <n>", "Documents per bulk request", (value: string) =>
      parsePositiveInt(value, "--bulk-actions")
    )
    .option("--service-cache-ttl <hours>", "How long a service/operation pair is remembered", (value: string) =>
      parseHours(value, "--service-cache-ttl")
    )
    .option("--index-cache-ttl <hours>", "How long a created index is remembered", (value: string) =>
      parseHours(value, "--index-cache-ttl")
    )
    .option("--json", "Print the summary as JSON");

  addTagOptions(addIndexOptions(command)).action(async (file: string, rawOptions: unknown) => {
    await withTiming("write", async () => {
      const options = WriteOptionsSchema.parse(rawOptions);
      const global = globalOptions(program);

      const settings = parseWriterSettings({
        ...indexSettings(global, options),
        allTagsAsFields: options.allTagsAsFields,
        tagKeysAsFields: options.tagKeysAsFields,
        tagDotReplacement: options.tagDotReplacement,
        createIndicesOnWrite: options.createIndices,
        serviceCacheTTLMs: options.serviceCacheTtl,
        indexCacheTTLMs: options.indexCacheTtl,
      });
      const spans = parseSpanInput(await readTextFile(file, "span file"), resolveFile(file));

      const client = context.createClient(resolveConnection(global.url), { bulkActions: options.bulkActions });
      const writer = new SpanWriter({ ...settings, client: () => client, logger: context.logger });

      const failures: string[] = [];
      for (const [i, span] of spans.entries()) {
        try {
          await writer.writeSpan(span);
        } catch (err) {
          failures.push(`span #${i + 1} (${span.spanId}): ${formatCliError(err)}`);
        }
      }
      await writer.close();

      // A batching client only knows the fate of queued spans once close() has drained it
      const rejected = client.stats?.().failed.span ?? 0;
      const failed = failures.length + rejected;
      if (rejected > 0) {
        failures.push(`${rejected} span(s) rejected by the store after submission`);
      }

      const summary: WriteSummary = { written: spans.length - failed, failed };
      if (options.json) {
        printJson(summary);
      } else if (!global.quiet) {
        console.log(formatWriteSummary(summary));
      }

      if (failures.length > 0) {
        throw new CliError(`${summary.failed} span(s) failed:\n${failures.join("\n")}`, { exitCode: 2 });
      }
    });
  });
}
