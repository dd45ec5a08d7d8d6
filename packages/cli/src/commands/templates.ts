/**
 * templates create: register the span and service index templates
 */

import type { Command } from "commander";
import { z } from "zod";
import {
  SERVICE_INDEX_BASE,
  SPAN_INDEX_BASE,
  SpanWriter,
  errorFields,
  normalizeIndexPrefix,
  parseWriterSettings,
} from "@spanstore/writer";
import { resolveConnection, resolveIndexPrefix } from "../lib/env.js";
import { globalOptions } from "../lib/options.js";
import { loadTemplate } from "../lib/templates.js";
import { withTiming } from "../lib/telemetry.js";
import type { CommandContext } from "./context.js";

const TemplateOptionsSchema = z.object({
  spanTemplate: z.string().optional(),
  serviceTemplate: z.string().optional(),
});

export function registerTemplatesCommand(program: Command, context: CommandContext): void {
  const templates = program.command("templates").description("Manage index templates");

  templates
    .command("create")
    .description("Create or overwrite the span and service index templates")
    .option("--span-template <file>", "Span template JSON (default: bundled mapping)")
    .option("--service-template <file>", "Service template JSON (default: bundled mapping)")
    .action(async (rawOptions: unknown) => {
      await withTiming("templates_create", async () => {
        const options = TemplateOptionsSchema.parse(rawOptions);
        const global = globalOptions(program);
        const { indexPrefix } = parseWriterSettings({ indexPrefix: resolveIndexPrefix(global.indexPrefix) });

        // Load both before connecting so a bad file never leaves half the templates in place
        const spanTemplate = await loadTemplate("span", indexPrefix, options.spanTemplate);
        const serviceTemplate = await loadTemplate("service", indexPrefix, options.serviceTemplate);

        const client = context.createClient(resolveConnection(global.url), {});
        const writer = new SpanWriter({ indexPrefix, client: () => client, logger: context.logger });
        try {
          await writer.createTemplates(spanTemplate, serviceTemplate, indexPrefix);
        } catch (err) {
          // Report the template failure; a close failure on top of it is only logged
          await writer.close().catch((closeErr: unknown) => {
            context.logger.warn("cli.close_failed", errorFields(closeErr));
          });
          throw err;
        }
        await writer.close();

        if (!global.quiet) {
          const prefix = normalizeIndexPrefix(indexPrefix);
          console.log(`Created templates ${prefix}${SPAN_INDEX_BASE}, ${prefix}${SERVICE_INDEX_BASE}`);
        }
      });
    });
}
