/**
 * Command tree for the span store CLI
 */

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { OpenSearchStoreClient, logger as defaultLogger, type LoggerLike } from "@spanstore/writer";
import { registerIndexNamesCommand } from "./commands/index-names.js";
import { registerTemplatesCommand } from "./commands/templates.js";
import { registerWriteCommand } from "./commands/write.js";
import type { ClientFactory } from "./commands/context.js";
import { colorize } from "./lib/render.js";

export type { ClientFactory, ClientTuning, CommandContext } from "./commands/context.js";

const PackageJsonSchema = z.object({ version: z.string() });

const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
);

export interface ProgramOptions {
  /** Builds the store client; defaults to an OpenSearch client */
  createClient?: ClientFactory;
  logger?: LoggerLike;
  /** Receives commander's usage errors and help for errors (default: stderr) */
  writeErr?: (text: string) => void;
}

/**
 * Build the CLI program
 *
 * Commander errors are thrown rather than exiting the process, so callers
 * decide the exit code.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const logger = options.logger ?? defaultLogger;
  const createClient: ClientFactory =
    options.createClient ??
    ((connection, tuning) => new OpenSearchStoreClient({ ...connection, ...tuning, logger }));

  const program = new Command();

  program
    .name("spanstore")
    .description("Span store - index routing, template bootstrap and span writes for OpenSearch")
    .version(packageJson.version)
    .option("--url <url>", "OpenSearch URL (default: $SPANSTORE_OPENSEARCH_URL or http://localhost:9200)")
    .option("--index-prefix <prefix>", "Index name prefix (default: $SPANSTORE_INDEX_PREFIX)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .configureOutput({
      writeErr: options.writeErr ?? ((str) => process.stderr.write(colorize(str, "red", process.stderr))),
    })
    .exitOverride();

  program.hook("preAction", () => {
    if (program.opts().verbose === true && options.logger === undefined) {
      defaultLogger.setLevel("debug");
    }
  });

  const context = { createClient, logger };
  registerIndexNamesCommand(program);
  registerTemplatesCommand(program, context);
  registerWriteCommand(program, context);

  return program;
}
