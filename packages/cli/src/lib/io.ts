/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { CliError } from "./errors.js";
import { resolveFile } from "./env.js";

/**
 * Read a text file given on the command line
 * @throws CliError when the file cannot be read
 */
export async function readTextFile(file: string, label = "file"): Promise<string> {
  const filePath = resolveFile(file);
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read ${label} ${filePath}`, { cause: err });
  }
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}
