/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_OPENSEARCH_URL = "http://localhost:9200";

export interface ConnectionOptions {
  node: string;
  username?: string;
  password?: string;
}

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve a file argument to an absolute path
 */
export function resolveFile(file: string): string {
  return path.resolve(expandTilde(file));
}

/**
 * Resolve the cluster connection
 * Priority: CLI option > SPANSTORE_OPENSEARCH_URL env var > http://localhost:9200
 */
export function resolveConnection(cliUrl?: string): ConnectionOptions {
  const connection: ConnectionOptions = {
    node: cliUrl ?? process.env.SPANSTORE_OPENSEARCH_URL ?? DEFAULT_OPENSEARCH_URL,
  };

  const username = process.env.SPANSTORE_OPENSEARCH_USERNAME;
  const password = process.env.SPANSTORE_OPENSEARCH_PASSWORD;
  if (username && password) {
    connection.username = username;
    connection.password = password;
  }

  return connection;
}

/**
 * Resolve the index prefix
 * Priority: CLI option > SPANSTORE_INDEX_PREFIX env var > none
 */
export function resolveIndexPrefix(cliPrefix?: string): string {
  return cliPrefix ?? process.env.SPANSTORE_INDEX_PREFIX ?? "";
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.SPANSTORE_CLI_DEBUG === "1";
}
