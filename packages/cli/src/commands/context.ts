import type { DocumentStoreClient, LoggerLike } from "@spanstore/writer";
import type { ConnectionOptions } from "../lib/env.js";

/**
 * Client settings that commands may tune
 */
export interface ClientTuning {
  bulkActions?: number;
}

export type ClientFactory = (connection: ConnectionOptions, tuning: ClientTuning) => DocumentStoreClient;

/**
 * What commands need from their surroundings
 */
export interface CommandContext {
  createClient: ClientFactory;
  logger: LoggerLike;
}
