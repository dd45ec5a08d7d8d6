/**
 * Deduplicated writes of service/operation metadata
 */

import { createHash } from "node:crypto";
import { WriteCache } from "./cache.js";
import { errorFields, type LoggerLike } from "./observability/logs.js";
import type { DbService, DbSpan, DocumentStoreClient } from "./types.js";

export interface ServiceIndexWriterOptions {
  client: () => DocumentStoreClient;
  logger: LoggerLike;
  cache: WriteCache;
}

/**
 * Fingerprint of one service/operation entry in one index
 *
 * Also used as the document id, so a redundant write after a cache miss
 * overwrites the same document.
 */
export function serviceFingerprint(indexName: string, service: DbService): string {
  return createHash("sha256")
    .update(indexName)
    .update("\0")
    .update(service.serviceName)
    .update("\0")
    .update(service.operationName)
    .digest("hex")
    .slice(0, 16);
}

/**
 * Best-effort writer for service metadata
 *
 * `write` never throws and never waits for the store. The cache entry is set
 * as soon as the write is submitted, whatever its outcome; a lost write is
 * repaired by a later span of the same service once the entry expires.
 */
export class ServiceIndexWriter {
  readonly #client: () => DocumentStoreClient;
  readonly #logger: LoggerLike;
  readonly #cache: WriteCache;

  constructor(options: ServiceIndexWriterOptions) {
    this.#client = options.client;
    this.#logger = options.logger;
    this.#cache = options.cache;
  }

  write(indexName: string, span: DbSpan): void {
    const service: DbService = {
      serviceName: span.process.serviceName,
      operationName: span.operationName,
    };
    const key = serviceFingerprint(indexName, service);
    if (this.#cache.contains(key)) {
      return;
    }

    try {
      this.#client()
        .indexDocument({ index: indexName, kind: "service", id: key, body: service })
        .catch((err: unknown) => this.logFailure(indexName, service, err));
    } catch (err) {
      this.logFailure(indexName, service, err);
    }

    this.#cache.mark(key);
  }

  private logFailure(indexName: string, service: DbService, err: unknown): void {
    this.#logger.warn("service.write_failed", {
      index: indexName,
      service: service.serviceName,
      operation: service.operationName,
      ...errorFields(err),
    });
  }
}
