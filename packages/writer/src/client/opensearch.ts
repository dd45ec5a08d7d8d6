/**
 * Document store client backed by OpenSearch
 */

import { Client, errors } from "@opensearch-project/opensearch";
import { z } from "zod";
import { logger as defaultLogger, type LoggerLike } from "../observability/logs.js";
import { MetricsRegistry, metrics as defaultMetrics } from "../observability/metrics.js";
import type { DocumentStoreClient, IndexRequest } from "../types.js";
import { BulkIndexer, type BulkIndexerStats, type BulkItemResult } from "./bulk-indexer.js";

export interface OpenSearchStoreClientOptions {
  /** Cluster URL, e.g. http://localhost:9200 */
  node: string;
  username?: string;
  password?: string;
  bulkActions?: number;
  flushIntervalMs?: number;
  maxConcurrentRequests?: number;
  logger?: LoggerLike;
  metrics?: MetricsRegistry;
}

const BulkItemSchema = z.record(
  z.string(),
  z.object({
    status: z.number(),
    error: z.object({ type: z.string(), reason: z.string().optional() }).passthrough().optional(),
  })
);

const BulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(BulkItemSchema),
});

const ErrorBodySchema = z.object({
  error: z.object({ type: z.string() }),
});

/**
 * Serialize requests as a bulk NDJSON body
 */
export function toBulkBody(requests: IndexRequest[]): string {
  const lines: string[] = [];
  for (const request of requests) {
    const action = request.id === undefined
      ? { _index: request.index }
      : { _index: request.index, _id: request.id };
    lines.push(JSON.stringify({ index: action }), JSON.stringify(request.body));
  }
  return lines.join("\n") + "\n";
}

/**
 * Map a bulk response onto per-request results, in submission order
 * @throws ZodError when the response does not look like a bulk response
 */
export function parseBulkResponse(body: unknown, count: number): BulkItemResult[] {
  const response = BulkResponseSchema.parse(body);
  const results: BulkItemResult[] = [];

  for (let i = 0; i < count; i++) {
    const item = response.items[i];
    const outcome = item ? Object.values(item)[0] : undefined;
    if (!outcome) {
      results.push({ ok: false, error: "missing bulk item result" });
    } else if (outcome.error || outcome.status >= 300) {
      const reason = outcome.error
        ? `${outcome.error.type}: ${outcome.error.reason ?? "no reason given"}`
        : `status ${outcome.status}`;
      results.push({ ok: false, error: reason });
    } else {
      results.push({ ok: true });
    }
  }

  return results;
}

function isAlreadyExists(err: unknown): boolean {
  if (!(err instanceof errors.ResponseError)) {
    return false;
  }
  const parsed = ErrorBodySchema.safeParse(err.body);
  return parsed.success && parsed.data.error.type === "resource_already_exists_exception";
}

/**
 * OpenSearch client with batched document writes
 *
 * Templates and indices are created synchronously; documents go through a
 * {@link BulkIndexer}, so `indexDocument` resolves as soon as the document
 * is queued.
 */
export class OpenSearchStoreClient implements DocumentStoreClient {
  readonly #client: Client;
  readonly #indexer: BulkIndexer;

  constructor(options: OpenSearchStoreClientOptions) {
    this.#client = new Client({
      node: options.node,
      ...(options.username !== undefined && options.password !== undefined
        ? { auth: { username: options.username, password: options.password } }
        : {}),
    });
    this.#indexer = new BulkIndexer({
      send: (requests) => this.sendBulk(requests),
      logger: options.logger ?? defaultLogger,
      metrics: options.metrics ?? defaultMetrics,
      bulkActions: options.bulkActions,
      flushIntervalMs: options.flushIntervalMs,
      maxConcurrentRequests: options.maxConcurrentRequests,
    });
  }

  async createTemplate(name: string, body: string): Promise<void> {
    await this.#client.indices.putTemplate({ name, body });
  }

  async createIndex(name: string): Promise<void> {
    const exists = await this.#client.indices.exists({ index: name });
    if (z.boolean().parse(exists.body)) {
      return;
    }

    try {
      await this.#client.indices.create({ index: name });
    } catch (err) {
      // Another writer created it between the check and the create
      if (!isAlreadyExists(err)) {
        throw err;
      }
    }
  }

  async indexDocument(request: IndexRequest): Promise<void> {
    this.#indexer.add(request);
  }

  /**
   * Send queued documents without closing
   */
  async flush(): Promise<void> {
    await this.#indexer.flush();
  }

  stats(): BulkIndexerStats {
    return this.#indexer.stats();
  }

  /**
   * Drain queued documents, then close the connection pool
   */
  async close(): Promise<void> {
    try {
      await this.#indexer.close();
    } finally {
      await this.#client.close();
    }
  }

  private async sendBulk(requests: IndexRequest[]): Promise<BulkItemResult[]> {
    const response = await this.#client.bulk({ body: toBulkBody(requests) });
    return parseBulkResponse(response.body, requests.length);
  }
}
