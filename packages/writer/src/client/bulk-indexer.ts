/**
 * Buffered bulk submission of index requests
 */

import { WriterClosedError } from "../errors.js";
import { errorFields, type LoggerLike } from "../observability/logs.js";
import type { MetricsRegistry } from "../observability/metrics.js";
import type { DispatchCounts, DocumentKind, IndexRequest } from "../types.js";

/**
 * Outcome of one request within a bulk call, in submission order
 */
export interface BulkItemResult {
  ok: boolean;
  error?: string;
}

export type BulkSendFn = (requests: IndexRequest[]) => Promise<BulkItemResult[]>;

export interface BulkIndexerOptions {
  send: BulkSendFn;
  logger: LoggerLike;
  metrics: MetricsRegistry;
  /** Flush once this many requests are queued (default: 1000) */
  bulkActions?: number;
  /** Flush queued requests after this delay (default: 200) */
  flushIntervalMs?: number;
  /** Bulk requests allowed in flight at once; later batches wait (default: 2) */
  maxConcurrentRequests?: number;
}

export interface BulkIndexerStats extends DispatchCounts {
  /** Requests not yet sent, including batches waiting for a free slot */
  queued: number;
  inFlight: number;
}

/**
 * Queues index requests and sends them in batches
 *
 * `add` only enqueues. Failures of a batch, or of single items within it,
 * are logged and counted per document kind; they never reach the code that
 * enqueued the request.
 */
export class BulkIndexer {
  readonly #send: BulkSendFn;
  readonly #logger: LoggerLike;
  readonly #metrics: MetricsRegistry;
  readonly #bulkActions: number;
  readonly #flushIntervalMs: number;
  readonly #maxConcurrentRequests: number;
  #queue: IndexRequest[] = [];
  #waiting: IndexRequest[][] = [];
  #inFlight = new Set<Promise<void>>();
  #timer: NodeJS.Timeout | undefined;
  #closed = false;
  #indexed: Record<DocumentKind, number> = { span: 0, service: 0 };
  #failed: Record<DocumentKind, number> = { span: 0, service: 0 };

  constructor(options: BulkIndexerOptions) {
    this.#send = options.send;
    this.#logger = options.logger;
    this.#metrics = options.metrics;
    this.#bulkActions = Math.max(1, options.bulkActions ?? 1000);
    this.#flushIntervalMs = Math.max(0, options.flushIntervalMs ?? 200);
    this.#maxConcurrentRequests = Math.max(1, options.maxConcurrentRequests ?? 2);
  }

  /**
   * Enqueue a request
   * @throws WriterClosedError after close()
   */
  add(request: IndexRequest): void {
    if (this.#closed) {
      throw new WriterClosedError("index document");
    }

    this.#queue.push(request);
    if (this.#queue.length >= this.#bulkActions) {
      this.dispatch();
    } else if (!this.#timer) {
      this.#timer = setTimeout(() => this.dispatch(), this.#flushIntervalMs);
      this.#timer.unref();
    }
  }

  /**
   * Send everything queued and wait for all batches in flight
   */
  async flush(): Promise<void> {
    this.dispatch();
    // Settled batches start waiting ones, so keep going until both are empty
    while (this.#inFlight.size > 0) {
      await Promise.all([...this.#inFlight]);
    }
  }

  /**
   * Stop accepting requests and drain the queue
   */
  async close(): Promise<void> {
    this.#closed = true;
    await this.flush();
  }

  stats(): BulkIndexerStats {
    return {
      queued: this.#queue.length + this.#waiting.reduce((sum, batch) => sum + batch.length, 0),
      inFlight: this.#inFlight.size,
      indexed: { ...this.#indexed },
      failed: { ...this.#failed },
    };
  }

  private dispatch(): void {
    if (this.#timer) {
      clearTimeout(this.#timer);
      this.#timer = undefined;
    }
    if (this.#queue.length === 0) {
      return;
    }

    this.#waiting.push(this.#queue);
    this.#queue = [];
    this.startWaiting();
  }

  private startWaiting(): void {
    while (this.#inFlight.size < this.#maxConcurrentRequests) {
      const batch = this.#waiting.shift();
      if (!batch) {
        return;
      }
      const pending: Promise<void> = this.sendBatch(batch).finally(() => {
        this.#inFlight.delete(pending);
        this.startWaiting();
      });
      this.#inFlight.add(pending);
    }
  }

  private async sendBatch(batch: IndexRequest[]): Promise<void> {
    const start = Date.now();
    let results: BulkItemResult[];
    try {
      results = await this.#send(batch);
    } catch (err) {
      this.#logger.error("bulk.failed", { requests: batch.length, ...errorFields(err) });
      results = batch.map(() => ({ ok: false }));
    }
    this.#metrics.observe("spanstore.bulk.latency_ms", Date.now() - start);

    batch.forEach((request, i) => {
      const result = results[i] ?? { ok: false, error: "missing bulk item result" };
      if (result.ok) {
        this.#indexed[request.kind]++;
        this.#metrics.inc("spanstore.bulk.indexed", { kind: request.kind });
        return;
      }

      this.#failed[request.kind]++;
      this.#metrics.inc("spanstore.bulk.failed", { kind: request.kind });
      if (result.error) {
        this.#logger.warn("bulk.item_failed", {
          index: request.index,
          kind: request.kind,
          err_message: result.error,
        });
      }
    });
  }
}
