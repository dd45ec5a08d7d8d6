/**
 * Span write path: index routing, metadata side-write and dispatch
 */

import { WriteCache } from "./cache.js";
import {
  INDEX_CACHE_SIZE_DEFAULT,
  SERVICE_CACHE_SIZE_DEFAULT,
  parseWriterSettings,
  type WriterSettings,
  type WriterSettingsInput,
} from "./config.js";
import { createSpanConverter } from "./converter.js";
import {
  IndexCreateError,
  SpanWriteError,
  TemplateCreateError,
  WriterCloseError,
  WriterClosedError,
} from "./errors.js";
import {
  IndexNameResolver,
  SERVICE_INDEX_BASE,
  SPAN_INDEX_BASE,
  createIndexPolicy,
  normalizeIndexPrefix,
} from "./index-name.js";
import { logger as defaultLogger, errorFields, type LoggerLike } from "./observability/logs.js";
import { MetricsRegistry, WriteMetrics, metrics as defaultMetrics } from "./observability/metrics.js";
import { ServiceIndexWriter } from "./service-writer.js";
import type {
  DocumentStoreClient,
  IndexNames,
  Span,
  SpanConverter,
  WriteSpanOptions,
} from "./types.js";

/**
 * Constructor parameters for {@link SpanWriter}
 */
export interface SpanWriterParams extends WriterSettingsInput {
  /** Returns the store client; called per operation */
  client: () => DocumentStoreClient;
  logger?: LoggerLike;
  metrics?: MetricsRegistry;
  /** Overrides the converter built from the tag settings */
  converter?: SpanConverter;
  /** Clock for cache expiry (default: Date.now) */
  now?: () => number;
}

/**
 * Writes spans and their service metadata to the document store
 *
 * Calls to `writeSpan` are independent: each one resolves its targets from
 * immutable settings and the span's own start time. The only shared state is
 * the pair of write caches.
 *
 * The service metadata write is best effort. Its failure is logged and never
 * reaches the caller, so a rejected `writeSpan` always means the span itself
 * was not accepted.
 *
 * @example
 * ```typescript
 * const writer = new SpanWriter({
 *   client: () => storeClient,
 *   indexPrefix: "prod",
 * });
 *
 * await writer.createTemplates(spanMapping, serviceMapping, "prod");
 * await writer.writeSpan(span); // span → prod-span-2024-03-07
 * await writer.close();
 * ```
 */
export class SpanWriter {
  readonly settings: WriterSettings;
  readonly #client: () => DocumentStoreClient;
  readonly #logger: LoggerLike;
  readonly #indexCreate: WriteMetrics;
  readonly #resolver: IndexNameResolver;
  readonly #converter: SpanConverter;
  readonly #serviceWriter: ServiceIndexWriter;
  readonly #indexCache: WriteCache;
  #closed = false;

  constructor(params: SpanWriterParams) {
    this.settings = parseWriterSettings(params);
    this.#client = params.client;
    this.#logger = params.logger ?? defaultLogger;
    this.#indexCreate = new WriteMetrics(params.metrics ?? defaultMetrics, "index_create");

    const now = params.now ?? Date.now;
    const settings = this.settings;

    this.#resolver = new IndexNameResolver(
      createIndexPolicy({
        archive: settings.archive,
        useReadWriteAliases: settings.useReadWriteAliases,
        indexPrefix: settings.indexPrefix,
        spanDateLayout: settings.spanDateLayout,
        serviceDateLayout: settings.serviceDateLayout,
      })
    );
    this.#converter =
      params.converter ??
      createSpanConverter({
        allTagsAsFields: settings.allTagsAsFields,
        tagKeysAsFields: settings.tagKeysAsFields,
        tagDotReplacement: settings.tagDotReplacement,
      });
    this.#serviceWriter = new ServiceIndexWriter({
      client: this.#client,
      logger: this.#logger,
      cache: new WriteCache({
        maxSize: SERVICE_CACHE_SIZE_DEFAULT,
        ttlMs: settings.serviceCacheTTLMs,
        now,
      }),
    });
    this.#indexCache = new WriteCache({
      maxSize: INDEX_CACHE_SIZE_DEFAULT,
      ttlMs: settings.indexCacheTTLMs,
      now,
    });
  }

  /**
   * Target indices for a span starting at `time`
   */
  indexNames(time: Date): IndexNames {
    return this.#resolver.resolve(time);
  }

  /**
   * Write a span and, outside archive mode, its service/operation entry
   *
   * Resolves once the span document is submitted to the client. With a
   * batching client, a later bulk failure is logged by the client and is not
   * visible here.
   *
   * An aborted `signal` rejects with its reason before anything is written;
   * it is not consulted again once the span is submitted.
   *
   * @throws WriterClosedError after close()
   * @throws IndexCreateError when index bookkeeping is on and creation fails
   * @throws SpanWriteError when the client rejects the span document
   */
  async writeSpan(span: Span, options: WriteSpanOptions = {}): Promise<void> {
    if (this.#closed) {
      throw new WriterClosedError("write span");
    }
    options.signal?.throwIfAborted();

    const { spanIndex, serviceIndex } = this.#resolver.resolve(span.startTime);
    const doc = this.#converter.fromDomain(span);

    if (serviceIndex !== "") {
      this.#serviceWriter.write(serviceIndex, doc);
    }

    // Aliases are created and repointed by the store's rollover tooling
    if (this.settings.createIndicesOnWrite && !this.#resolver.usesAliases) {
      await this.ensureIndex(spanIndex);
    }

    try {
      await this.#client().indexDocument({ index: spanIndex, kind: "span", body: doc });
    } catch (err) {
      throw new SpanWriteError(spanIndex, { cause: err });
    }
  }

  /**
   * Register the span and service index templates
   *
   * The service template is only attempted once the span template succeeds.
   * The store's template API overwrites existing templates, so this is safe
   * to run on every start.
   *
   * @throws TemplateCreateError naming the template that failed
   */
  async createTemplates(spanTemplate: string, serviceTemplate: string, indexPrefix: string): Promise<void> {
    const prefix = normalizeIndexPrefix(indexPrefix);
    await this.createTemplate(prefix + SPAN_INDEX_BASE, spanTemplate);
    await this.createTemplate(prefix + SERVICE_INDEX_BASE, serviceTemplate);
  }

  /**
   * Close the store client
   *
   * Must not run while writes that rely on an open client are in flight.
   *
   * @throws WriterClosedError when already closed
   * @throws WriterCloseError when the client fails to close
   */
  async close(): Promise<void> {
    if (this.#closed) {
      throw new WriterClosedError("close twice");
    }
    this.#closed = true;

    try {
      await this.#client().close();
    } catch (err) {
      throw new WriterCloseError({ cause: err });
    }
  }

  private async createTemplate(name: string, body: string): Promise<void> {
    try {
      await this.#indexCreate.track(() => this.#client().createTemplate(name, body));
      this.#logger.info("template.created", { template: name });
    } catch (err) {
      this.#logger.error("template.create_failed", { template: name, ...errorFields(err) });
      throw new TemplateCreateError(name, { cause: err });
    }
  }

  /**
   * Create an index once per bookkeeping TTL
   */
  private async ensureIndex(indexName: string): Promise<void> {
    if (this.#indexCache.contains(indexName)) {
      return;
    }

    try {
      await this.#indexCreate.track(() => this.#client().createIndex(indexName));
    } catch (err) {
      throw new IndexCreateError(indexName, { cause: err });
    }
    this.#indexCache.mark(indexName);
  }
}
