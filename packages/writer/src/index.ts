/**
 * Span store writer
 *
 * Routes spans to dated, rollover-alias or archive indices, writes
 * deduplicated service metadata, and registers index templates.
 */

// Re-export types
export type {
  TagValue,
  KeyValue,
  ReferenceType,
  SpanReference,
  SpanLog,
  SpanProcess,
  Span,
  DbValueType,
  DbKeyValue,
  DbReference,
  DbLog,
  DbProcess,
  TagFieldValue,
  DbSpan,
  DbService,
  DocumentKind,
  IndexNames,
  IndexPolicy,
  IndexingMode,
  IndexRequest,
  DocumentStoreClient,
  DispatchCounts,
  SpanConverter,
  WriteSpanOptions,
} from "./types.js";

// Writer
export { SpanWriter } from "./span-writer.js";
export type { SpanWriterParams } from "./span-writer.js";
export { ServiceIndexWriter, serviceFingerprint } from "./service-writer.js";
export type { ServiceIndexWriterOptions } from "./service-writer.js";

// Index routing
export {
  IndexNameResolver,
  createIndexPolicy,
  resolveIndexNames,
  normalizeIndexPrefix,
  INDEX_PREFIX_SEPARATOR,
  SPAN_INDEX_BASE,
  SERVICE_INDEX_BASE,
} from "./index-name.js";
export type { IndexPolicyOptions } from "./index-name.js";
export { formatDate, DEFAULT_DATE_LAYOUT } from "./date-layout.js";

// Cache
export { WriteCache } from "./cache.js";
export type { WriteCacheOptions, WriteCacheStats } from "./cache.js";

// Conversion
export { FromDomainConverter, createSpanConverter } from "./converter.js";
export type { ConverterOptions } from "./converter.js";

// Configuration
export {
  WriterSettingsSchema,
  parseWriterSettings,
  SERVICE_CACHE_TTL_DEFAULT_MS,
  INDEX_CACHE_TTL_DEFAULT_MS,
} from "./config.js";
export type { WriterSettings, WriterSettingsInput } from "./config.js";

// Store clients
export { BulkIndexer } from "./client/bulk-indexer.js";
export type { BulkIndexerOptions, BulkIndexerStats, BulkItemResult, BulkSendFn } from "./client/bulk-indexer.js";
export { OpenSearchStoreClient, toBulkBody, parseBulkResponse } from "./client/opensearch.js";
export type { OpenSearchStoreClientOptions } from "./client/opensearch.js";

// Observability
export { Logger, logger, errorFields } from "./observability/logs.js";
export type { LogLevel, LogEvent, LoggerLike, LogSink } from "./observability/logs.js";
export { MetricsRegistry, WriteMetrics, metrics } from "./observability/metrics.js";
export type { HistogramSummary, Labels } from "./observability/metrics.js";

// Errors
export {
  SpanStoreError,
  SpanWriteError,
  TemplateCreateError,
  IndexCreateError,
  WriterCloseError,
  WriterClosedError,
  ConfigError,
} from "./errors.js";
