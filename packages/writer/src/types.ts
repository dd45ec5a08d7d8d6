/**
 * Core types for the span writer
 */

/**
 * Tag or log field value carried by a span
 */
export type TagValue = string | number | boolean | Uint8Array;

/**
 * Key/value pair attached to spans, processes and logs
 */
export interface KeyValue {
  key: string;
  value: TagValue;
}

/**
 * Relationship between two spans
 */
export type ReferenceType = "CHILD_OF" | "FOLLOWS_FROM";

export interface SpanReference {
  refType: ReferenceType;
  traceId: string;
  spanId: string;
}

/**
 * Timestamped log entry recorded during a span
 */
export interface SpanLog {
  timestamp: Date;
  fields: KeyValue[];
}

/**
 * Process (service instance) that emitted a span
 */
export interface SpanProcess {
  serviceName: string;
  tags: KeyValue[];
}

/**
 * One timed operation within a distributed trace
 */
export interface Span {
  traceId: string;
  spanId: string;
  operationName: string;
  references: SpanReference[];
  flags: number;
  startTime: Date;
  /** Duration in microseconds */
  duration: number;
  tags: KeyValue[];
  logs: SpanLog[];
  process: SpanProcess;
  warnings?: string[];
}

/**
 * Value type recorded next to a stringified tag in storage
 */
export type DbValueType = "string" | "bool" | "int64" | "float64" | "binary";

export interface DbKeyValue {
  key: string;
  type: DbValueType;
  value: string;
}

export interface DbReference {
  refType: ReferenceType;
  traceID: string;
  spanID: string;
}

export interface DbLog {
  /** Microseconds since epoch */
  timestamp: number;
  fields: DbKeyValue[];
}

export interface DbProcess {
  serviceName: string;
  tags: DbKeyValue[];
  tag?: Record<string, TagFieldValue>;
}

/**
 * Native value stored under a flattened tag field
 */
export type TagFieldValue = string | number | boolean;

/**
 * Storage document for a span
 */
export interface DbSpan {
  traceID: string;
  spanID: string;
  parentSpanID?: string;
  flags: number;
  operationName: string;
  references: DbReference[];
  /** Microseconds since epoch */
  startTime: number;
  startTimeMillis: number;
  /** Microseconds */
  duration: number;
  tags: DbKeyValue[];
  tag?: Record<string, TagFieldValue>;
  logs: DbLog[];
  process: DbProcess;
  warnings?: string[];
}

/**
 * Storage document for one service/operation pair
 */
export interface DbService {
  serviceName: string;
  operationName: string;
}

/**
 * Discriminator attached to every dispatched document
 */
export type DocumentKind = "span" | "service";

/**
 * Pair of target indices for one span
 *
 * `serviceIndex` is empty only in archive mode.
 */
export interface IndexNames {
  spanIndex: string;
  serviceIndex: string;
}

/**
 * Indexing policy, fixed for the lifetime of a writer
 */
export type IndexPolicy =
  | {
      mode: "direct-dated";
      spanIndexPrefix: string;
      serviceIndexPrefix: string;
      spanDateLayout: string;
      serviceDateLayout: string;
    }
  | { mode: "alias-rollover"; spanAlias: string; serviceAlias: string }
  | { mode: "archive-dated"; archiveIndex: string }
  | { mode: "archive-alias"; archiveAlias: string };

export type IndexingMode = IndexPolicy["mode"];

/**
 * Document handed to the store client
 */
export interface IndexRequest<TBody = unknown> {
  index: string;
  kind: DocumentKind;
  body: TBody;
  /** Optional document id; the store assigns one when omitted */
  id?: string;
}

/**
 * Per-kind outcome of documents a batching client has already sent
 */
export interface DispatchCounts {
  indexed: Record<DocumentKind, number>;
  failed: Record<DocumentKind, number>;
}

/**
 * Boundary to the document store
 *
 * `indexDocument` may be asynchronous or batched; a resolved promise means
 * the document was accepted for dispatch, not that it is durable. A batching
 * client reports what became of those documents through `stats`, which is
 * complete once `close` resolves.
 */
export interface DocumentStoreClient {
  createTemplate(name: string, body: string): Promise<void>;
  createIndex(name: string): Promise<void>;
  indexDocument(request: IndexRequest): Promise<void>;
  close(): Promise<void>;
  stats?(): DispatchCounts;
}

/**
 * Converts a domain span into its storage document
 */
export interface SpanConverter {
  fromDomain(span: Span): DbSpan;
}

/**
 * Options accepted by {@link SpanWriter.writeSpan}
 */
export interface WriteSpanOptions {
  /** Checked once before dispatch; an aborted signal rejects the write */
  signal?: AbortSignal;
}
