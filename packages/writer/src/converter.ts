/**
 * Domain span → storage document conversion
 */

import type {
  DbKeyValue,
  DbLog,
  DbProcess,
  DbSpan,
  DbValueType,
  KeyValue,
  Span,
  SpanConverter,
  TagFieldValue,
  TagValue,
} from "./types.js";

export interface ConverterOptions {
  /** Store every tag as a field under `tag` */
  allTagsAsFields?: boolean;
  /** Tag keys stored as fields under `tag` even when allTagsAsFields is off */
  tagKeysAsFields?: string[];
  /** Replacement for "." in tag keys stored as fields */
  tagDotReplacement?: string;
}

interface SplitTags {
  tags: DbKeyValue[];
  tag?: Record<string, TagFieldValue>;
}

function valueType(value: TagValue): DbValueType {
  if (typeof value === "string") return "string";
  if (typeof value === "boolean") return "bool";
  if (typeof value === "number") return Number.isInteger(value) ? "int64" : "float64";
  return "binary";
}

function valueAsString(value: TagValue): string {
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("hex");
  }
  return String(value);
}

function toDbKeyValue(kv: KeyValue): DbKeyValue {
  return { key: kv.key, type: valueType(kv.value), value: valueAsString(kv.value) };
}

function toMicros(date: Date): number {
  return date.getTime() * 1000;
}

/**
 * Converter with fixed tag-flattening rules
 */
export class FromDomainConverter implements SpanConverter {
  readonly #allTagsAsFields: boolean;
  readonly #tagKeysAsFields: Set<string>;
  readonly #tagDotReplacement: string;

  constructor(options: ConverterOptions = {}) {
    this.#allTagsAsFields = options.allTagsAsFields ?? false;
    this.#tagKeysAsFields = new Set(options.tagKeysAsFields ?? []);
    this.#tagDotReplacement = options.tagDotReplacement ?? "@";
  }

  fromDomain(span: Span): DbSpan {
    const { tags, tag } = this.splitTags(span.tags);
    const doc: DbSpan = {
      traceID: span.traceId,
      spanID: span.spanId,
      flags: span.flags,
      operationName: span.operationName,
      references: span.references.map((ref) => ({
        refType: ref.refType,
        traceID: ref.traceId,
        spanID: ref.spanId,
      })),
      startTime: toMicros(span.startTime),
      startTimeMillis: span.startTime.getTime(),
      duration: span.duration,
      tags,
      logs: span.logs.map(
        (log): DbLog => ({ timestamp: toMicros(log.timestamp), fields: log.fields.map(toDbKeyValue) })
      ),
      process: this.convertProcess(span),
    };

    const parent = span.references.find(
      (ref) => ref.refType === "CHILD_OF" && ref.traceId === span.traceId
    );
    if (parent) {
      doc.parentSpanID = parent.spanId;
    }
    if (tag) {
      doc.tag = tag;
    }
    if (span.warnings && span.warnings.length > 0) {
      doc.warnings = [...span.warnings];
    }
    return doc;
  }

  private convertProcess(span: Span): DbProcess {
    const { tags, tag } = this.splitTags(span.process.tags);
    const process: DbProcess = { serviceName: span.process.serviceName, tags };
    if (tag) {
      process.tag = tag;
    }
    return process;
  }

  private splitTags(keyValues: KeyValue[]): SplitTags {
    const tags: DbKeyValue[] = [];
    let tag: Record<string, TagFieldValue> | undefined;

    for (const kv of keyValues) {
      // Binary values have no native field form
      if (!(kv.value instanceof Uint8Array) && this.isField(kv.key)) {
        tag ??= {};
        tag[kv.key.replaceAll(".", this.#tagDotReplacement)] = kv.value;
      } else {
        tags.push(toDbKeyValue(kv));
      }
    }

    return tag ? { tags, tag } : { tags };
  }

  private isField(key: string): boolean {
    return this.#allTagsAsFields || this.#tagKeysAsFields.has(key);
  }
}

export function createSpanConverter(options: ConverterOptions = {}): SpanConverter {
  return new FromDomainConverter(options);
}
