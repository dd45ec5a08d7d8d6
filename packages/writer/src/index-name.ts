/**
 * Index name resolution
 *
 * A writer is built with exactly one {@link IndexPolicy}. Resolving a span's
 * start time against it yields the span index and the service index; the
 * policy value itself can be inspected and tested without a writer.
 */

import { formatDate, DEFAULT_DATE_LAYOUT } from "./date-layout.js";
import type { IndexNames, IndexPolicy } from "./types.js";

export const INDEX_PREFIX_SEPARATOR = "-";
export const SPAN_INDEX_BASE = "span";
export const SERVICE_INDEX_BASE = "service";

const ARCHIVE_SUFFIX = "archive";
const WRITE_ALIAS_SUFFIX = "write";

export interface IndexPolicyOptions {
  archive?: boolean;
  useReadWriteAliases?: boolean;
  indexPrefix?: string;
  spanDateLayout?: string;
  serviceDateLayout?: string;
}

/**
 * Terminate a non-empty prefix with the separator, without doubling it
 */
export function normalizeIndexPrefix(prefix: string): string {
  if (prefix !== "" && !prefix.endsWith(INDEX_PREFIX_SEPARATOR)) {
    return prefix + INDEX_PREFIX_SEPARATOR;
  }
  return prefix;
}

/**
 * Build the indexing policy for a writer from its static configuration
 */
export function createIndexPolicy(options: IndexPolicyOptions = {}): IndexPolicy {
  const prefix = normalizeIndexPrefix(options.indexPrefix ?? "");
  const spanBase = prefix + SPAN_INDEX_BASE + INDEX_PREFIX_SEPARATOR;
  const serviceBase = prefix + SERVICE_INDEX_BASE + INDEX_PREFIX_SEPARATOR;

  if (options.archive) {
    const archiveIndex = spanBase + ARCHIVE_SUFFIX;
    return options.useReadWriteAliases
      ? { mode: "archive-alias", archiveAlias: archiveIndex + INDEX_PREFIX_SEPARATOR + WRITE_ALIAS_SUFFIX }
      : { mode: "archive-dated", archiveIndex };
  }

  if (options.useReadWriteAliases) {
    return {
      mode: "alias-rollover",
      spanAlias: spanBase + WRITE_ALIAS_SUFFIX,
      serviceAlias: serviceBase + WRITE_ALIAS_SUFFIX,
    };
  }

  return {
    mode: "direct-dated",
    spanIndexPrefix: spanBase,
    serviceIndexPrefix: serviceBase,
    spanDateLayout: options.spanDateLayout ?? DEFAULT_DATE_LAYOUT,
    serviceDateLayout: options.serviceDateLayout ?? DEFAULT_DATE_LAYOUT,
  };
}

/**
 * Resolve target indices for a span start time
 *
 * Alias and archive policies ignore the time: rollover is handled by the
 * store repointing the alias.
 */
export function resolveIndexNames(policy: IndexPolicy, time: Date): IndexNames {
  switch (policy.mode) {
    case "direct-dated":
      return {
        spanIndex: policy.spanIndexPrefix + formatDate(time, policy.spanDateLayout),
        serviceIndex: policy.serviceIndexPrefix + formatDate(time, policy.serviceDateLayout),
      };
    case "alias-rollover":
      return { spanIndex: policy.spanAlias, serviceIndex: policy.serviceAlias };
    case "archive-dated":
      return { spanIndex: policy.archiveIndex, serviceIndex: "" };
    case "archive-alias":
      return { spanIndex: policy.archiveAlias, serviceIndex: "" };
  }
}

/**
 * Resolver bound to one policy for its lifetime
 */
export class IndexNameResolver {
  readonly policy: IndexPolicy;

  constructor(policy: IndexPolicy) {
    this.policy = policy;
  }

  resolve(time: Date): IndexNames {
    return resolveIndexNames(this.policy, time);
  }

  get usesAliases(): boolean {
    return this.policy.mode === "alias-rollover" || this.policy.mode === "archive-alias";
  }

  get isArchive(): boolean {
    return this.policy.mode === "archive-dated" || this.policy.mode === "archive-alias";
  }
}
