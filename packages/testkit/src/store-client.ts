/**
 * In-process document store client for tests
 */

import type { DocumentKind, DocumentStoreClient, IndexRequest } from "@spanstore/writer";

export type StoreOperation = "createTemplate" | "createIndex" | "indexDocument" | "close";

/**
 * Predicate deciding whether a call should fail
 */
export type FailureRule = (operation: StoreOperation, detail: { name?: string; request?: IndexRequest }) => boolean;

/**
 * Store client that records every call and can be told to fail
 *
 * @example
 * ```typescript
 * const client = new RecordingStoreClient();
 * client.failWhen((op, { request }) => op === "indexDocument" && request?.kind === "service");
 * ```
 */
export class RecordingStoreClient implements DocumentStoreClient {
  readonly templates: Array<{ name: string; body: string }> = [];
  readonly indices: string[] = [];
  readonly documents: IndexRequest[] = [];
  /** Every attempted call, successful or not, in order */
  readonly calls: string[] = [];
  closeCalls = 0;
  #rules: FailureRule[] = [];

  /**
   * Fail every call matching the rule with a rejected promise
   */
  failWhen(rule: FailureRule): this {
    this.#rules.push(rule);
    return this;
  }

  /**
   * Documents of one kind, in submission order
   */
  documentsOfKind(kind: DocumentKind): IndexRequest[] {
    return this.documents.filter((doc) => doc.kind === kind);
  }

  async createTemplate(name: string, body: string): Promise<void> {
    this.calls.push(`createTemplate:${name}`);
    this.check("createTemplate", { name });
    this.templates.push({ name, body });
  }

  async createIndex(name: string): Promise<void> {
    this.calls.push(`createIndex:${name}`);
    this.check("createIndex", { name });
    if (!this.indices.includes(name)) {
      this.indices.push(name);
    }
  }

  async indexDocument(request: IndexRequest): Promise<void> {
    this.calls.push(`indexDocument:${request.kind}:${request.index}`);
    this.check("indexDocument", { request });
    this.documents.push(request);
  }

  async close(): Promise<void> {
    this.calls.push("close");
    this.closeCalls++;
    this.check("close", {});
  }

  private check(operation: StoreOperation, detail: { name?: string; request?: IndexRequest }): void {
    if (this.#rules.some((rule) => rule(operation, detail))) {
      throw new Error(`simulated ${operation} failure`);
    }
  }
}
