/**
 * Error types for span writer operations
 *
 * Invariants:
 * - All errors name the index, template or setting involved in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all span store errors
 */
export abstract class SpanStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a span document cannot be dispatched to its index
 */
export class SpanWriteError extends SpanStoreError {
  readonly code = "SPAN_WRITE_ERROR";

  constructor(
    public readonly indexName: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write span to index: ${indexName}`, options);
  }
}

/**
 * Thrown when an index template cannot be registered
 */
export class TemplateCreateError extends SpanStoreError {
  readonly code = "TEMPLATE_CREATE_ERROR";

  constructor(
    public readonly templateName: string,
    options?: ErrorOptions
  ) {
    super(`Failed to create index template: ${templateName}`, options);
  }
}

/**
 * Thrown when a target index cannot be created
 */
export class IndexCreateError extends SpanStoreError {
  readonly code = "INDEX_CREATE_ERROR";

  constructor(
    public readonly indexName: string,
    options?: ErrorOptions
  ) {
    super(`Failed to create index: ${indexName}`, options);
  }
}

/**
 * Thrown when closing the store client fails
 */
export class WriterCloseError extends SpanStoreError {
  readonly code = "CLOSE_ERROR";

  constructor(options?: ErrorOptions) {
    super("Failed to close span writer", options);
  }
}

/**
 * Thrown when a writer is used after close()
 */
export class WriterClosedError extends SpanStoreError {
  readonly code = "WRITER_CLOSED";

  constructor(operation: string) {
    super(`Span writer is closed: cannot ${operation}`);
  }
}

/**
 * Thrown when writer configuration fails validation
 */
export class ConfigError extends SpanStoreError {
  readonly code = "CONFIG_ERROR";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid span writer configuration: ${issues.join("; ")}`, options);
  }
}
