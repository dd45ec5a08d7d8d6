/**
 * CLI error handling and exit code mapping
 */

import { SpanStoreError } from "@spanstore/writer";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: the document store rejected an operation
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof SpanStoreError) {
    switch (error.code) {
      case "SPAN_WRITE_ERROR":
      case "TEMPLATE_CREATE_ERROR":
      case "INDEX_CREATE_ERROR":
      case "CLOSE_ERROR":
        return 2;
      default:
        return 1;
    }
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error.cause instanceof Error) {
      message += `: ${error.cause.message}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
