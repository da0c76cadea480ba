/**
 * Pipeline error taxonomy.
 *
 * Collaborators (OCR, extraction service, stores, durable storage) throw.
 * The stage that calls them converts the throw into a PipelineError and
 * returns it inside a Result, so callers always see which operation failed
 * and whether the report is worth queueing for a later retry.
 */

import { getErrorMessage, isAbortError, isTransientError } from "@/lib/utils/error";

export const PIPELINE_ERROR_CODES = {
  UNSUPPORTED_FORMAT: "UNSUPPORTED_FORMAT",
  EMPTY_INPUT: "EMPTY_INPUT",
  NO_TEXT_DETECTED: "NO_TEXT_DETECTED",
  EXTRACTION_TIMEOUT: "EXTRACTION_TIMEOUT",
  EXTRACTION_UNAVAILABLE: "EXTRACTION_UNAVAILABLE",
  EXTRACTION_FAILED: "EXTRACTION_FAILED",
  MALFORMED_EXTRACTION: "MALFORMED_EXTRACTION",
  CANCELLED: "CANCELLED",
  HISTORY_UNAVAILABLE: "HISTORY_UNAVAILABLE",
  STORAGE_FAILED: "STORAGE_FAILED",
  REPORT_NOT_FOUND: "REPORT_NOT_FOUND",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_CONFIRMED: "NOT_CONFIRMED",
  STORE_WRITE_FAILED: "STORE_WRITE_FAILED",
} as const;

export type PipelineErrorCode =
  (typeof PIPELINE_ERROR_CODES)[keyof typeof PIPELINE_ERROR_CODES];

export type PipelineErrorCategory =
  | "transient"
  | "malformed"
  | "validation"
  | "storage"
  | "input"
  | "cancelled";

const DEFAULT_CATEGORY: Record<PipelineErrorCode, PipelineErrorCategory> = {
  UNSUPPORTED_FORMAT: "input",
  EMPTY_INPUT: "input",
  NO_TEXT_DETECTED: "input",
  EXTRACTION_TIMEOUT: "transient",
  EXTRACTION_UNAVAILABLE: "transient",
  EXTRACTION_FAILED: "input",
  MALFORMED_EXTRACTION: "malformed",
  CANCELLED: "cancelled",
  HISTORY_UNAVAILABLE: "transient",
  STORAGE_FAILED: "storage",
  REPORT_NOT_FOUND: "storage",
  VALIDATION_FAILED: "validation",
  NOT_CONFIRMED: "validation",
  STORE_WRITE_FAILED: "storage",
};

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly category: PipelineErrorCategory;
  /** The step that failed, e.g. "pendingReports.enqueue" or "store.append:sleep" */
  readonly operation?: string;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options: {
      operation?: string;
      category?: PipelineErrorCategory;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "PipelineError";
    this.code = code;
    this.category = options.category ?? DEFAULT_CATEGORY[code];
    this.operation = options.operation;
  }

  /** Transient failures route the report into the pending queue. */
  get transient(): boolean {
    return this.category === "transient";
  }
}

/**
 * Wrap a failed store or storage write. A write that failed on connectivity is
 * still a storage failure, but flagged transient so callers may retry it.
 */
export function storageFailure(
  code: "STORAGE_FAILED" | "STORE_WRITE_FAILED" | "HISTORY_UNAVAILABLE",
  operation: string,
  cause: unknown
): PipelineError {
  const transient = code === "HISTORY_UNAVAILABLE" || isTransientError(cause);
  return new PipelineError(code, `${operation} failed: ${getErrorMessage(cause)}`, {
    operation,
    category: transient ? "transient" : "storage",
    cause,
  });
}

/**
 * Map a value thrown by an extraction collaborator to a PipelineError.
 * Connectivity failures, 408/429/5xx and errno-style network codes are
 * EXTRACTION_UNAVAILABLE (transient); any other failure is EXTRACTION_FAILED.
 */
export function classifyError(error: unknown, operation: string): PipelineError {
  if (error instanceof PipelineError) return error;
  if (isAbortError(error)) {
    return new PipelineError("CANCELLED", "The operation was aborted", { operation, cause: error });
  }
  if (isTransientError(error)) {
    return new PipelineError("EXTRACTION_UNAVAILABLE", getErrorMessage(error), {
      operation,
      cause: error,
    });
  }
  return new PipelineError("EXTRACTION_FAILED", getErrorMessage(error), { operation, cause: error });
}
