/**
 * Error thrown by the extraction collaborators (OCR service, AI extractor).
 * `transient` is set when the failure is worth retrying later.
 */
export class ExtractionServiceError extends Error {
  readonly status: number | null;
  readonly transient: boolean;

  constructor(
    message: string,
    options: { status?: number | null; transient: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "ExtractionServiceError";
    this.status = options.status ?? null;
    this.transient = options.transient;
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
