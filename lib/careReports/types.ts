/**
 * Types for the care-report reconciliation pipeline.
 *
 * A report (photographed daily sheet, text or CSV) is extracted into
 * CandidateEvents, which live only for the review session. Nothing here is
 * persisted except through the domain stores (on commit) and the pending
 * report queue (on transient failure).
 */

export type EventKind = "sleep" | "feed" | "diaper" | "activity" | "other";

export type ReviewState = "detected" | "edited" | "confirmed" | "rejected";

/**
 * One proposed caregiving event awaiting review.
 * `endTime` is only meaningful for sleep; a sleep without it is incomplete.
 */
export type CandidateEvent = {
  id: string;
  kind: EventKind;
  startTime: Date;
  endTime?: Date;
  quantityText?: string;
  details: string;
  wet: boolean;
  dirty: boolean;
  reviewState: ReviewState;
  duplicateFlag: boolean;
  duplicateReason?: string;
};

export type QuantityUnit = "ounce" | "milliliter" | "minute" | "hour" | "unknown";

/**
 * Derived from `quantityText` on demand; never stored on the candidate.
 */
export type NormalizedQuantity = {
  amount: number;
  unit: QuantityUnit;
};

/**
 * Read-only view of a record already committed to a domain store.
 */
export type ExistingRecord = {
  kind: EventKind;
  startTime: Date;
  endTime?: Date;
  quantity?: string;
};

export type TimeRange = {
  start: Date;
  end: Date;
};

export type ReportFormat = "image" | "text" | "csv";

/**
 * Raw input handed to the pipeline. `format` is resolved by the input policy
 * when not given explicitly.
 */
export type ReportSource = {
  bytes: Uint8Array;
  format?: ReportFormat;
  mediaType?: string;
  filename?: string;
};

/**
 * Durable record of a report whose ingestion could not complete.
 */
export type PendingReport = {
  id: string;
  createdAt: Date;
  sourceReference: string;
  format: ReportFormat;
  byteLength: number;
  mediaType?: string;
  filename?: string;
  /** Which stage failed when the report was queued */
  reason?: "extraction" | "commit";
};
