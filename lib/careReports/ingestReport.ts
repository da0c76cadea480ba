/**
 * Pipeline orchestration.
 *
 *   ingestReport:       input → extraction → history → duplicates → ReviewSession
 *   retryPendingReport: same, for a queued report; the report is deleted only
 *                       once a session could be built
 *   commitReview:       confirmed candidates → domain stores
 *
 * Transient failures (service down, timeout, history unavailable, store
 * connectivity) put the report into the pending queue; everything else is
 * returned to the caller and nothing is queued.
 */

import type { PendingReportQueue } from "@/lib/pendingReports/queue";
import { extractReport, type ExtractionDeps } from "@/lib/extraction/extractReport";
import type { ExtractionIssue } from "@/lib/extraction/parseExtraction";
import { err, ok, type Result } from "@/lib/utils/result";
import { commitCandidates, type CommitResult } from "./commitDispatcher";
import { loadHistory, type DomainStores } from "./domainStores";
import { detectDuplicates, resolveHistoryRange, type DuplicateDetectorOptions } from "./duplicates";
import { PipelineError, storageFailure } from "./errors";
import { selectForCommit } from "./reviewState";
import { createReviewSession, type ReviewSession } from "./reviewSession";
import type { ExistingRecord, PendingReport, ReportSource } from "./types";

export type BuiltSession = {
  session: ReviewSession;
  /** Extracted items that were dropped as unreadable */
  issues: ExtractionIssue[];
};

export interface SessionBuilderDeps {
  extraction: ExtractionDeps;
  stores: DomainStores;
  detectorOptions: DuplicateDetectorOptions;
  timeoutMs: number;
  historyLookbackDays: number;
  now?: () => Date;
}

export interface PipelineDeps extends SessionBuilderDeps {
  queue: PendingReportQueue<BuiltSession>;
}

export type IngestOutcome =
  | { status: "ready"; session: ReviewSession; issues: ExtractionIssue[] }
  | { status: "queued"; report: PendingReport; error: PipelineError }
  | { status: "failed"; error: PipelineError; queueError?: PipelineError }
  | { status: "cancelled" };

function cancelled(operation: string): PipelineError {
  return new PipelineError("CANCELLED", "Report import was cancelled", { operation });
}

/**
 * Extraction, history and duplicate detection for one report. Shared by first
 * ingestion and by queue retries.
 */
export async function buildReviewSession(
  source: ReportSource,
  deps: SessionBuilderDeps,
  options: { signal?: AbortSignal; referenceDate?: Date; reportId?: string } = {}
): Promise<Result<BuiltSession, PipelineError>> {
  const now = deps.now?.() ?? new Date();

  const extraction = await extractReport(source, deps.extraction, {
    timeoutMs: deps.timeoutMs,
    signal: options.signal,
    referenceDate: options.referenceDate ?? now,
  });
  if (!extraction.ok) return extraction;

  const { candidates, issues, format } = extraction.value;

  let history: ExistingRecord[] = [];
  if (candidates.length > 0) {
    const range = resolveHistoryRange(candidates, {
      now,
      lookbackDays: deps.historyLookbackDays,
    });
    try {
      history = await loadHistory(deps.stores, range);
    } catch (error) {
      const failure = storageFailure("HISTORY_UNAVAILABLE", "history.query", error);
      console.error("[Pipeline] History query failed:", failure.message);
      return err(failure);
    }
  }

  if (options.signal?.aborted) {
    return err(cancelled("pipeline.detect"));
  }

  const session = createReviewSession({
    candidates: detectDuplicates(candidates, history, deps.detectorOptions),
    history,
    detectorOptions: deps.detectorOptions,
    source: { ...source, format },
    reportId: options.reportId,
    now,
  });
  return ok({ session, issues });
}

/**
 * Turn a freshly captured report into a review session, or queue it when the
 * failure is worth retrying.
 */
export async function ingestReport(
  source: ReportSource,
  deps: PipelineDeps,
  options: { signal?: AbortSignal; referenceDate?: Date } = {}
): Promise<IngestOutcome> {
  const built = await buildReviewSession(source, deps, options);
  if (built.ok) {
    return { status: "ready", session: built.value.session, issues: built.value.issues };
  }

  const error = built.error;
  if (error.code === "CANCELLED") {
    console.log("[Pipeline] Ingestion cancelled");
    return { status: "cancelled" };
  }
  if (!error.transient) {
    return { status: "failed", error };
  }

  const queued = await deps.queue.enqueue(source, { reason: "extraction" });
  if (!queued.ok) {
    console.error("[Pipeline] Could not queue report after transient failure:", {
      code: error.code,
      queueCode: queued.error.code,
    });
    return { status: "failed", error, queueError: queued.error };
  }

  console.log(`[Pipeline] Report queued as ${queued.value.id} after ${error.code}`);
  return { status: "queued", report: queued.value, error };
}

/**
 * Processor for the pending queue. Report clock times are read against the
 * day the report was captured.
 */
export function createSessionProcessor(deps: SessionBuilderDeps) {
  return (
    source: ReportSource,
    context: { report: PendingReport; signal?: AbortSignal }
  ): Promise<Result<BuiltSession, PipelineError>> =>
    buildReviewSession(source, deps, {
      signal: context.signal,
      referenceDate: context.report.createdAt,
      reportId: context.report.id,
    });
}

export function retryPendingReport(
  id: string,
  deps: Pick<PipelineDeps, "queue">,
  options: { signal?: AbortSignal } = {}
): Promise<Result<BuiltSession, PipelineError>> {
  return deps.queue.retry(id, options);
}

export type CommitReviewOutcome = {
  result: CommitResult;
  /** Set when a transient store failure sent the report back to the queue */
  queued?: PendingReport;
  queueError?: PipelineError;
};

/**
 * Commit the confirmed candidates of a session. Nothing else is written.
 */
export async function commitReview(
  session: ReviewSession,
  deps: Pick<PipelineDeps, "stores" | "queue">
): Promise<CommitReviewOutcome> {
  const result = await commitCandidates(deps.stores, selectForCommit(session.candidates));

  const hasTransientFailure = result.results.some(
    (item) => item.status === "failed" && item.error.transient
  );
  if (!hasTransientFailure || !session.source) {
    return { result };
  }

  // Already-committed events will show up as duplicates when the report is rebuilt
  const queued = await deps.queue.enqueue(session.source, { reason: "commit" });
  if (!queued.ok) {
    console.error("[Pipeline] Could not queue report after failed commit:", queued.error.code);
    return { result, queueError: queued.error };
  }
  console.log(`[Pipeline] Report queued as ${queued.value.id} after failed commit`);
  return { result, queued: queued.value };
}
