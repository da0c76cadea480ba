/**
 * Commit dispatcher: routes each confirmed candidate to its domain store.
 *
 * Routing:
 * - sleep     → sleep store (end time required)
 * - feed      → bottle when the quantity normalizes to a volume, otherwise
 *               nursing with the quantity read as minutes (0 when absent)
 * - diaper    → both / dirty / wet from the flags (neither set → wet)
 * - activity, other → activity store, raw quantity text kept as notes
 *
 * Every candidate is committed independently and concurrently: one failure
 * never blocks or rolls back another.
 */

import { validateCandidate } from "./candidates";
import type {
  ActivityRecordInput,
  BottleFeedRecordInput,
  CommitTarget,
  DiaperRecordInput,
  DiaperType,
  DomainStores,
  NursingRecordInput,
  RecordReference,
  SleepRecordInput,
} from "./domainStores";
import { PipelineError, storageFailure } from "./errors";
import { isVolumeUnit, normalizeQuantity, toDurationMinutes } from "./normalizeQuantity";
import type { CandidateEvent } from "./types";

export type CommitItemResult =
  | {
      candidateId: string;
      status: "committed";
      target: CommitTarget;
      reference: RecordReference;
    }
  | {
      candidateId: string;
      status: "failed";
      target: CommitTarget | null;
      error: PipelineError;
    };

export interface CommitResult {
  results: CommitItemResult[];
  committedCount: number;
  failedCount: number;
  failedIds: string[];
}

type Routed =
  | { target: "sleep"; record: SleepRecordInput }
  | { target: "bottleFeed"; record: BottleFeedRecordInput }
  | { target: "nursing"; record: NursingRecordInput }
  | { target: "diaper"; record: DiaperRecordInput }
  | { target: "activity"; record: ActivityRecordInput };

function notesOf(candidate: CandidateEvent): string | null {
  const details = candidate.details.trim();
  return details.length > 0 ? details : null;
}

/**
 * Diaper type from the flags. Neither flag set also lands on "wet"; that
 * default is pending product input.
 */
export function resolveDiaperType(wet: boolean, dirty: boolean): DiaperType {
  if (wet && dirty) return "both";
  if (dirty) return "dirty";
  return "wet";
}

/**
 * Decide target store and record shape. Throws VALIDATION_FAILED for a sleep
 * without an end time.
 */
export function routeCandidate(candidate: CandidateEvent): Routed {
  switch (candidate.kind) {
    case "sleep": {
      if (!candidate.endTime) {
        throw new PipelineError("VALIDATION_FAILED", "Sleep event has no end time", {
          operation: "commit.route:sleep",
        });
      }
      return {
        target: "sleep",
        record: {
          startTime: candidate.startTime,
          endTime: candidate.endTime,
          notes: notesOf(candidate),
        },
      };
    }
    case "feed": {
      const quantity = normalizeQuantity(candidate.quantityText);
      if (isVolumeUnit(quantity.unit)) {
        return {
          target: "bottleFeed",
          record: {
            timestamp: candidate.startTime,
            amount: quantity.amount,
            unit: quantity.unit,
            notes: notesOf(candidate),
          },
        };
      }
      return {
        target: "nursing",
        record: {
          timestamp: candidate.startTime,
          durationMinutes: toDurationMinutes(quantity),
          notes: notesOf(candidate),
        },
      };
    }
    case "diaper":
      return {
        target: "diaper",
        record: {
          timestamp: candidate.startTime,
          type: resolveDiaperType(candidate.wet, candidate.dirty),
          notes: notesOf(candidate),
        },
      };
    case "activity":
    case "other":
      return {
        target: "activity",
        record: {
          timestamp: candidate.startTime,
          activityType: candidate.kind,
          description: candidate.details,
          notes: candidate.quantityText ?? null,
        },
      };
  }
}

function appendRouted(stores: DomainStores, routed: Routed): Promise<RecordReference> {
  switch (routed.target) {
    case "sleep":
      return stores.sleep.append(routed.record);
    case "bottleFeed":
      return stores.bottleFeed.append(routed.record);
    case "nursing":
      return stores.nursing.append(routed.record);
    case "diaper":
      return stores.diaper.append(routed.record);
    case "activity":
      return stores.activity.append(routed.record);
  }
}

async function commitOne(
  stores: DomainStores,
  candidate: CandidateEvent
): Promise<CommitItemResult> {
  if (candidate.reviewState !== "confirmed") {
    return {
      candidateId: candidate.id,
      status: "failed",
      target: null,
      error: new PipelineError(
        "NOT_CONFIRMED",
        `Only confirmed events can be committed (was ${candidate.reviewState})`,
        { operation: "commit" }
      ),
    };
  }

  const issues = validateCandidate(candidate);
  if (issues.length > 0) {
    return {
      candidateId: candidate.id,
      status: "failed",
      target: null,
      error: new PipelineError(
        "VALIDATION_FAILED",
        issues.map((issue) => issue.message).join("; "),
        { operation: "commit.validate" }
      ),
    };
  }

  let routed: Routed;
  try {
    routed = routeCandidate(candidate);
  } catch (error) {
    return {
      candidateId: candidate.id,
      status: "failed",
      target: null,
      error:
        error instanceof PipelineError
          ? error
          : new PipelineError("VALIDATION_FAILED", String(error), { operation: "commit.route" }),
    };
  }

  try {
    const reference = await appendRouted(stores, routed);
    return { candidateId: candidate.id, status: "committed", target: routed.target, reference };
  } catch (error) {
    const failure = storageFailure("STORE_WRITE_FAILED", `store.append:${routed.target}`, error);
    console.error(`[Commit] Append failed for candidate ${candidate.id}:`, {
      target: routed.target,
      code: failure.code,
      transient: failure.transient,
      message: failure.message,
    });
    return { candidateId: candidate.id, status: "failed", target: routed.target, error: failure };
  }
}

/**
 * Commit a batch of confirmed candidates. Results are in input order.
 */
export async function commitCandidates(
  stores: DomainStores,
  confirmed: CandidateEvent[]
): Promise<CommitResult> {
  const results = await Promise.all(confirmed.map((candidate) => commitOne(stores, candidate)));

  const failedIds = results
    .filter((result) => result.status === "failed")
    .map((result) => result.candidateId);

  console.log(
    `[Commit] ${results.length - failedIds.length} committed, ${failedIds.length} failed`
  );

  return {
    results,
    committedCount: results.length - failedIds.length,
    failedCount: failedIds.length,
    failedIds,
  };
}

/**
 * The failed subset of a batch, for re-offering to the user.
 */
export function candidatesToRetry(
  result: CommitResult,
  candidates: CandidateEvent[]
): CandidateEvent[] {
  const failed = new Set(result.failedIds);
  return candidates.filter((candidate) => failed.has(candidate.id));
}
