/**
 * Review state machine for candidate events.
 *
 *   detected ──edit──▶ edited
 *   detected | edited ──confirm──▶ confirmed
 *   detected | edited ──reject───▶ rejected
 *   confirmed ◀──────────────────▶ rejected
 *
 * `transition` is a plain function over values: it never mutates the input
 * candidate and reports refusals as data.
 */

import { validateCandidate, type CandidateIssue } from "./candidates";
import type { CandidateEvent, EventKind, ReviewState } from "./types";
import { err, ok, type Result } from "@/lib/utils/result";

/** Fields a reviewer may change. `endTime: null` clears it. */
export type CandidatePatch = {
  kind?: EventKind;
  startTime?: Date;
  endTime?: Date | null;
  quantityText?: string | null;
  details?: string;
  wet?: boolean;
  dirty?: boolean;
};

export type ReviewAction =
  | { type: "edit"; patch: CandidatePatch }
  | { type: "confirm" }
  | { type: "reject" };

export type ReviewErrorCode = "TERMINAL_STATE" | "INVALID_EDIT" | "INCOMPLETE_EVENT";

export interface ReviewError {
  code: ReviewErrorCode;
  candidateId: string;
  from: ReviewState;
  action: ReviewAction["type"];
  issues: CandidateIssue[];
  message: string;
}

const EDITABLE_STATES: ReadonlySet<ReviewState> = new Set(["detected", "edited"]);

function refuse(
  candidate: CandidateEvent,
  action: ReviewAction["type"],
  code: ReviewErrorCode,
  message: string,
  issues: CandidateIssue[] = []
): Result<CandidateEvent, ReviewError> {
  return err({
    code,
    candidateId: candidate.id,
    from: candidate.reviewState,
    action,
    issues,
    message,
  });
}

/**
 * Apply a patch to a copy. Moving away from sleep drops the end time, which
 * only sleep carries.
 */
export function applyPatch(candidate: CandidateEvent, patch: CandidatePatch): CandidateEvent {
  const next: CandidateEvent = { ...candidate };

  if (patch.kind !== undefined) next.kind = patch.kind;
  if (patch.startTime !== undefined) next.startTime = patch.startTime;
  if (patch.details !== undefined) next.details = patch.details;
  if (patch.wet !== undefined) next.wet = patch.wet;
  if (patch.dirty !== undefined) next.dirty = patch.dirty;

  if (patch.endTime === null) {
    delete next.endTime;
  } else if (patch.endTime !== undefined) {
    next.endTime = patch.endTime;
  }

  if (patch.quantityText === null || patch.quantityText === "") {
    delete next.quantityText;
  } else if (patch.quantityText !== undefined) {
    next.quantityText = patch.quantityText;
  }

  if (patch.kind !== undefined && patch.kind !== "sleep" && patch.endTime === undefined) {
    delete next.endTime;
  }

  return next;
}

function edit(candidate: CandidateEvent, patch: CandidatePatch): Result<CandidateEvent, ReviewError> {
  if (!EDITABLE_STATES.has(candidate.reviewState)) {
    return refuse(
      candidate,
      "edit",
      "TERMINAL_STATE",
      `Cannot edit a ${candidate.reviewState} event`
    );
  }

  const next = applyPatch(candidate, patch);
  // An incomplete sleep may still be edited toward completion
  const issues = validateCandidate(next).filter((issue) => issue.code !== "SLEEP_MISSING_END");
  if (issues.length > 0) {
    return refuse(candidate, "edit", "INVALID_EDIT", issues[0].message, issues);
  }

  next.reviewState = "edited";
  return ok(next);
}

function confirm(candidate: CandidateEvent): Result<CandidateEvent, ReviewError> {
  if (candidate.reviewState === "confirmed") return ok(candidate);

  const issues = validateCandidate(candidate);
  if (issues.length > 0) {
    return refuse(candidate, "confirm", "INCOMPLETE_EVENT", issues[0].message, issues);
  }
  const confirmed: CandidateEvent = { ...candidate, reviewState: "confirmed" };
  return ok(confirmed);
}

function reject(candidate: CandidateEvent): Result<CandidateEvent, ReviewError> {
  if (candidate.reviewState === "rejected") return ok(candidate);
  const rejected: CandidateEvent = { ...candidate, reviewState: "rejected" };
  return ok(rejected);
}

export function transition(
  candidate: CandidateEvent,
  action: ReviewAction
): Result<CandidateEvent, ReviewError> {
  switch (action.type) {
    case "edit":
      return edit(candidate, action.patch);
    case "confirm":
      return confirm(candidate);
    case "reject":
      return reject(candidate);
  }
}

export type BulkResult =
  | { ok: true; candidates: CandidateEvent[] }
  | { ok: false; candidates: CandidateEvent[]; blocked: ReviewError[] };

/**
 * Confirm every non-rejected candidate in one step. All-or-nothing: if any of
 * them cannot be confirmed, the input list is returned unchanged together with
 * the reasons.
 */
export function confirmAll(candidates: CandidateEvent[]): BulkResult {
  const blocked: ReviewError[] = [];
  const next: CandidateEvent[] = [];

  for (const candidate of candidates) {
    if (candidate.reviewState === "rejected") {
      next.push(candidate);
      continue;
    }
    const result = confirm(candidate);
    if (result.ok) {
      next.push(result.value);
    } else {
      blocked.push(result.error);
    }
  }

  if (blocked.length > 0) {
    return { ok: false, candidates, blocked };
  }
  return { ok: true, candidates: next };
}

/**
 * Reject every candidate. Always succeeds.
 */
export function rejectAll(candidates: CandidateEvent[]): CandidateEvent[] {
  return candidates.map((candidate): CandidateEvent =>
    candidate.reviewState === "rejected" ? candidate : { ...candidate, reviewState: "rejected" }
  );
}

/**
 * The only candidates allowed through to commit. Rejected and unresolved
 * (detected / edited) candidates are dropped without being persisted.
 */
export function selectForCommit(candidates: CandidateEvent[]): CandidateEvent[] {
  return candidates.filter((candidate) => candidate.reviewState === "confirmed");
}
