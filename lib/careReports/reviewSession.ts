/**
 * Review session: the candidates of one report plus the history they were
 * checked against. A plain value; every operation returns a new session.
 */

import { detectDuplicate, type DuplicateDetectorOptions } from "./duplicates";
import {
  confirmAll,
  rejectAll,
  transition,
  type ReviewAction,
  type ReviewError,
} from "./reviewState";
import type { CandidateEvent, ExistingRecord, ReportSource, ReviewState } from "./types";
import { err, ok, type Result } from "@/lib/utils/result";

export type ReviewSession = {
  /** Pending report id when the session was rebuilt from the queue */
  reportId?: string;
  /** Original input, kept so a failed commit can queue the report again */
  source?: ReportSource;
  candidates: CandidateEvent[];
  history: ExistingRecord[];
  detectorOptions: DuplicateDetectorOptions;
  createdAt: Date;
};

export type SessionError =
  | { code: "CANDIDATE_NOT_FOUND"; candidateId: string }
  | ReviewError;

export function createReviewSession(input: {
  candidates: CandidateEvent[];
  history: ExistingRecord[];
  detectorOptions?: DuplicateDetectorOptions;
  source?: ReportSource;
  reportId?: string;
  now?: Date;
}): ReviewSession {
  const session: ReviewSession = {
    candidates: input.candidates,
    history: input.history,
    detectorOptions: input.detectorOptions ?? {},
    createdAt: input.now ?? new Date(),
  };
  if (input.source) session.source = input.source;
  if (input.reportId) session.reportId = input.reportId;
  return session;
}

/**
 * Apply one review action to one candidate. Edits re-run duplicate detection
 * for that candidate against the session history.
 */
export function applyReviewAction(
  session: ReviewSession,
  candidateId: string,
  action: ReviewAction
): Result<ReviewSession, SessionError> {
  const index = session.candidates.findIndex((candidate) => candidate.id === candidateId);
  if (index === -1) {
    const notFound: SessionError = { code: "CANDIDATE_NOT_FOUND", candidateId };
    return err(notFound);
  }

  const result = transition(session.candidates[index], action);
  if (!result.ok) {
    return err(result.error);
  }

  const updated =
    action.type === "edit"
      ? detectDuplicate(result.value, session.history, session.detectorOptions)
      : result.value;

  const candidates = session.candidates.slice();
  candidates[index] = updated;
  return ok({ ...session, candidates });
}

export function confirmAllInSession(
  session: ReviewSession
): Result<ReviewSession, ReviewError[]> {
  const result = confirmAll(session.candidates);
  if (!result.ok) {
    return err(result.blocked);
  }
  return ok({ ...session, candidates: result.candidates });
}

export function rejectAllInSession(session: ReviewSession): ReviewSession {
  return { ...session, candidates: rejectAll(session.candidates) };
}

export type SessionSummary = Record<ReviewState, number> & {
  total: number;
  duplicates: number;
};

export function summarizeSession(session: ReviewSession): SessionSummary {
  const summary: SessionSummary = {
    total: session.candidates.length,
    duplicates: 0,
    detected: 0,
    edited: 0,
    confirmed: 0,
    rejected: 0,
  };
  for (const candidate of session.candidates) {
    summary[candidate.reviewState] += 1;
    if (candidate.duplicateFlag) summary.duplicates += 1;
  }
  return summary;
}
