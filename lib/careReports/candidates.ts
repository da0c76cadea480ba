import { randomUUID } from "crypto";
import type { CandidateEvent, EventKind } from "./types";

export type CandidateIssueCode =
  | "INVALID_START"
  | "INVALID_END"
  | "END_NOT_AFTER_START"
  | "SLEEP_MISSING_END"
  | "END_TIME_ON_INSTANT";

export interface CandidateIssue {
  code: CandidateIssueCode;
  message: string;
}

export type NewCandidateInput = {
  kind: EventKind;
  startTime: Date;
  endTime?: Date;
  quantityText?: string;
  details?: string;
  wet?: boolean;
  dirty?: boolean;
};

/**
 * Build a freshly extracted candidate in the `detected` state.
 */
export function createCandidate(input: NewCandidateInput): CandidateEvent {
  const candidate: CandidateEvent = {
    id: randomUUID(),
    kind: input.kind,
    startTime: input.startTime,
    details: input.details ?? "",
    wet: input.wet ?? false,
    dirty: input.dirty ?? false,
    reviewState: "detected",
    duplicateFlag: false,
  };
  if (input.endTime) candidate.endTime = input.endTime;
  if (input.quantityText) candidate.quantityText = input.quantityText;
  return candidate;
}

function isValidDate(value: Date | undefined): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Every invariant violation on a candidate. An empty list means the candidate
 * may be confirmed and committed.
 */
export function validateCandidate(candidate: CandidateEvent): CandidateIssue[] {
  const issues: CandidateIssue[] = [];

  if (!isValidDate(candidate.startTime)) {
    issues.push({ code: "INVALID_START", message: "Start time is missing or invalid" });
    return issues;
  }

  if (candidate.endTime !== undefined) {
    if (!isValidDate(candidate.endTime)) {
      issues.push({ code: "INVALID_END", message: "End time is invalid" });
    } else if (candidate.endTime.getTime() <= candidate.startTime.getTime()) {
      issues.push({
        code: "END_NOT_AFTER_START",
        message: "End time must be after start time",
      });
    }
    if (candidate.kind !== "sleep") {
      issues.push({
        code: "END_TIME_ON_INSTANT",
        message: `A ${candidate.kind} event has no end time`,
      });
    }
  } else if (candidate.kind === "sleep") {
    issues.push({
      code: "SLEEP_MISSING_END",
      message: "Sleep needs an end time before it can be saved",
    });
  }

  return issues;
}
