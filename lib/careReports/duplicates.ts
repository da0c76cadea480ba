/**
 * Duplicate detection against existing history.
 *
 * Annotates candidates only: a flagged candidate stays in the list and the
 * user decides in review. Pure and synchronous, so running it twice on the
 * same inputs gives the same flags and reasons.
 *
 * - sleep: half-open interval overlap; a missing end time on either side is
 *   compared as a default window (never written back)
 * - feed / diaper / activity / other: a same-kind record whose start is
 *   within ±window of the candidate start
 *
 * O(n·m); callers pre-filter history with resolveHistoryRange().
 */

import { DateTime } from "luxon";
import type { CandidateEvent, ExistingRecord, TimeRange } from "./types";
import {
  DEFAULT_HISTORY_LOOKBACK_DAYS,
  DEFAULT_INSTANT_WINDOW_MINUTES,
  DEFAULT_SLEEP_WINDOW_MINUTES,
} from "@/lib/config/pipeline";

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface DuplicateDetectorOptions {
  /** ± tolerance around an instant event's start time */
  instantWindowMinutes?: number;
  /** Comparison length for a sleep interval with no end time */
  sleepDefaultWindowMinutes?: number;
  /** Zone used to render times in duplicate reasons */
  timeZone?: string;
}

type ResolvedOptions = Required<DuplicateDetectorOptions>;

function resolveOptions(options: DuplicateDetectorOptions): ResolvedOptions {
  return {
    instantWindowMinutes: options.instantWindowMinutes ?? DEFAULT_INSTANT_WINDOW_MINUTES,
    sleepDefaultWindowMinutes:
      options.sleepDefaultWindowMinutes ?? DEFAULT_SLEEP_WINDOW_MINUTES,
    timeZone: options.timeZone ?? "UTC",
  };
}

function formatTime(date: Date, timeZone: string): string {
  return DateTime.fromJSDate(date, { zone: timeZone }).toFormat("h:mm a", { locale: "en-US" });
}

function intervalEnd(start: Date, end: Date | undefined, defaultMinutes: number): number {
  return end ? end.getTime() : start.getTime() + defaultMinutes * MINUTE_MS;
}

type Match = { record: ExistingRecord; distanceMs: number };

/**
 * Closest by start-time distance; ties keep the earlier record in history order.
 */
function closest(matches: Match[]): Match | null {
  let best: Match | null = null;
  for (const match of matches) {
    if (!best || match.distanceMs < best.distanceMs) best = match;
  }
  return best;
}

function findSleepMatch(
  candidate: CandidateEvent,
  history: ExistingRecord[],
  options: ResolvedOptions
): Match | null {
  const start = candidate.startTime.getTime();
  const end = intervalEnd(candidate.startTime, candidate.endTime, options.sleepDefaultWindowMinutes);

  const matches: Match[] = [];
  for (const record of history) {
    const recordStart = record.startTime.getTime();
    const recordEnd = intervalEnd(record.startTime, record.endTime, options.sleepDefaultWindowMinutes);
    // Half-open: touching boundaries do not overlap
    if (start < recordEnd && recordStart < end) {
      matches.push({ record, distanceMs: Math.abs(recordStart - start) });
    }
  }
  return closest(matches);
}

function findInstantMatch(
  candidate: CandidateEvent,
  history: ExistingRecord[],
  options: ResolvedOptions
): Match | null {
  const start = candidate.startTime.getTime();
  const windowMs = options.instantWindowMinutes * MINUTE_MS;

  const matches: Match[] = [];
  for (const record of history) {
    const distanceMs = Math.abs(record.startTime.getTime() - start);
    if (distanceMs <= windowMs) {
      matches.push({ record, distanceMs });
    }
  }
  return closest(matches);
}

function describeMatch(
  candidate: CandidateEvent,
  record: ExistingRecord,
  options: ResolvedOptions
): string {
  if (candidate.kind === "sleep") {
    const recordEnd = new Date(
      intervalEnd(record.startTime, record.endTime, options.sleepDefaultWindowMinutes)
    );
    return `Overlaps existing sleep log from ${formatTime(record.startTime, options.timeZone)} to ${formatTime(recordEnd, options.timeZone)}`;
  }
  return `Within ${options.instantWindowMinutes} minutes of existing ${record.kind} log at ${formatTime(record.startTime, options.timeZone)}`;
}

/**
 * Flag one candidate against history (any kind; filtered to the same kind here).
 */
export function detectDuplicate(
  candidate: CandidateEvent,
  history: ExistingRecord[],
  options: DuplicateDetectorOptions = {}
): CandidateEvent {
  const resolved = resolveOptions(options);
  const sameKind = history.filter((record) => record.kind === candidate.kind);

  const match =
    candidate.kind === "sleep"
      ? findSleepMatch(candidate, sameKind, resolved)
      : findInstantMatch(candidate, sameKind, resolved);

  const { duplicateReason: _previous, ...rest } = candidate;
  if (!match) {
    return { ...rest, duplicateFlag: false };
  }
  return {
    ...rest,
    duplicateFlag: true,
    duplicateReason: describeMatch(candidate, match.record, resolved),
  };
}

/**
 * Annotate every candidate. Returns new candidate objects in the same order.
 */
export function detectDuplicates(
  candidates: CandidateEvent[],
  history: ExistingRecord[],
  options: DuplicateDetectorOptions = {}
): CandidateEvent[] {
  const flagged = candidates.map((candidate) => detectDuplicate(candidate, history, options));

  const duplicateCount = flagged.filter((candidate) => candidate.duplicateFlag).length;
  if (duplicateCount > 0) {
    console.log(`[Duplicates] Flagged ${duplicateCount} of ${flagged.length} candidates`);
  }
  return flagged;
}

/**
 * Bounded history window for a batch: at least the last `lookbackDays`, widened
 * to one day either side of the candidates so a report for an older day still
 * sees its own surroundings.
 */
export function resolveHistoryRange(
  candidates: CandidateEvent[],
  options: { now: Date; lookbackDays?: number }
): TimeRange {
  const lookbackDays = options.lookbackDays ?? DEFAULT_HISTORY_LOOKBACK_DAYS;
  let start = options.now.getTime() - lookbackDays * DAY_MS;
  let end = options.now.getTime();

  for (const candidate of candidates) {
    const candidateStart = candidate.startTime.getTime();
    const candidateEnd = candidate.endTime ? candidate.endTime.getTime() : candidateStart;
    start = Math.min(start, candidateStart - DAY_MS);
    end = Math.max(end, candidateEnd + DAY_MS);
  }

  return { start: new Date(start), end: new Date(end) };
}
