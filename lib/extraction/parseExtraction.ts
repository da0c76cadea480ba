/**
 * Parse the extraction service's output into candidate events.
 *
 * The output is untrusted. Items are validated one by one: a bad item is
 * dropped and reported as an issue, the rest survive. The whole output is
 * MALFORMED_EXTRACTION only when it cannot be read as a list at all, or when
 * it lists events and none of them is usable.
 */

import { DateTime } from "luxon";
import { z } from "zod";
import { createCandidate } from "@/lib/careReports/candidates";
import { PipelineError } from "@/lib/careReports/errors";
import type { CandidateEvent, EventKind } from "@/lib/careReports/types";
import { err, ok, type Result } from "@/lib/utils/result";

export type ExtractionIssue = {
  index: number;
  message: string;
};

export type ParsedExtraction = {
  candidates: CandidateEvent[];
  issues: ExtractionIssue[];
};

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text.length > 0 ? text : undefined;
  });

const looseFlag = z
  .union([z.boolean(), z.string(), z.number()])
  .nullish()
  .transform(
    (value) =>
      value === true ||
      value === 1 ||
      (typeof value === "string" && ["true", "yes", "y", "1"].includes(value.trim().toLowerCase()))
  );

const RawEventSchema = z.object({
  type: z.string().trim().min(1),
  startTime: z.string().trim().min(1),
  endTime: optionalText,
  quantity: optionalText,
  details: optionalText,
  isWet: looseFlag,
  isDirty: looseFlag,
});

type RawEvent = z.infer<typeof RawEventSchema>;

const KIND_WORDS: Record<string, EventKind> = {
  sleep: "sleep",
  nap: "sleep",
  naps: "sleep",
  feed: "feed",
  feeding: "feed",
  bottle: "feed",
  nursing: "feed",
  breastfeeding: "feed",
  diaper: "diaper",
  activity: "activity",
  play: "activity",
};

/** Unknown words (solids, meals, medicine) land on "other". */
export function mapEventKind(type: string): EventKind {
  return KIND_WORDS[type.trim().toLowerCase()] ?? "other";
}

const CLOCK_TIME = /^(\d{1,2})(?::(\d{2}))?\s*([ap])\.?\s*m\.?$|^(\d{1,2}):(\d{2})$/i;

/**
 * Read "19:00", "7:00 PM" or "7pm" on the given calendar day. A full ISO
 * timestamp is also accepted as is. Null when the value is not a time.
 */
export function parseClockTime(value: string, day: DateTime): Date | null {
  const text = value.trim();
  const match = CLOCK_TIME.exec(text);

  if (!match) {
    const iso = DateTime.fromISO(text, { zone: day.zone });
    return iso.isValid && text.includes("T") ? iso.toJSDate() : null;
  }

  let hour: number;
  let minute: number;
  if (match[3]) {
    hour = Number(match[1]);
    minute = match[2] ? Number(match[2]) : 0;
    if (hour < 1 || hour > 12) return null;
    const pm = match[3].toLowerCase() === "p";
    hour = (hour % 12) + (pm ? 12 : 0);
  } else {
    hour = Number(match[4]);
    minute = Number(match[5]);
    if (hour > 23) return null;
  }
  if (minute > 59) return null;

  const result = day.set({ hour, minute, second: 0, millisecond: 0 });
  return result.isValid ? result.toJSDate() : null;
}

function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  return fenced ? fenced[1] : trimmed;
}

function readEventList(raw: string): unknown[] | null {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch (error) {
    console.error("[Extraction] Output is not valid JSON:", error instanceof Error ? error.message : error);
    return null;
  }

  if (Array.isArray(json)) return json;
  if (typeof json === "object" && json !== null && "events" in json && Array.isArray(json.events)) {
    return json.events;
  }
  return null;
}

function toCandidate(
  event: RawEvent,
  day: DateTime
): { candidate: CandidateEvent } | { message: string } {
  const kind = mapEventKind(event.type);

  const startTime = parseClockTime(event.startTime, day);
  if (!startTime) {
    return { message: `Unreadable start time "${event.startTime}"` };
  }

  let endTime: Date | undefined;
  if (kind === "sleep" && event.endTime) {
    const parsedEnd = parseClockTime(event.endTime, day);
    if (!parsedEnd) {
      return { message: `Unreadable end time "${event.endTime}"` };
    }
    endTime = parsedEnd;
    // Naps that cross midnight
    if (endTime.getTime() < startTime.getTime()) {
      endTime = DateTime.fromJSDate(endTime, { zone: day.zone }).plus({ days: 1 }).toJSDate();
    }
    if (endTime.getTime() === startTime.getTime()) {
      endTime = undefined;
    }
  }

  const candidate = createCandidate({
    kind,
    startTime,
    endTime,
    quantityText: event.quantity,
    details: event.details ?? event.type.trim(),
    wet: kind === "diaper" && event.isWet,
    dirty: kind === "diaper" && event.isDirty,
  });
  return { candidate };
}

/**
 * Parse raw output for a report of the given day. Clock times are read in
 * `timeZone` on the calendar day of `referenceDate` there.
 */
export function parseExtraction(
  raw: string,
  options: { referenceDate: Date; timeZone: string }
): Result<ParsedExtraction, PipelineError> {
  const items = readEventList(raw);
  if (!items) {
    return err(
      new PipelineError("MALFORMED_EXTRACTION", "Extraction output is not a list of events", {
        operation: "extraction.parse",
      })
    );
  }

  const day = DateTime.fromJSDate(options.referenceDate, { zone: options.timeZone }).startOf("day");
  const candidates: CandidateEvent[] = [];
  const issues: ExtractionIssue[] = [];

  items.forEach((item, index) => {
    const parsed = RawEventSchema.safeParse(item);
    if (!parsed.success) {
      issues.push({
        index,
        message: parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "event"}: ${issue.message}`)
          .join("; "),
      });
      return;
    }

    const result = toCandidate(parsed.data, day);
    if ("candidate" in result) {
      candidates.push(result.candidate);
    } else {
      issues.push({ index, message: result.message });
    }
  });

  if (items.length > 0 && candidates.length === 0) {
    return err(
      new PipelineError(
        "MALFORMED_EXTRACTION",
        `None of the ${items.length} extracted events could be read`,
        { operation: "extraction.parse" }
      )
    );
  }

  if (issues.length > 0) {
    console.warn(`[Extraction] Dropped ${issues.length} of ${items.length} events`, issues);
  }
  return ok({ candidates, issues });
}
