/**
 * Unit tests for the commit dispatcher.
 *
 * Covers routing to each store, diaper type resolution, refusal of
 * unconfirmed or invalid candidates and isolation of store failures.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createCandidate, type NewCandidateInput } from "@/lib/careReports/candidates";
import {
  candidatesToRetry,
  commitCandidates,
  resolveDiaperType,
  routeCandidate,
} from "@/lib/careReports/commitDispatcher";
import type { CandidateEvent } from "@/lib/careReports/types";
import { InMemoryStores } from "../helpers/inMemoryStores";

const at = (time: string) => new Date(`2024-03-05T${time}:00Z`);

function confirmed(input: NewCandidateInput): CandidateEvent {
  return { ...createCandidate(input), reviewState: "confirmed" };
}

describe("routeCandidate", () => {
  it("routes a volume feed to the bottle store", () => {
    expect(routeCandidate(confirmed({ kind: "feed", startTime: at("09:00"), quantityText: "120ml" }))).toEqual({
      target: "bottleFeed",
      record: { timestamp: at("09:00"), amount: 120, unit: "milliliter", notes: null },
    });
  });

  it("routes a duration feed to nursing", () => {
    expect(routeCandidate(confirmed({ kind: "feed", startTime: at("09:00"), quantityText: "15 min" }))).toEqual({
      target: "nursing",
      record: { timestamp: at("09:00"), durationMinutes: 15, notes: null },
    });
  });

  it("routes a feed without quantity to nursing with zero minutes", () => {
    const routed = routeCandidate(confirmed({ kind: "feed", startTime: at("09:00"), details: "Nursed" }));
    expect(routed).toEqual({
      target: "nursing",
      record: { timestamp: at("09:00"), durationMinutes: 0, notes: "Nursed" },
    });
  });

  it("keeps activity and other in the activity store", () => {
    expect(
      routeCandidate(confirmed({ kind: "other", startTime: at("12:00"), details: "Lunch", quantityText: "half" }))
    ).toEqual({
      target: "activity",
      record: { timestamp: at("12:00"), activityType: "other", description: "Lunch", notes: "half" },
    });
  });

  it("throws for a sleep without end time", () => {
    expect(() => routeCandidate(confirmed({ kind: "sleep", startTime: at("13:00") }))).toThrow(
      "Sleep event has no end time"
    );
  });
});

describe("resolveDiaperType", () => {
  it("maps the flags", () => {
    expect(resolveDiaperType(true, true)).toBe("both");
    expect(resolveDiaperType(false, true)).toBe("dirty");
    expect(resolveDiaperType(true, false)).toBe("wet");
    expect(resolveDiaperType(false, false)).toBe("wet");
  });
});

describe("commitCandidates", () => {
  let memory: InMemoryStores;

  beforeEach(() => {
    memory = new InMemoryStores();
  });

  it("writes each confirmed candidate to its store", async () => {
    const candidates = [
      confirmed({ kind: "sleep", startTime: at("13:00"), endTime: at("14:30"), details: "  Good nap " }),
      confirmed({ kind: "feed", startTime: at("09:00"), quantityText: "4 oz" }),
      confirmed({ kind: "diaper", startTime: at("10:00"), wet: true, dirty: true }),
      confirmed({ kind: "activity", startTime: at("11:00"), details: "Music class" }),
    ];

    const result = await commitCandidates(memory.asStores(), candidates);

    expect(result.committedCount).toBe(4);
    expect(result.failedCount).toBe(0);
    expect(result.results.map((r) => r.status === "committed" && r.target)).toEqual([
      "sleep",
      "bottleFeed",
      "diaper",
      "activity",
    ]);
    expect(memory.sleepRecords).toEqual([
      { startTime: at("13:00"), endTime: at("14:30"), notes: "Good nap" },
    ]);
    expect(memory.bottleRecords).toEqual([
      { timestamp: at("09:00"), amount: 4, unit: "ounce", notes: null },
    ]);
    expect(memory.diaperRecords).toEqual([{ timestamp: at("10:00"), type: "both", notes: null }]);
    expect(memory.activityRecords).toEqual([
      { timestamp: at("11:00"), activityType: "activity", description: "Music class", notes: null },
    ]);
  });

  it("refuses candidates that are not confirmed", async () => {
    const detected = createCandidate({ kind: "diaper", startTime: at("10:00") });
    const result = await commitCandidates(memory.asStores(), [detected]);

    expect(memory.totalRecords).toBe(0);
    const [item] = result.results;
    expect(item.status).toBe("failed");
    if (item.status !== "failed") return;
    expect(item.error.code).toBe("NOT_CONFIRMED");
    expect(item.target).toBeNull();
  });

  it("refuses a confirmed candidate that breaks an invariant", async () => {
    const openSleep = confirmed({ kind: "sleep", startTime: at("13:00") });
    const result = await commitCandidates(memory.asStores(), [openSleep]);

    const [item] = result.results;
    if (item.status !== "failed") throw new Error("expected failure");
    expect(item.error.code).toBe("VALIDATION_FAILED");
    expect(item.error.message).toBe("Sleep needs an end time before it can be saved");
  });

  it("isolates a failing store from the rest of the batch", async () => {
    memory.failAppend("sleep", new Error("disk full"));
    const candidates = [
      confirmed({ kind: "feed", startTime: at("09:00"), quantityText: "4 oz" }),
      confirmed({ kind: "sleep", startTime: at("13:00"), endTime: at("14:00") }),
      confirmed({ kind: "diaper", startTime: at("10:00"), dirty: true }),
    ];

    const result = await commitCandidates(memory.asStores(), candidates);

    expect(result.committedCount).toBe(2);
    expect(result.failedIds).toEqual([candidates[1].id]);
    expect(memory.bottleRecords).toHaveLength(1);
    expect(memory.diaperRecords).toEqual([{ timestamp: at("10:00"), type: "dirty", notes: null }]);

    const failed = result.results[1];
    if (failed.status !== "failed") throw new Error("expected failure");
    expect(failed.target).toBe("sleep");
    expect(failed.error.code).toBe("STORE_WRITE_FAILED");
    expect(failed.error.operation).toBe("store.append:sleep");
    expect(failed.error.transient).toBe(false);

    expect(candidatesToRetry(result, candidates)).toEqual([candidates[1]]);
  });

  it("marks connectivity failures as transient", async () => {
    memory.failAppend("diaper", Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }));
    const result = await commitCandidates(memory.asStores(), [
      confirmed({ kind: "diaper", startTime: at("10:00"), wet: true }),
    ]);

    const [item] = result.results;
    if (item.status !== "failed") throw new Error("expected failure");
    expect(item.error.transient).toBe(true);
  });

  it("commits nothing for an empty batch", async () => {
    const result = await commitCandidates(memory.asStores(), []);
    expect(result).toEqual({ results: [], committedCount: 0, failedCount: 0, failedIds: [] });
  });
});
