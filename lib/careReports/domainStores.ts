/**
 * Boundary to the systems of record for each kind of care log.
 *
 * Stores throw on failure; the dispatcher and the history loader turn those
 * throws into per-item results.
 */

import type { ExistingRecord, TimeRange } from "./types";

export type SleepRecordInput = {
  startTime: Date;
  endTime: Date;
  notes: string | null;
};

export type BottleFeedRecordInput = {
  timestamp: Date;
  amount: number;
  unit: "ounce" | "milliliter";
  notes: string | null;
};

export type NursingRecordInput = {
  timestamp: Date;
  durationMinutes: number;
  notes: string | null;
};

export type DiaperType = "wet" | "dirty" | "both";

export type DiaperRecordInput = {
  timestamp: Date;
  type: DiaperType;
  notes: string | null;
};

export type ActivityRecordInput = {
  timestamp: Date;
  activityType: "activity" | "other";
  description: string;
  notes: string | null;
};

/** Opaque id of an appended record */
export type RecordReference = string;

export interface DomainStore<TInput> {
  query(range: TimeRange): Promise<ExistingRecord[]>;
  append(record: TInput): Promise<RecordReference>;
}

export interface DomainStores {
  sleep: DomainStore<SleepRecordInput>;
  bottleFeed: DomainStore<BottleFeedRecordInput>;
  nursing: DomainStore<NursingRecordInput>;
  diaper: DomainStore<DiaperRecordInput>;
  activity: DomainStore<ActivityRecordInput>;
}

export type CommitTarget = keyof DomainStores;

/**
 * History across every store for one range. Bottle and nursing records both
 * come back as kind "feed".
 */
export async function loadHistory(
  stores: DomainStores,
  range: TimeRange
): Promise<ExistingRecord[]> {
  const batches = await Promise.all([
    stores.sleep.query(range),
    stores.bottleFeed.query(range),
    stores.nursing.query(range),
    stores.diaper.query(range),
    stores.activity.query(range),
  ]);
  return batches.flat();
}
