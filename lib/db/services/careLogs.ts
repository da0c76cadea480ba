// lib/db/services/careLogs.ts
import { randomUUID } from "crypto";
import { and, eq, gt, gte, lt, lte } from "drizzle-orm";
import type { InferSelectModel } from "drizzle-orm";
import type { DomainStores } from "@/lib/careReports/domainStores";
import type { ExistingRecord } from "@/lib/careReports/types";
import type { Db } from "../drizzle";
import {
  activity_logs,
  bottle_feed_logs,
  diaper_logs,
  nursing_logs,
  sleep_logs,
} from "../schema";

type SleepRow = Pick<InferSelectModel<typeof sleep_logs>, "start_time" | "end_time">;
type BottleRow = Pick<InferSelectModel<typeof bottle_feed_logs>, "timestamp" | "amount" | "unit">;
type NursingRow = Pick<InferSelectModel<typeof nursing_logs>, "timestamp" | "duration_minutes">;
type DiaperRow = Pick<InferSelectModel<typeof diaper_logs>, "timestamp">;
type ActivityRow = Pick<InferSelectModel<typeof activity_logs>, "timestamp" | "activity_type">;

export function sleepRowToRecord(row: SleepRow): ExistingRecord {
  return { kind: "sleep", startTime: row.start_time, endTime: row.end_time };
}

export function bottleRowToRecord(row: BottleRow): ExistingRecord {
  const unit = row.unit === "milliliter" ? "ml" : "oz";
  return { kind: "feed", startTime: row.timestamp, quantity: `${Number(row.amount)} ${unit}` };
}

export function nursingRowToRecord(row: NursingRow): ExistingRecord {
  return { kind: "feed", startTime: row.timestamp, quantity: `${Number(row.duration_minutes)} min` };
}

export function diaperRowToRecord(row: DiaperRow): ExistingRecord {
  return { kind: "diaper", startTime: row.timestamp };
}

export function activityRowToRecord(row: ActivityRow): ExistingRecord {
  return { kind: row.activity_type === "other" ? "other" : "activity", startTime: row.timestamp };
}

/**
 * Postgres-backed domain stores for one child.
 * Sleep history matches by interval overlap, everything else by timestamp.
 */
export function createDrizzleDomainStores(db: Db, childId: string): DomainStores {
  return {
    sleep: {
      async query(range) {
        const rows = await db
          .select({ start_time: sleep_logs.start_time, end_time: sleep_logs.end_time })
          .from(sleep_logs)
          .where(
            and(
              eq(sleep_logs.child_id, childId),
              lt(sleep_logs.start_time, range.end),
              gt(sleep_logs.end_time, range.start)
            )
          );
        return rows.map(sleepRowToRecord);
      },
      async append(record) {
        const id = randomUUID();
        await db.insert(sleep_logs).values({
          id,
          child_id: childId,
          start_time: record.startTime,
          end_time: record.endTime,
          notes: record.notes,
        });
        return id;
      },
    },

    bottleFeed: {
      async query(range) {
        const rows = await db
          .select({
            timestamp: bottle_feed_logs.timestamp,
            amount: bottle_feed_logs.amount,
            unit: bottle_feed_logs.unit,
          })
          .from(bottle_feed_logs)
          .where(
            and(
              eq(bottle_feed_logs.child_id, childId),
              gte(bottle_feed_logs.timestamp, range.start),
              lte(bottle_feed_logs.timestamp, range.end)
            )
          );
        return rows.map(bottleRowToRecord);
      },
      async append(record) {
        const id = randomUUID();
        await db.insert(bottle_feed_logs).values({
          id,
          child_id: childId,
          timestamp: record.timestamp,
          amount: String(record.amount),
          unit: record.unit,
          notes: record.notes,
        });
        return id;
      },
    },

    nursing: {
      async query(range) {
        const rows = await db
          .select({
            timestamp: nursing_logs.timestamp,
            duration_minutes: nursing_logs.duration_minutes,
          })
          .from(nursing_logs)
          .where(
            and(
              eq(nursing_logs.child_id, childId),
              gte(nursing_logs.timestamp, range.start),
              lte(nursing_logs.timestamp, range.end)
            )
          );
        return rows.map(nursingRowToRecord);
      },
      async append(record) {
        const id = randomUUID();
        await db.insert(nursing_logs).values({
          id,
          child_id: childId,
          timestamp: record.timestamp,
          duration_minutes: String(record.durationMinutes),
          notes: record.notes,
        });
        return id;
      },
    },

    diaper: {
      async query(range) {
        const rows = await db
          .select({ timestamp: diaper_logs.timestamp })
          .from(diaper_logs)
          .where(
            and(
              eq(diaper_logs.child_id, childId),
              gte(diaper_logs.timestamp, range.start),
              lte(diaper_logs.timestamp, range.end)
            )
          );
        return rows.map(diaperRowToRecord);
      },
      async append(record) {
        const id = randomUUID();
        await db.insert(diaper_logs).values({
          id,
          child_id: childId,
          timestamp: record.timestamp,
          type: record.type,
          notes: record.notes,
        });
        return id;
      },
    },

    activity: {
      async query(range) {
        const rows = await db
          .select({
            timestamp: activity_logs.timestamp,
            activity_type: activity_logs.activity_type,
          })
          .from(activity_logs)
          .where(
            and(
              eq(activity_logs.child_id, childId),
              gte(activity_logs.timestamp, range.start),
              lte(activity_logs.timestamp, range.end)
            )
          );
        return rows.map(activityRowToRecord);
      },
      async append(record) {
        const id = randomUUID();
        await db.insert(activity_logs).values({
          id,
          child_id: childId,
          timestamp: record.timestamp,
          activity_type: record.activityType,
          description: record.description,
          notes: record.notes,
        });
        return id;
      },
    },
  };
}
