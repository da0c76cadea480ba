// lib/db/schema.ts
import { pgTable, text, timestamp, numeric, index } from "drizzle-orm/pg-core";

// ============================================
// Care logs (systems of record, one row per committed event)
// All tables are scoped by child_id.
// ============================================
export const sleep_logs = pgTable(
  "sleep_logs",
  {
    id: text("id").primaryKey(),
    child_id: text("child_id").notNull(),
    start_time: timestamp("start_time", { withTimezone: true }).notNull(),
    end_time: timestamp("end_time", { withTimezone: true }).notNull(),
    notes: text("notes"),
    created_at: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (t) => ({
    childStartIdx: index("sleep_logs_child_start_idx").on(t.child_id, t.start_time),
  })
);

export const bottle_feed_logs = pgTable(
  "bottle_feed_logs",
  {
    id: text("id").primaryKey(),
    child_id: text("child_id").notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    amount: numeric("amount", { precision: 8, scale: 2 }).notNull(),
    unit: text("unit").notNull(), // ounce | milliliter
    notes: text("notes"),
    created_at: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (t) => ({
    childTimestampIdx: index("bottle_feed_logs_child_timestamp_idx").on(t.child_id, t.timestamp),
  })
);

export const nursing_logs = pgTable(
  "nursing_logs",
  {
    id: text("id").primaryKey(),
    child_id: text("child_id").notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    duration_minutes: numeric("duration_minutes", { precision: 8, scale: 2 }).notNull(),
    notes: text("notes"),
    created_at: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (t) => ({
    childTimestampIdx: index("nursing_logs_child_timestamp_idx").on(t.child_id, t.timestamp),
  })
);

export const diaper_logs = pgTable(
  "diaper_logs",
  {
    id: text("id").primaryKey(),
    child_id: text("child_id").notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    type: text("type").notNull(), // wet | dirty | both
    notes: text("notes"),
    created_at: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (t) => ({
    childTimestampIdx: index("diaper_logs_child_timestamp_idx").on(t.child_id, t.timestamp),
  })
);

export const activity_logs = pgTable(
  "activity_logs",
  {
    id: text("id").primaryKey(),
    child_id: text("child_id").notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    activity_type: text("activity_type").notNull(), // activity | other
    description: text("description").notNull(),
    notes: text("notes"),
    created_at: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (t) => ({
    childTimestampIdx: index("activity_logs_child_timestamp_idx").on(t.child_id, t.timestamp),
  })
);
