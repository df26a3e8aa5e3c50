import { sql } from "drizzle-orm";
import { boolean, check, index, integer, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";

/**
 * One row per (user, billing period). The unit of atomic update for Book,
 * Credit and Fetch-time plan sync.
 *
 * `version` is bumped on every write; compare-and-set updates match on it.
 * `superseded` is set, with a version bump, when the next period is opened
 * from this row's top-up balance. Writes never land on a superseded row.
 */
export const usageRecords = pgTable(
  "usage_records",
  {
    userKey: text("user_key").notNull(),
    period: text("period").notNull(), // YYYY-MM, UTC
    plan: text("plan").notNull().default("free"),
    subscriptionLimitSeconds: integer("subscription_limit_seconds").notNull(),
    secondsUsed: integer("seconds_used").notNull().default(0),
    topupBalanceSeconds: integer("topup_balance_seconds").notNull().default(0),
    version: integer("version").notNull().default(0),
    superseded: boolean("superseded").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.userKey, table.period] }),
    index("idx_usage_records_period").on(table.period),
    check("usage_records_seconds_used_nonneg", sql`${table.secondsUsed} >= 0`),
    check("usage_records_topup_nonneg", sql`${table.topupBalanceSeconds} >= 0`),
  ],
);
