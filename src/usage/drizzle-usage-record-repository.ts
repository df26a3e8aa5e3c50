import { and, desc, eq, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { usageRecords } from "../db/schema/index.js";
import type { NewUsageRecord, UsageRecord, UsageRecordChanges } from "./repository-types.js";
import type { IUsageRecordRepository } from "./usage-record-repository.js";

export function toUsageRecord(row: typeof usageRecords.$inferSelect): UsageRecord {
  return {
    userKey: row.userKey,
    period: row.period,
    plan: row.plan,
    subscriptionLimitSeconds: row.subscriptionLimitSeconds,
    secondsUsed: row.secondsUsed,
    topupBalanceSeconds: row.topupBalanceSeconds,
    version: row.version,
    superseded: row.superseded,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleUsageRecordRepository implements IUsageRecordRepository {
  constructor(private readonly db: DrizzleDb) {}

  async find(userKey: string, period: string): Promise<UsageRecord | null> {
    const rows = await this.db
      .select()
      .from(usageRecords)
      .where(and(eq(usageRecords.userKey, userKey), eq(usageRecords.period, period)));
    return rows[0] ? toUsageRecord(rows[0]) : null;
  }

  async findLatest(userKey: string): Promise<UsageRecord | null> {
    const rows = await this.db
      .select()
      .from(usageRecords)
      .where(eq(usageRecords.userKey, userKey))
      .orderBy(desc(usageRecords.period))
      .limit(1);
    return rows[0] ? toUsageRecord(rows[0]) : null;
  }

  async openPeriod(record: NewUsageRecord, previousPeriod: string): Promise<{ record: UsageRecord; created: boolean }> {
    return this.db.transaction(async (tx) => {
      const [prior] = await tx
        .select()
        .from(usageRecords)
        .where(and(eq(usageRecords.userKey, record.userKey), eq(usageRecords.period, previousPeriod)))
        .for("update");

      const inserted = await tx
        .insert(usageRecords)
        .values({
          userKey: record.userKey,
          period: record.period,
          plan: record.plan,
          subscriptionLimitSeconds: record.subscriptionLimitSeconds,
          secondsUsed: 0,
          topupBalanceSeconds: prior?.topupBalanceSeconds ?? 0,
        })
        .onConflictDoNothing({ target: [usageRecords.userKey, usageRecords.period] })
        .returning();

      if (inserted[0]) {
        if (prior && !prior.superseded) {
          // Bumping the version fails any in-flight compare-and-set against the old row.
          await tx
            .update(usageRecords)
            .set({ superseded: true, version: sql`${usageRecords.version} + 1`, updatedAt: sql`now()` })
            .where(and(eq(usageRecords.userKey, prior.userKey), eq(usageRecords.period, prior.period)));
        }
        return { record: toUsageRecord(inserted[0]), created: true };
      }

      // Lost the race or the row already existed; read back the winner.
      const [existing] = await tx
        .select()
        .from(usageRecords)
        .where(and(eq(usageRecords.userKey, record.userKey), eq(usageRecords.period, record.period)));
      if (!existing) {
        throw new Error(`usage record ${record.userKey}/${record.period} conflicted on insert but is not readable`);
      }
      return { record: toUsageRecord(existing), created: false };
    });
  }

  async compareAndSet(current: UsageRecord, changes: UsageRecordChanges): Promise<UsageRecord | null> {
    const rows = await this.db
      .update(usageRecords)
      .set({
        ...changes,
        version: sql`${usageRecords.version} + 1`,
        updatedAt: sql`now()`,
      })
      .where(
        and(
          eq(usageRecords.userKey, current.userKey),
          eq(usageRecords.period, current.period),
          eq(usageRecords.version, current.version),
        ),
      )
      .returning();
    return rows[0] ? toUsageRecord(rows[0]) : null;
  }
}
