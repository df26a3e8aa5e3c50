import { and, desc, eq, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { topupPurchases, usageRecords } from "../db/schema/index.js";
import { toUsageRecord } from "./drizzle-usage-record-repository.js";
import type { IPurchaseJournalRepository } from "./purchase-journal-repository.js";
import type { NewPurchaseEntry, PurchaseEntry, PurchaseHistoryOptions, UsageRecord } from "./repository-types.js";

function toPurchaseEntry(row: typeof topupPurchases.$inferSelect): PurchaseEntry {
  return {
    transactionId: row.transactionId,
    userKey: row.userKey,
    productId: row.productId,
    secondsCredited: row.secondsCredited,
    creditedAt: row.creditedAt,
    pricePaid: row.pricePaid === null ? null : Number(row.pricePaid),
    currency: row.currency,
  };
}

/**
 * Purchase journal backed by the topup_purchases table.
 *
 * The primary key on transaction_id is what makes Credit idempotent: the
 * journal row and the balance increment commit together, and a conflicting
 * insert short-circuits the increment.
 */
export class DrizzlePurchaseJournalRepository implements IPurchaseJournalRepository {
  constructor(private readonly db: DrizzleDb) {}

  async get(transactionId: string): Promise<PurchaseEntry | null> {
    const rows = await this.db.select().from(topupPurchases).where(eq(topupPurchases.transactionId, transactionId));
    return rows[0] ? toPurchaseEntry(rows[0]) : null;
  }

  async appendAndCredit(entry: NewPurchaseEntry, period: string): Promise<UsageRecord | null> {
    return this.db.transaction(async (tx) => {
      const journaled = await tx
        .insert(topupPurchases)
        .values({
          transactionId: entry.transactionId,
          userKey: entry.userKey,
          productId: entry.productId,
          secondsCredited: entry.secondsCredited,
          pricePaid: entry.pricePaid === undefined ? null : entry.pricePaid.toFixed(2),
          currency: entry.currency ?? null,
        })
        .onConflictDoNothing({ target: topupPurchases.transactionId })
        .returning({ transactionId: topupPurchases.transactionId });

      if (journaled.length === 0) return null;

      const increment = {
        topupBalanceSeconds: sql`${usageRecords.topupBalanceSeconds} + ${entry.secondsCredited}`,
        version: sql`${usageRecords.version} + 1`,
        updatedAt: sql`now()`,
      };

      let updated = await tx
        .update(usageRecords)
        .set(increment)
        .where(
          and(
            eq(usageRecords.userKey, entry.userKey),
            eq(usageRecords.period, period),
            eq(usageRecords.superseded, false),
          ),
        )
        .returning();

      if (!updated[0]) {
        // The period rolled over; the newest record holds the carried balance.
        const [latest] = await tx
          .select()
          .from(usageRecords)
          .where(eq(usageRecords.userKey, entry.userKey))
          .orderBy(desc(usageRecords.period))
          .limit(1)
          .for("update");
        if (latest && !latest.superseded && latest.period > period) {
          updated = await tx
            .update(usageRecords)
            .set(increment)
            .where(and(eq(usageRecords.userKey, entry.userKey), eq(usageRecords.period, latest.period)))
            .returning();
        }
      }

      if (!updated[0]) {
        // Throwing rolls back the journal insert so a retry can credit it.
        throw new Error(`usage record ${entry.userKey}/${period} missing while crediting ${entry.transactionId}`);
      }
      return toUsageRecord(updated[0]);
    });
  }

  async listByUser(userKey: string, opts: PurchaseHistoryOptions = {}): Promise<PurchaseEntry[]> {
    const limit = Math.min(Math.max(1, opts.limit ?? 50), 250);
    const offset = Math.max(0, opts.offset ?? 0);

    const rows = await this.db
      .select()
      .from(topupPurchases)
      .where(eq(topupPurchases.userKey, userKey))
      .orderBy(desc(topupPurchases.creditedAt), desc(topupPurchases.transactionId))
      .limit(limit)
      .offset(offset);
    return rows.map(toPurchaseEntry);
  }
}
