import { index, integer, numeric, pgTable, text, timestamp } from "drizzle-orm/pg-core";

/**
 * Purchase journal: one immutable row per credited top-up.
 * The primary key on transaction_id is the idempotency primitive for Credit.
 */
export const topupPurchases = pgTable(
  "topup_purchases",
  {
    transactionId: text("transaction_id").primaryKey(),
    userKey: text("user_key").notNull(),
    productId: text("product_id").notNull(),
    secondsCredited: integer("seconds_credited").notNull(),
    creditedAt: timestamp("credited_at", { withTimezone: true }).notNull().defaultNow(),
    // Audit only, never used in quota math
    pricePaid: numeric("price_paid", { precision: 10, scale: 2 }),
    currency: text("currency"),
  },
  (table) => [
    index("idx_topup_purchases_user_key").on(table.userKey),
    index("idx_topup_purchases_credited_at").on(table.creditedAt),
  ],
);
