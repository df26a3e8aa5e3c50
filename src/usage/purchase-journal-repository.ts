import type { NewPurchaseEntry, PurchaseEntry, PurchaseHistoryOptions, UsageRecord } from "./repository-types.js";

export interface IPurchaseJournalRepository {
  /** The journal entry for a transaction id, or null if it was never credited. */
  get(transactionId: string): Promise<PurchaseEntry | null>;

  /**
   * Journal the purchase and add its seconds to the (userKey, period) record's
   * top-up balance in one transaction. If that record has been superseded by a
   * later period, the user's newest record is credited instead.
   *
   * The journal insert is keyed on transactionId; when it conflicts with an
   * existing entry nothing is written and null is returned. The usage record
   * must already exist.
   */
  appendAndCredit(entry: NewPurchaseEntry, period: string): Promise<UsageRecord | null>;

  /** A user's purchases, newest first. */
  listByUser(userKey: string, opts?: PurchaseHistoryOptions): Promise<PurchaseEntry[]>;
}
