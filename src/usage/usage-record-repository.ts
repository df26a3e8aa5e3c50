import type { NewUsageRecord, UsageRecord, UsageRecordChanges } from "./repository-types.js";

export interface IUsageRecordRepository {
  /** The record for (userKey, period), or null. */
  find(userKey: string, period: string): Promise<UsageRecord | null>;

  /** The user's record with the highest period, or null for a new user. */
  findLatest(userKey: string): Promise<UsageRecord | null>;

  /**
   * Create the (userKey, period) record unless it exists, carrying the top-up
   * balance of the `previousPeriod` record and marking that record superseded.
   * The previous record is locked while its balance is read, so no write to it
   * can slip in between the carry and the supersede.
   *
   * Returns the stored row either way; `created` is true only for the caller whose insert won.
   */
  openPeriod(record: NewUsageRecord, previousPeriod: string): Promise<{ record: UsageRecord; created: boolean }>;

  /**
   * Apply `changes` only if the stored row still carries `current.version`.
   * Returns the updated row, or null when another writer got there first.
   */
  compareAndSet(current: UsageRecord, changes: UsageRecordChanges): Promise<UsageRecord | null>;
}
