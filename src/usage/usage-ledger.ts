import { z } from "zod";
import { logger } from "../config/logger.js";
import type { DrizzleDb } from "../db/index.js";
import { DrizzlePurchaseJournalRepository } from "./drizzle-purchase-journal-repository.js";
import { DrizzleUsageRecordRepository } from "./drizzle-usage-record-repository.js";
import { InvalidRequestError, LedgerError, QuotaExceededError, StoreUnavailableError } from "./errors.js";
import { currentPeriod, previousPeriod } from "./period.js";
import { defaultPlanCatalog, type PlanCatalog } from "./plan-catalog.js";
import type { IPurchaseJournalRepository } from "./purchase-journal-repository.js";
import type { PurchaseEntry, UsageRecord, UsageRecordChanges } from "./repository-types.js";
import { defaultTopupProducts, type TopupProductCatalog } from "./topup-products.js";
import type { IUsageRecordRepository } from "./usage-record-repository.js";

// -- Inputs ------------------------------------------------------------------

const userKeySchema = z.string().trim().min(1, "must not be empty").max(255);
const planHintSchema = z.string().max(50).optional();

export const fetchInputSchema = z.object({
  userKey: userKeySchema,
  plan: planHintSchema,
});

export const bookInputSchema = z.object({
  userKey: userKeySchema,
  seconds: z.number().int("must be an integer").positive("must be positive"),
  plan: planHintSchema,
  /** Client-side timestamp. Advisory only; the server clock decides the period. */
  recordedAt: z.union([z.string(), z.number()]).optional(),
});

export const creditInputSchema = z.object({
  userKey: userKeySchema,
  secondsCredited: z.number().int("must be an integer").positive("must be positive"),
  transactionId: z.string().trim().min(1, "must not be empty").max(255),
  productId: z.string().min(1).max(100).optional(),
  pricePaid: z.number().nonnegative().max(99_999_999.99).optional(),
  currency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, "currency must be a 3-letter code")
    .transform((c) => c.toUpperCase())
    .optional(),
});

export const historyInputSchema = z.object({
  userKey: userKeySchema,
  limit: z.number().int().optional(),
  offset: z.number().int().optional(),
});

export type FetchInput = z.input<typeof fetchInputSchema>;
export type BookInput = z.input<typeof bookInputSchema>;
export type CreditInput = z.input<typeof creditInputSchema>;
export type HistoryInput = z.input<typeof historyInputSchema>;

// -- Results -----------------------------------------------------------------

export interface UsageSnapshot {
  plan: string;
  period: string;
  secondsUsed: number;
  subscriptionLimitSeconds: number;
  topupBalanceSeconds: number;
  /** subscriptionLimitSeconds + topupBalanceSeconds */
  limitSeconds: number;
  /** Subscription remaining (never below zero) plus top-up balance. */
  remainingSeconds: number;
}

export interface BookResult {
  period: string;
  secondsUsed: number;
  topupUsed: number;
  subscriptionUsed: number;
  topupBalanceSeconds: number;
  limitSeconds: number;
  remainingSeconds: number;
}

export interface CreditResult {
  secondsCredited: number;
  newTopupBalance: number;
  /** True when the transaction had already been credited and nothing changed. */
  alreadyCredited: boolean;
}

export interface IUsageLedger {
  fetch(input: FetchInput): Promise<UsageSnapshot>;
  book(input: BookInput): Promise<BookResult>;
  credit(input: CreditInput): Promise<CreditResult>;
  history(input: HistoryInput): Promise<PurchaseEntry[]>;
}

export interface UsageLedgerDeps {
  records: IUsageRecordRepository;
  journal: IPurchaseJournalRepository;
  plans?: PlanCatalog;
  topupProducts?: TopupProductCatalog;
  /** Server clock. Only this decides which period a request lands in. */
  clock?: () => Date;
  /** Compare-and-set attempts per write before giving up. Default: 10. */
  maxWriteAttempts?: number;
}

/** Subscription seconds still available; clamped because a downgrade can lower the limit below usage. */
export function subscriptionRemaining(record: Pick<UsageRecord, "subscriptionLimitSeconds" | "secondsUsed">): number {
  return Math.max(0, record.subscriptionLimitSeconds - record.secondsUsed);
}

export function totalAvailable(
  record: Pick<UsageRecord, "subscriptionLimitSeconds" | "secondsUsed" | "topupBalanceSeconds">,
): number {
  return subscriptionRemaining(record) + record.topupBalanceSeconds;
}

function toSnapshot(record: UsageRecord): UsageSnapshot {
  return {
    plan: record.plan,
    period: record.period,
    secondsUsed: record.secondsUsed,
    subscriptionLimitSeconds: record.subscriptionLimitSeconds,
    topupBalanceSeconds: record.topupBalanceSeconds,
    limitSeconds: record.subscriptionLimitSeconds + record.topupBalanceSeconds,
    remainingSeconds: totalAvailable(record),
  };
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw InvalidRequestError.fromZodError(parsed.error);
  }
  return parsed.data;
}

/**
 * Usage quota ledger: Fetch, Book and Credit over the usage record store
 * and the purchase journal.
 *
 * Stateless: every request resolves its period from the clock and all
 * concurrency control lives in the store (conditional inserts, version
 * compare-and-set, and the journal's unique transaction id).
 */
export class UsageLedger implements IUsageLedger {
  private readonly records: IUsageRecordRepository;
  private readonly journal: IPurchaseJournalRepository;
  private readonly plans: PlanCatalog;
  private readonly topupProducts: TopupProductCatalog;
  private readonly clock: () => Date;
  private readonly maxWriteAttempts: number;

  constructor(deps: UsageLedgerDeps) {
    this.records = deps.records;
    this.journal = deps.journal;
    this.plans = deps.plans ?? defaultPlanCatalog;
    this.topupProducts = deps.topupProducts ?? defaultTopupProducts;
    this.clock = deps.clock ?? (() => new Date());
    this.maxWriteAttempts = Math.max(1, deps.maxWriteAttempts ?? 10);
  }

  /**
   * Current entitlement. Creates the period record on first access and syncs
   * the stored plan to the caller's hint when they differ.
   */
  async fetch(input: FetchInput): Promise<UsageSnapshot> {
    const { userKey, plan } = parseInput(fetchInputSchema, input);
    return this.withStore("fetch", async () => {
      const period = currentPeriod(this.clock());
      let record = await this.resolveRecord(userKey, period, plan);

      if (plan !== undefined) {
        const resolved = this.plans.resolve(plan);
        // Only a plan change re-reads the catalog; an unchanged plan keeps its frozen limit.
        record = await this.mutate(record, (current) =>
          current.plan === resolved.plan
            ? null
            : { plan: resolved.plan, subscriptionLimitSeconds: resolved.limitSeconds },
        );
      }

      return toSnapshot(record);
    });
  }

  /**
   * Commit consumption. Top-up balance is drawn first, then the subscription
   * allowance. Either the whole amount is booked or nothing is.
   *
   * The plan hint only seeds a record created by this call.
   */
  async book(input: BookInput): Promise<BookResult> {
    const { userKey, seconds, plan, recordedAt } = parseInput(bookInputSchema, input);
    const now = this.clock();
    const period = currentPeriod(now);
    this.noteClientTimestamp(userKey, period, recordedAt);

    return this.withStore("book", async () => {
      let split = { fromTopup: 0, fromSubscription: 0 };
      const initial = await this.resolveRecord(userKey, period, plan);

      const record = await this.mutate(initial, (current) => {
        const available = totalAvailable(current);
        if (seconds > available) {
          throw new QuotaExceededError(seconds, available);
        }
        const fromTopup = Math.min(seconds, current.topupBalanceSeconds);
        const fromSubscription = seconds - fromTopup;
        split = { fromTopup, fromSubscription };
        return {
          topupBalanceSeconds: current.topupBalanceSeconds - fromTopup,
          secondsUsed: current.secondsUsed + fromSubscription,
        };
      });

      logger.debug("Usage booked", {
        userKey,
        period: record.period,
        seconds,
        topupUsed: split.fromTopup,
        subscriptionUsed: split.fromSubscription,
      });

      const snapshot = toSnapshot(record);
      return {
        period: snapshot.period,
        secondsUsed: snapshot.secondsUsed,
        topupUsed: split.fromTopup,
        subscriptionUsed: split.fromSubscription,
        topupBalanceSeconds: snapshot.topupBalanceSeconds,
        limitSeconds: snapshot.limitSeconds,
        remainingSeconds: snapshot.remainingSeconds,
      };
    });
  }

  /**
   * Apply a purchased top-up exactly once per transaction id. Repeated or
   * concurrent calls with the same id succeed without changing the balance.
   */
  async credit(input: CreditInput): Promise<CreditResult> {
    const req = parseInput(creditInputSchema, input);
    const product = this.topupProducts.match(req.secondsCredited, req.productId);
    if (!product) {
      const expected = this.topupProducts.grantSizes().join(", ");
      throw new InvalidRequestError(
        req.productId === undefined
          ? `seconds_credited ${req.secondsCredited} does not match a top-up grant (expected ${expected})`
          : `seconds_credited ${req.secondsCredited} does not match product ${req.productId}`,
      );
    }

    return this.withStore("credit", async () => {
      const period = currentPeriod(this.clock());

      const existing = await this.journal.get(req.transactionId);
      if (existing) {
        return this.alreadyCredited(req.userKey, period, existing);
      }

      const target = await this.resolveRecord(req.userKey, period, undefined);

      const credited = await this.journal.appendAndCredit(
        {
          transactionId: req.transactionId,
          userKey: req.userKey,
          productId: product.id,
          secondsCredited: req.secondsCredited,
          pricePaid: req.pricePaid,
          currency: req.currency,
        },
        target.period,
      );

      if (!credited) {
        // A concurrent credit for the same transaction committed first.
        const winner = await this.journal.get(req.transactionId);
        return this.alreadyCredited(req.userKey, period, winner);
      }

      logger.info("Top-up credited", {
        userKey: req.userKey,
        transactionId: req.transactionId,
        productId: product.id,
        secondsCredited: req.secondsCredited,
        newTopupBalance: credited.topupBalanceSeconds,
      });

      return {
        secondsCredited: req.secondsCredited,
        newTopupBalance: credited.topupBalanceSeconds,
        alreadyCredited: false,
      };
    });
  }

  /** Purchase history for a user, newest first. Audit path only. */
  async history(input: HistoryInput): Promise<PurchaseEntry[]> {
    const { userKey, limit, offset } = parseInput(historyInputSchema, input);
    return this.withStore("history", () => this.journal.listByUser(userKey, { limit, offset }));
  }

  // -- internals -------------------------------------------------------------

  /**
   * The record a request for `period` reads and writes. A new record starts
   * with zero usage and inherits the previous period's top-up balance. When a
   * later period is already open (another instance's clock crossed the month
   * first), that record is used instead, since it holds the carried balance.
   */
  private async resolveRecord(userKey: string, period: string, planHint: string | undefined): Promise<UsageRecord> {
    const latest = await this.records.findLatest(userKey);
    if (latest && latest.period >= period) {
      if (latest.period !== period) {
        logger.info("Request period already rolled over; using the newer record", {
          userKey,
          requestPeriod: period,
          recordPeriod: latest.period,
        });
      }
      return latest;
    }

    const resolved = this.plans.resolve(planHint);
    const { record, created } = await this.records.openPeriod(
      { userKey, period, plan: resolved.plan, subscriptionLimitSeconds: resolved.limitSeconds },
      previousPeriod(period),
    );

    if (created) {
      logger.info("Usage period opened", {
        userKey,
        period,
        plan: record.plan,
        carriedTopupSeconds: record.topupBalanceSeconds,
      });
    }
    return record;
  }

  /**
   * Optimistic read-modify-write. `decide` sees the latest row and returns the
   * changes to apply (null = leave as is); a version conflict re-reads and
   * decides again.
   */
  private async mutate(
    start: UsageRecord,
    decide: (current: UsageRecord) => UsageRecordChanges | null,
  ): Promise<UsageRecord> {
    let current = start;
    for (let attempt = 1; attempt <= this.maxWriteAttempts; attempt++) {
      const changes = decide(current);
      if (!changes) return current;

      const updated = await this.records.compareAndSet(current, changes);
      if (updated) return updated;

      let reread = await this.records.find(current.userKey, current.period);
      if (reread?.superseded) {
        reread = await this.records.findLatest(current.userKey);
      }
      if (!reread) {
        throw new Error(`usage record ${current.userKey}/${current.period} disappeared during update`);
      }
      current = reread;
    }

    logger.warn("Usage record write contention exhausted retries", {
      userKey: start.userKey,
      period: start.period,
      attempts: this.maxWriteAttempts,
    });
    throw new StoreUnavailableError("write (contention)");
  }

  /** Duplicate-credit response: current balance, read without creating anything. */
  private async alreadyCredited(userKey: string, period: string, entry: PurchaseEntry | null): Promise<CreditResult> {
    if (entry && entry.userKey !== userKey) {
      logger.warn("Transaction id reused by a different user", {
        transactionId: entry.transactionId,
        journaledUserKey: entry.userKey,
        requestUserKey: userKey,
      });
    }

    // The balance a request for `period` would see, or carry into it.
    const latest = await this.records.findLatest(userKey);
    const balance =
      latest && (latest.period >= period || latest.period === previousPeriod(period)) ? latest.topupBalanceSeconds : 0;

    return {
      secondsCredited: entry?.secondsCredited ?? 0,
      newTopupBalance: balance,
      alreadyCredited: true,
    };
  }

  private noteClientTimestamp(userKey: string, period: string, recordedAt: string | number | undefined): void {
    if (recordedAt === undefined) return;
    // Numbers are unix seconds, as sent by the mobile client.
    const clientTime = typeof recordedAt === "number" ? new Date(recordedAt * 1000) : new Date(recordedAt);
    if (Number.isNaN(clientTime.getTime())) return;
    const clientPeriod = currentPeriod(clientTime);
    if (clientPeriod !== period) {
      logger.info("Client timestamp names a different period; using server period", {
        userKey,
        serverPeriod: period,
        clientPeriod,
      });
    }
  }

  /** Run a store-touching operation, mapping persistence failures to StoreUnavailableError. */
  private async withStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      logger.error("Usage store operation failed", {
        operation,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new StoreUnavailableError(operation, err);
    }
  }
}

/** Wire a ledger to Postgres through the Drizzle repositories. */
export function createUsageLedger(
  db: DrizzleDb,
  opts: Omit<UsageLedgerDeps, "records" | "journal"> = {},
): UsageLedger {
  return new UsageLedger({
    ...opts,
    records: new DrizzleUsageRecordRepository(db),
    journal: new DrizzlePurchaseJournalRepository(db),
  });
}
