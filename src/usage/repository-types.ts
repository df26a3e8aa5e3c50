/** Per (user, period) usage aggregate. */
export interface UsageRecord {
  userKey: string;
  period: string;
  plan: string;
  subscriptionLimitSeconds: number;
  secondsUsed: number;
  topupBalanceSeconds: number;
  version: number;
  /** The next period was opened from this record; its balance lives on there. */
  superseded: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUsageRecord {
  userKey: string;
  period: string;
  plan: string;
  subscriptionLimitSeconds: number;
}

/** Fields a compare-and-set write may change. */
export type UsageRecordChanges = Partial<
  Pick<UsageRecord, "plan" | "subscriptionLimitSeconds" | "secondsUsed" | "topupBalanceSeconds">
>;

/** A credited top-up purchase. */
export interface PurchaseEntry {
  transactionId: string;
  userKey: string;
  productId: string;
  secondsCredited: number;
  creditedAt: Date;
  pricePaid: number | null;
  currency: string | null;
}

export interface NewPurchaseEntry {
  transactionId: string;
  userKey: string;
  productId: string;
  secondsCredited: number;
  pricePaid?: number;
  currency?: string;
}

export interface PurchaseHistoryOptions {
  limit?: number;
  offset?: number;
}
