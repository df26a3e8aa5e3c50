/** Billing period key, `YYYY-MM`, in UTC. */
export type PeriodKey = `${string}-${string}`;

const PERIOD_RE = /^(\d{4})-(0[1-9]|1[0-2])$/;

function formatPeriod(year: number, month: number): PeriodKey {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

/** The billing period containing `now`, by UTC calendar month. */
export function currentPeriod(now: Date): PeriodKey {
  return formatPeriod(now.getUTCFullYear(), now.getUTCMonth() + 1);
}

/** The calendar month before `period`; January rolls back to December of the prior year. */
export function previousPeriod(period: string): PeriodKey {
  const match = PERIOD_RE.exec(period);
  if (!match) {
    throw new Error(`Invalid period key "${period}": expected YYYY-MM`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  return month === 1 ? formatPeriod(year - 1, 12) : formatPeriod(year, month - 1);
}
