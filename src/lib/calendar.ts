const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function sortIsoDates(dates: string[]): string[] {
  return [...dates].sort((a, b) => a.localeCompare(b));
}

export function toUtcDate(dateIso: string): Date {
  return new Date(`${dateIso}T00:00:00Z`);
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(toUtcDate(value).getTime());
}

export function getYear(dateIso: string): number {
  return toUtcDate(dateIso).getUTCFullYear();
}

/** Calendar month, 1 = January. */
export function getMonth(dateIso: string): number {
  return toUtcDate(dateIso).getUTCMonth() + 1;
}

export function toMonthKey(dateIso: string): string {
  return dateIso.slice(0, 7);
}

export function daysBetween(startIso: string, endIso: string): number {
  return Math.round((toUtcDate(endIso).getTime() - toUtcDate(startIso).getTime()) / MS_PER_DAY);
}

/**
 * A trading day is a buy day when its month number differs from the month of
 * the previous trading day. Rebalance days are the buy days falling in January.
 */
export function buildTradingSchedules(tradingDays: string[]): {
  buyDays: Set<string>;
  rebalanceDays: Set<string>;
} {
  const buyDays = new Set<string>();
  const rebalanceDays = new Set<string>();

  let previousMonth = -1;

  for (const day of sortIsoDates(tradingDays)) {
    const month = getMonth(day);
    if (month === previousMonth) {
      continue;
    }

    buyDays.add(day);
    if (month === 1) {
      rebalanceDays.add(day);
    }
    previousMonth = month;
  }

  return { buyDays, rebalanceDays };
}
