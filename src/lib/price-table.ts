import { sortIsoDates } from "@/lib/calendar";
import type { PriceBar, PriceField, PriceTable, SymbolSeries } from "@/lib/types";

const PRICE_FIELDS: PriceField[] = ["open", "close", "adjustedClose"];

function toFiniteOrNull(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function forwardFill(values: (number | null)[]): (number | null)[] {
  let last: number | null = null;
  return values.map((value) => {
    if (value !== null) {
      last = value;
    }
    return last;
  });
}

function emptySeries(length: number): SymbolSeries {
  return {
    open: new Array<number | null>(length).fill(null),
    close: new Array<number | null>(length).fill(null),
    adjustedClose: new Array<number | null>(length).fill(null)
  };
}

/**
 * Aligns per-symbol bars onto the union of their dates and forward-fills each
 * field. Values before a symbol's first observation stay null.
 */
export function buildPriceTable(histories: Record<string, PriceBar[]>): PriceTable {
  const symbols = Object.keys(histories);
  const dates = sortIsoDates([
    ...new Set(symbols.flatMap((symbol) => histories[symbol].map((bar) => bar.date)))
  ]);
  const dateIndex = new Map(dates.map((date, index) => [date, index]));
  const series = new Map<string, SymbolSeries>();

  for (const symbol of symbols) {
    const aligned = emptySeries(dates.length);

    for (const bar of histories[symbol]) {
      const index = dateIndex.get(bar.date);
      if (index === undefined) {
        continue;
      }
      for (const field of PRICE_FIELDS) {
        aligned[field][index] = toFiniteOrNull(bar[field]);
      }
    }

    series.set(symbol, {
      open: forwardFill(aligned.open),
      close: forwardFill(aligned.close),
      adjustedClose: forwardFill(aligned.adjustedClose)
    });
  }

  return { dates, dateIndex, series };
}

function firstNonNullIndex(values: (number | null)[]): number {
  return values.findIndex((value) => value !== null);
}

/**
 * First date with an adjusted close, or with a close when the symbol never
 * reports an adjusted close.
 */
export function findFirstValidDate(table: PriceTable, symbol: string): string | null {
  const series = table.series.get(symbol);
  if (!series) {
    return null;
  }

  const adjustedIndex = firstNonNullIndex(series.adjustedClose);
  const index = adjustedIndex >= 0 ? adjustedIndex : firstNonNullIndex(series.close);
  return index >= 0 ? table.dates[index] : null;
}

export function getTradingDatesFrom(table: PriceTable, startDate: string): string[] {
  return table.dates.filter((date) => date >= startDate);
}

export function getSymbolBars(table: PriceTable, symbol: string): PriceBar[] {
  const series = table.series.get(symbol);
  if (!series) {
    return [];
  }

  return table.dates.map((date, index) => ({
    date,
    open: series.open[index],
    close: series.close[index],
    adjustedClose: series.adjustedClose[index]
  }));
}
