import type { AdjustedPrice, PriceField, PriceTable } from "@/lib/types";

const ZERO_PRICE: AdjustedPrice = { adjustedClose: 0, adjustedOpen: 0 };

function readField(table: PriceTable, index: number, symbol: string, field: PriceField): number | null {
  return table.series.get(symbol)?.[field][index] ?? null;
}

/**
 * Derives an open price on the same adjustment basis as the adjusted close.
 * Returns null when the table holds nothing for the symbol on that date.
 */
export function lookupAdjustedPrice(
  table: PriceTable,
  date: string,
  symbol: string
): AdjustedPrice | null {
  const index = table.dateIndex.get(date);
  if (index === undefined || !table.series.has(symbol)) {
    return null;
  }

  const open = readField(table, index, symbol, "open");
  const close = readField(table, index, symbol, "close");
  const adjustedClose = readField(table, index, symbol, "adjustedClose") ?? close ?? open;

  if (adjustedClose === null) {
    return null;
  }

  let adjustedOpen = open ?? adjustedClose;
  if (open !== null && close !== null && close !== 0) {
    adjustedOpen = open * (adjustedClose / close);
  }

  return {
    adjustedClose: Number.isFinite(adjustedClose) ? adjustedClose : 0,
    adjustedOpen: Number.isFinite(adjustedOpen) ? adjustedOpen : 0
  };
}

export function resolveAdjustedPrice(table: PriceTable, date: string, symbol: string): AdjustedPrice {
  return lookupAdjustedPrice(table, date, symbol) ?? ZERO_PRICE;
}
