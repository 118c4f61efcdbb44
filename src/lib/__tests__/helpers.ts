import { buildPriceTable } from "@/lib/price-table";
import type { PortfolioDefinition, PriceBar, PriceTable } from "@/lib/types";

/** Bar whose open, close and adjusted close are all `price`. */
export function flatBar(date: string, price: number): PriceBar {
  return { date, open: price, close: price, adjustedClose: price };
}

export function flatTable(prices: Record<string, [string, number][]>): PriceTable {
  return buildPriceTable(
    Object.fromEntries(
      Object.entries(prices).map(([symbol, points]) => [
        symbol,
        points.map(([date, price]) => flatBar(date, price))
      ])
    )
  );
}

export function portfolio(
  name: string,
  assets: [string, number][],
  overrides: Partial<PortfolioDefinition> = {}
): PortfolioDefinition {
  return {
    name,
    assets: assets.map(([symbol, weightPercent]) => ({ symbol, weightPercent })),
    withdrawalEnabled: false,
    withdrawalRatePercent: 4,
    inflationRatePercent: 2,
    withdrawalStartYear: 1,
    ...overrides
  };
}
