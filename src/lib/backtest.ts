import { createLogger } from "@/lib/logger";
import { formatDrawdown, formatDuration, formatPercent } from "@/lib/format";
import {
  analyzeDrawdown,
  buildDrawdownPoints,
  calculateAnnualReturns,
  calculateXirr,
  resampleMonthly
} from "@/lib/metrics";
import { findFirstValidDate, getTradingDatesFrom } from "@/lib/price-table";
import { simulatePortfolio } from "@/lib/simulator";
import {
  CASH_SYMBOL,
  type BacktestRequest,
  type BacktestResult,
  type CashFlow,
  type PortfolioDefinition,
  type PortfolioResult,
  type PriceTable,
  type SimulationRun,
  type SkippedPortfolio
} from "@/lib/types";
import { loadPriceTable } from "@/lib/yahoo";

const logger = createLogger("Backtest");

export class BacktestDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BacktestDataError";
  }
}

export type PriceLoader = (symbols: string[], startDate: string, endDate: string) => Promise<PriceTable>;

export function collectSymbols(portfolios: PortfolioDefinition[]): {
  symbols: string[];
  usesCash: boolean;
} {
  const symbols = new Set<string>();
  let usesCash = false;

  for (const portfolio of portfolios) {
    for (const asset of portfolio.assets) {
      const symbol = asset.symbol.trim().toUpperCase();
      if (symbol === CASH_SYMBOL) {
        usesCash = true;
      } else if (symbol.length > 0) {
        symbols.add(symbol);
      }
    }
  }

  return { symbols: [...symbols].sort(), usesCash };
}

/**
 * The batch starts on the latest of the symbols' first valid dates, so every
 * symbol with data has a price from the first simulated day on.
 */
export function resolveCommonStart(
  table: PriceTable,
  symbols: string[]
): { commonStartDate: string | null; firstValidDates: Record<string, string> } {
  const firstValidDates: Record<string, string> = {};
  let commonStartDate: string | null = null;

  for (const symbol of symbols) {
    const firstValid = findFirstValidDate(table, symbol);
    if (!firstValid) {
      continue;
    }

    firstValidDates[symbol] = firstValid;
    if (commonStartDate === null || firstValid > commonStartDate) {
      commonStartDate = firstValid;
    }
  }

  return { commonStartDate, firstValidDates };
}

function buildPortfolioResult(definition: PortfolioDefinition, run: SimulationRun): PortfolioResult {
  const { history } = run;
  const firstDay = history[0];
  const lastDay = history[history.length - 1];
  const finalValue = lastDay.totalValue;

  const cashFlows: CashFlow[] =
    finalValue > 0 ? [...run.cashFlows, { date: lastDay.date, amount: finalValue }] : [...run.cashFlows];
  const xirr = calculateXirr(cashFlows);

  const maxDrawdown = analyzeDrawdown(
    history.map((day) => day.date),
    history.map((day) => day.totalValue)
  );

  return {
    summary: {
      name: definition.name,
      durationDescription: formatDuration(firstDay.date, lastDay.date),
      totalInvested: run.totalInvested,
      finalValue,
      totalWithdrawn: run.totalWithdrawn,
      totalGainLoss: finalValue + run.totalWithdrawn - run.totalInvested,
      xirr,
      xirrPercent: formatPercent(xirr),
      maxDrawdown,
      maxDrawdownDescription: formatDrawdown(maxDrawdown)
    },
    history,
    monthly: resampleMonthly(history),
    annualReturns: calculateAnnualReturns(history),
    drawdown: buildDrawdownPoints(history),
    cashFlows
  };
}

/**
 * Runs every portfolio of the request over the shared price table. Throws
 * BacktestDataError when the batch cannot start; a portfolio that cannot be
 * simulated is reported in `skipped` instead.
 */
export function runBacktest(request: BacktestRequest, table: PriceTable): BacktestResult {
  const { symbols, usesCash } = collectSymbols(request.portfolios);
  if (symbols.length === 0 && !usesCash) {
    throw new BacktestDataError("No valid asset in the requested portfolios");
  }

  const { commonStartDate, firstValidDates } = resolveCommonStart(table, symbols);
  if (commonStartDate === null) {
    throw new BacktestDataError(
      "No valid price data found. Check the symbols or choose a period with trading data."
    );
  }

  logger.info("Resolved common start date", { commonStartDate, firstValidDates });

  const warnings: string[] = [];
  if (request.initialCapital === 0 && request.monthlyContribution === 0) {
    warnings.push("Initial capital and monthly contribution are both 0; results will be empty.");
  }
  for (const symbol of symbols) {
    if (!firstValidDates[symbol]) {
      warnings.push(`No price data found for ${symbol}; it is held as uninvested cash.`);
    }
  }

  const tradingDays = getTradingDatesFrom(table, commonStartDate);
  const settings = {
    initialCapital: request.initialCapital,
    monthlyContribution: request.monthlyContribution,
    rebalance: request.rebalance
  };

  const portfolios: PortfolioResult[] = [];
  const skipped: SkippedPortfolio[] = [];

  for (const definition of request.portfolios) {
    const run = simulatePortfolio(definition, settings, table, tradingDays);
    if (!run.ok) {
      logger.warn("Skipping portfolio", { name: definition.name, reason: run.error });
      skipped.push({ name: definition.name, reason: run.error });
      continue;
    }
    portfolios.push(buildPortfolioResult(definition, run.value));
  }

  return { commonStartDate, firstValidDates, portfolios, skipped, warnings };
}

export async function executeBacktest(
  request: BacktestRequest,
  loadPrices: PriceLoader = loadPriceTable
): Promise<BacktestResult> {
  const { symbols, usesCash } = collectSymbols(request.portfolios);
  if (symbols.length === 0 && !usesCash) {
    throw new BacktestDataError("No valid asset in the requested portfolios");
  }

  const table = await loadPrices(symbols, request.startDate, request.endDate);
  if (table.dates.length === 0) {
    throw new BacktestDataError("No price data returned for the requested period");
  }

  return runBacktest(request, table);
}
