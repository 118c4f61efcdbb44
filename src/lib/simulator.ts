import { buildTradingSchedules, getYear } from "@/lib/calendar";
import { resolveAdjustedPrice } from "@/lib/price-resolver";
import { err, ok, type Result } from "@/lib/result";
import {
  CASH_SYMBOL,
  type CashFlow,
  type HoldingState,
  type PortfolioDefinition,
  type PriceTable,
  type SimulationDay,
  type SimulationRun,
  type SimulationSettings
} from "@/lib/types";

const MONTHS_PER_YEAR = 12;

export type NormalizedAllocation = {
  symbol: string;
  weight: number;
};

export type SimulationState = {
  cashAccount: number;
  holdings: Map<string, HoldingState>;
  totalInvested: number;
  currentYear: number | null;
  yearsElapsed: number;
  annualWithdrawalBudget: number;
  cumulativeWithdrawal: number;
};

type WithdrawalPolicy = {
  enabled: boolean;
  rate: number;
  inflation: number;
  startYear: number;
};

function isCash(symbol: string): boolean {
  return symbol === CASH_SYMBOL;
}

function normalizeAllocations(definition: PortfolioDefinition): NormalizedAllocation[] {
  return definition.assets.map((asset) => ({
    symbol: asset.symbol.toUpperCase(),
    weight: asset.weightPercent / 100
  }));
}

function toWithdrawalPolicy(definition: PortfolioDefinition): WithdrawalPolicy {
  return {
    enabled: definition.withdrawalEnabled,
    rate: definition.withdrawalRatePercent / 100,
    inflation: definition.inflationRatePercent / 100,
    startYear: Math.trunc(definition.withdrawalStartYear)
  };
}

function adjustedOpen(table: PriceTable, day: string, symbol: string): number {
  return resolveAdjustedPrice(table, day, symbol).adjustedOpen;
}

function adjustedClose(table: PriceTable, day: string, symbol: string): number {
  return resolveAdjustedPrice(table, day, symbol).adjustedClose;
}

export function computePortfolioValue(
  state: Pick<SimulationState, "cashAccount" | "holdings">,
  table: PriceTable,
  day: string
): number {
  let value = state.cashAccount;
  for (const [symbol, holding] of state.holdings) {
    if (isCash(symbol)) {
      value += holding.cashInAssetCurrency;
    } else {
      value += holding.shares * adjustedClose(table, day, symbol) + holding.cashInAssetCurrency;
    }
  }
  return value;
}

function advanceYear(
  state: SimulationState,
  policy: WithdrawalPolicy,
  table: PriceTable,
  day: string
): void {
  const year = getYear(day);
  if (year === state.currentYear) {
    return;
  }

  if (state.currentYear !== null) {
    state.yearsElapsed += 1;
    if (state.annualWithdrawalBudget > 0) {
      state.annualWithdrawalBudget *= 1 + policy.inflation;
    }
  }
  state.currentYear = year;

  if (
    policy.enabled &&
    state.yearsElapsed + 1 >= policy.startYear &&
    state.annualWithdrawalBudget === 0
  ) {
    state.annualWithdrawalBudget = computePortfolioValue(state, table, day) * policy.rate;
  }
}

/**
 * Draws one month of the annual budget: portfolio cash first, then each
 * holding's cash bucket, then whole shares sold at the open. Returns the
 * amount actually drawn.
 */
function applyWithdrawal(state: SimulationState, table: PriceTable, day: string): number {
  const target = state.annualWithdrawalBudget / MONTHS_PER_YEAR;

  if (state.cashAccount >= target) {
    state.cashAccount -= target;
    return target;
  }

  let need = target - state.cashAccount;
  let withdrawn = state.cashAccount;
  state.cashAccount = 0;

  for (const [symbol, holding] of state.holdings) {
    if (need <= 0) {
      break;
    }

    if (holding.cashInAssetCurrency >= need) {
      holding.cashInAssetCurrency -= need;
      withdrawn += need;
      need = 0;
      break;
    }

    need -= holding.cashInAssetCurrency;
    withdrawn += holding.cashInAssetCurrency;
    holding.cashInAssetCurrency = 0;

    if (isCash(symbol)) {
      continue;
    }

    const price = adjustedOpen(table, day, symbol);
    if (price <= 0) {
      continue;
    }

    const sharesToSell = Math.min(Math.ceil(need / price), Math.floor(holding.shares));
    if (sharesToSell <= 0) {
      continue;
    }

    const proceeds = sharesToSell * price;
    holding.shares -= sharesToSell;

    if (proceeds >= need) {
      state.cashAccount += proceeds - need;
      withdrawn += need;
      need = 0;
    } else {
      withdrawn += proceeds;
      need -= proceeds;
    }
  }

  return withdrawn;
}

/**
 * Single-pass rebalance against one valuation snapshot taken at the open:
 * every overweight position is sold down into portfolio cash before any
 * underweight position is bought.
 */
export function rebalanceHoldings(
  state: SimulationState,
  allocations: NormalizedAllocation[],
  table: PriceTable,
  day: string
): void {
  const prices = new Map<string, number>();
  const currentValues = new Map<string, number>();
  let totalValue = state.cashAccount;

  for (const [symbol, holding] of state.holdings) {
    let value = holding.cashInAssetCurrency;
    if (!isCash(symbol)) {
      const price = adjustedOpen(table, day, symbol);
      prices.set(symbol, price);
      value += holding.shares * price;
    }
    currentValues.set(symbol, value);
    totalValue += value;
  }

  for (const { symbol, weight } of allocations) {
    const holding = state.holdings.get(symbol);
    const excess = (currentValues.get(symbol) ?? 0) - totalValue * weight;
    if (!holding || excess <= 0) {
      continue;
    }

    if (isCash(symbol)) {
      const amount = Math.min(excess, holding.cashInAssetCurrency);
      holding.cashInAssetCurrency -= amount;
      state.cashAccount += amount;
      continue;
    }

    const price = prices.get(symbol) ?? 0;
    if (price <= 0) {
      continue;
    }

    const shares = Math.min(Math.floor(excess / price), holding.shares);
    if (shares > 0) {
      holding.shares -= shares;
      state.cashAccount += shares * price;
    }
  }

  for (const { symbol, weight } of allocations) {
    const holding = state.holdings.get(symbol);
    const deficit = totalValue * weight - (currentValues.get(symbol) ?? 0);
    if (!holding || deficit <= 0) {
      continue;
    }

    const amount = Math.min(deficit, state.cashAccount);
    if (isCash(symbol)) {
      holding.cashInAssetCurrency += amount;
      state.cashAccount -= amount;
      continue;
    }

    const price = prices.get(symbol) ?? 0;
    if (price <= 0) {
      continue;
    }

    const shares = Math.floor(amount / price);
    if (shares > 0) {
      holding.shares += shares;
      state.cashAccount -= shares * price;
    }
  }
}

/**
 * Splits the whole portfolio cash pot by target weight into each holding's
 * cash bucket, then converts buckets into whole shares at the open. The
 * remainder stays in the holding's bucket.
 */
function allocateCash(
  state: SimulationState,
  allocations: NormalizedAllocation[],
  table: PriceTable,
  day: string
): void {
  const pot = state.cashAccount;
  state.cashAccount = 0;

  for (const { symbol, weight } of allocations) {
    const holding = state.holdings.get(symbol);
    if (!holding) {
      continue;
    }

    holding.cashInAssetCurrency += pot * weight;
    if (isCash(symbol)) {
      continue;
    }

    const price = adjustedOpen(table, day, symbol);
    if (price <= 0) {
      continue;
    }

    const shares = Math.floor(holding.cashInAssetCurrency / price);
    if (shares > 0) {
      holding.shares += shares;
      holding.cashInAssetCurrency -= shares * price;
    }
  }
}

/**
 * Walks the trading dates in order, applying the year update, withdrawal,
 * January rebalance and monthly contribution before valuing the day at the
 * adjusted close.
 */
export function simulatePortfolio(
  definition: PortfolioDefinition,
  settings: SimulationSettings,
  table: PriceTable,
  tradingDays: string[]
): Result<SimulationRun> {
  if (tradingDays.length === 0) {
    return err(`No trading days available for portfolio "${definition.name}"`);
  }

  const allocations = normalizeAllocations(definition);
  const policy = toWithdrawalPolicy(definition);
  const { buyDays, rebalanceDays } = buildTradingSchedules(tradingDays);

  const state: SimulationState = {
    cashAccount: settings.initialCapital,
    holdings: new Map(
      allocations.map((allocation) => [allocation.symbol, { shares: 0, cashInAssetCurrency: 0 }])
    ),
    totalInvested: settings.initialCapital,
    currentYear: null,
    yearsElapsed: 0,
    annualWithdrawalBudget: 0,
    cumulativeWithdrawal: 0
  };

  const cashFlows: CashFlow[] = [];
  if (settings.initialCapital > 0) {
    cashFlows.push({ date: tradingDays[0], amount: -settings.initialCapital });
  }

  const history: SimulationDay[] = [];

  for (const day of tradingDays) {
    advanceYear(state, policy, table, day);

    const isBuyDay = buyDays.has(day);
    let withdrawalAmount = 0;

    if (isBuyDay && policy.enabled && state.annualWithdrawalBudget > 0) {
      withdrawalAmount = applyWithdrawal(state, table, day);
      state.cumulativeWithdrawal += withdrawalAmount;
      if (withdrawalAmount > 0) {
        cashFlows.push({ date: day, amount: withdrawalAmount });
      }
    }

    if (isBuyDay && settings.rebalance && rebalanceDays.has(day) && state.yearsElapsed > 0) {
      rebalanceHoldings(state, allocations, table, day);
    }

    if (isBuyDay) {
      if (settings.monthlyContribution > 0) {
        state.cashAccount += settings.monthlyContribution;
        state.totalInvested += settings.monthlyContribution;
        cashFlows.push({ date: day, amount: -settings.monthlyContribution });
      }
      allocateCash(state, allocations, table, day);
    }

    history.push({
      date: day,
      totalValue: computePortfolioValue(state, table, day),
      investedCapitalCumulative: state.totalInvested,
      withdrawalAmount
    });
  }

  return ok({
    history,
    cashFlows,
    totalInvested: state.totalInvested,
    totalWithdrawn: state.cumulativeWithdrawal
  });
}
