export const CASH_SYMBOL = "CASH0";

export type PriceField = "open" | "close" | "adjustedClose";

export interface PriceBar {
  date: string;
  open: number | null;
  close: number | null;
  adjustedClose: number | null;
}

export type SymbolSeries = Record<PriceField, (number | null)[]>;

/**
 * Calendar-indexed price table shared by every portfolio in a batch.
 * `dates` is strictly increasing and each series is aligned to it.
 */
export interface PriceTable {
  dates: string[];
  dateIndex: Map<string, number>;
  series: Map<string, SymbolSeries>;
}

export interface AdjustedPrice {
  adjustedClose: number;
  adjustedOpen: number;
}

export interface AssetAllocation {
  symbol: string;
  weightPercent: number;
}

export interface PortfolioDefinition {
  name: string;
  assets: AssetAllocation[];
  withdrawalEnabled: boolean;
  withdrawalRatePercent: number;
  inflationRatePercent: number;
  withdrawalStartYear: number;
}

export interface HoldingState {
  shares: number;
  cashInAssetCurrency: number;
}

export interface SimulationDay {
  date: string;
  totalValue: number;
  investedCapitalCumulative: number;
  withdrawalAmount: number;
}

export interface CashFlow {
  date: string;
  amount: number;
}

export interface SimulationSettings {
  initialCapital: number;
  monthlyContribution: number;
  rebalance: boolean;
}

export interface SimulationRun {
  history: SimulationDay[];
  cashFlows: CashFlow[];
  totalInvested: number;
  totalWithdrawn: number;
}

export interface DrawdownAnalysis {
  maxDrawdown: number;
  peakDate: string | null;
  troughDate: string | null;
  recoveryDate: string | null;
  recoveryDays: number | null;
}

export interface DrawdownPoint {
  date: string;
  drawdown: number;
}

export interface MonthlyPoint {
  month: string;
  date: string;
  totalValue: number;
  investedCapital: number;
  withdrawal: number;
}

export interface AnnualReturnPoint {
  year: number;
  return: number;
}

export interface PortfolioSummary {
  name: string;
  durationDescription: string;
  totalInvested: number;
  finalValue: number;
  totalWithdrawn: number;
  totalGainLoss: number;
  xirr: number;
  xirrPercent: string;
  maxDrawdown: DrawdownAnalysis;
  maxDrawdownDescription: string;
}

export interface PortfolioResult {
  summary: PortfolioSummary;
  history: SimulationDay[];
  monthly: MonthlyPoint[];
  annualReturns: AnnualReturnPoint[];
  drawdown: DrawdownPoint[];
  cashFlows: CashFlow[];
}

export interface SkippedPortfolio {
  name: string;
  reason: string;
}

export interface BacktestRequest {
  startDate: string;
  endDate: string;
  initialCapital: number;
  monthlyContribution: number;
  rebalance: boolean;
  portfolios: PortfolioDefinition[];
}

export interface BacktestResult {
  commonStartDate: string;
  firstValidDates: Record<string, string>;
  portfolios: PortfolioResult[];
  skipped: SkippedPortfolio[];
  warnings: string[];
}
