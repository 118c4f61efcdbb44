import { daysBetween, getYear, toMonthKey, toUtcDate } from "@/lib/calendar";
import type {
  AnnualReturnPoint,
  CashFlow,
  DrawdownAnalysis,
  DrawdownPoint,
  MonthlyPoint,
  SimulationDay
} from "@/lib/types";

const XIRR_INITIAL_GUESS = 0.1;
const XIRR_MAX_ITERATIONS = 50;
const XIRR_TOLERANCE = 1e-10;
const XIRR_MIN_RATE = -1;
const XIRR_MAX_RATE = 10;
const DAYS_PER_YEAR = 365;

export type XirrSolution =
  | { converged: true; rate: number; iterations: number }
  | { converged: false; reason: "insufficient-flows" | "flat-derivative" | "max-iterations" };

export function calculateDrawdownSeries(values: number[]): number[] {
  if (values.length === 0) {
    return [];
  }

  let peak = values[0];
  return values.map((value) => {
    if (value > peak) {
      peak = value;
    }
    return peak === 0 ? 0 : value / peak - 1;
  });
}

export function buildDrawdownPoints(history: SimulationDay[]): DrawdownPoint[] {
  const series = calculateDrawdownSeries(history.map((day) => day.totalValue));
  return history.map((day, index) => ({ date: day.date, drawdown: series[index] ?? 0 }));
}

/**
 * Locates the deepest drawdown together with the peak it fell from and the
 * first date the value climbed back to that peak.
 */
export function analyzeDrawdown(dates: string[], values: number[]): DrawdownAnalysis {
  const noDrawdown: DrawdownAnalysis = {
    maxDrawdown: 0,
    peakDate: null,
    troughDate: null,
    recoveryDate: null,
    recoveryDays: null
  };

  if (values.length === 0) {
    return noDrawdown;
  }

  const runningMax: number[] = [];
  let peak = values[0];
  for (const value of values) {
    peak = Math.max(peak, value);
    runningMax.push(peak);
  }

  let troughIndex = -1;
  let maxDrawdown = 0;
  values.forEach((value, index) => {
    const drawdown = runningMax[index] === 0 ? 0 : (value - runningMax[index]) / runningMax[index];
    if (drawdown < maxDrawdown) {
      maxDrawdown = drawdown;
      troughIndex = index;
    }
  });

  if (troughIndex < 0) {
    return noDrawdown;
  }

  const peakValue = runningMax[troughIndex];
  const peakIndex = runningMax.findIndex((value) => value === peakValue);

  let recoveryIndex = -1;
  for (let index = troughIndex; index < values.length; index += 1) {
    if (values[index] >= peakValue) {
      recoveryIndex = index;
      break;
    }
  }

  const troughDate = dates[troughIndex];
  const recoveryDate = recoveryIndex >= 0 ? dates[recoveryIndex] : null;

  return {
    maxDrawdown,
    peakDate: dates[peakIndex],
    troughDate,
    recoveryDate,
    recoveryDays: recoveryDate ? daysBetween(troughDate, recoveryDate) : null
  };
}

function clampRate(rate: number): number {
  return Math.max(XIRR_MIN_RATE, Math.min(XIRR_MAX_RATE, rate));
}

/**
 * Newton iteration on NPV(r) = sum(amount / (1 + r) ^ (days / 365)) = 0,
 * with days counted from the earliest flow.
 */
export function solveXirr(flows: CashFlow[]): XirrSolution {
  if (flows.length < 2) {
    return { converged: false, reason: "insufficient-flows" };
  }

  const origin = Math.min(...flows.map((flow) => toUtcDate(flow.date).getTime()));
  const terms = flows.map((flow) => ({
    amount: flow.amount,
    years: (toUtcDate(flow.date).getTime() - origin) / (24 * 60 * 60 * 1000) / DAYS_PER_YEAR
  }));

  let rate = XIRR_INITIAL_GUESS;

  for (let iteration = 1; iteration <= XIRR_MAX_ITERATIONS; iteration += 1) {
    let npv = 0;
    let derivative = 0;
    for (const term of terms) {
      const discount = Math.pow(1 + rate, term.years);
      npv += term.amount / discount;
      derivative -= (term.years * term.amount) / (discount * (1 + rate));
    }

    if (derivative === 0 || !Number.isFinite(derivative) || !Number.isFinite(npv)) {
      return { converged: false, reason: "flat-derivative" };
    }

    let next = rate - npv / derivative;
    if (next <= XIRR_MIN_RATE) {
      next = (rate + XIRR_MIN_RATE) / 2;
    }

    if (Math.abs(next - rate) < XIRR_TOLERANCE) {
      return { converged: true, rate: clampRate(next), iterations: iteration };
    }
    rate = next;
  }

  return { converged: false, reason: "max-iterations" };
}

export function calculateXirr(flows: CashFlow[]): number {
  const solution = solveXirr(flows);
  return solution.converged ? solution.rate : 0;
}

export function calculateYearFraction(startDateIso: string, endDateIso: string): number {
  const start = toUtcDate(startDateIso).getTime();
  const end = toUtcDate(endDateIso).getTime();
  if (end <= start) {
    return 0;
  }

  const msPerYear = 365.25 * 24 * 60 * 60 * 1000;
  return (end - start) / msPerYear;
}

/**
 * Balance-based calendar-year returns: last value of the year over the last
 * value of the prior year (first value of the year for the first year).
 * Withdrawals are not added back.
 */
export function calculateAnnualReturns(history: SimulationDay[]): AnnualReturnPoint[] {
  const byYear = new Map<number, number[]>();
  for (const day of history) {
    const year = getYear(day.date);
    const values = byYear.get(year) ?? [];
    values.push(day.totalValue);
    byYear.set(year, values);
  }

  const points: AnnualReturnPoint[] = [];
  let previousYearEnd: number | null = null;

  for (const [year, values] of byYear) {
    const endValue = values[values.length - 1];
    const startValue = previousYearEnd ?? values[0];
    points.push({ year, return: startValue > 0 ? endValue / startValue - 1 : 0 });
    previousYearEnd = endValue;
  }

  return points;
}

export function resampleMonthly(history: SimulationDay[]): MonthlyPoint[] {
  const months = new Map<string, MonthlyPoint>();

  for (const day of history) {
    const month = toMonthKey(day.date);
    const existing = months.get(month);
    months.set(month, {
      month,
      date: day.date,
      totalValue: day.totalValue,
      investedCapital: day.investedCapitalCumulative,
      withdrawal: (existing?.withdrawal ?? 0) + day.withdrawalAmount
    });
  }

  return [...months.values()];
}
