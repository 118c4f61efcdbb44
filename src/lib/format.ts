import { calculateYearFraction } from "@/lib/metrics";
import type { DrawdownAnalysis } from "@/lib/types";

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function formatDuration(startDate: string, endDate: string): string {
  const years = calculateYearFraction(startDate, endDate);
  return `${years.toFixed(1)} years (${startDate.slice(0, 7)} ~ ${endDate.slice(0, 7)})`;
}

export function formatDrawdown(analysis: DrawdownAnalysis): string {
  const { maxDrawdown, peakDate, troughDate, recoveryDate, recoveryDays } = analysis;
  if (maxDrawdown >= 0 || !peakDate || !troughDate) {
    return "0.00%";
  }

  const path = `peak ${peakDate.slice(0, 7)} → trough ${troughDate.slice(0, 7)}`;
  if (recoveryDate) {
    return `${formatPercent(maxDrawdown)} (${path} → recovered ${recoveryDate.slice(0, 7)}, ${recoveryDays ?? 0} days)`;
  }
  return `${formatPercent(maxDrawdown)} (${path}, not recovered)`;
}
