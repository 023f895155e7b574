import { isoWeekKey, monthKey } from "../lib/dates";
import { addCounts, emptyCounts, withRates } from "./aggregateHelpers";
import type { DailyPerformance, PeriodPerformance, PeriodType } from "./types";

const PERIOD_KEYS: Record<PeriodType, (dateIso: string) => string> = {
  weekly: isoWeekKey,
  monthly: monthKey,
};

/** Weekly (`2026-W05`) or monthly (`2026-01`) totals, newest first. */
export function rollupDailyPerformance(daily: DailyPerformance[], periodType: PeriodType): PeriodPerformance[] {
  const toKey = PERIOD_KEYS[periodType];
  const periods = new Map<string, PeriodPerformance>();
  for (const day of daily) {
    const period = toKey(day.date);
    let row = periods.get(period);
    if (!row) {
      row = { period, periodType, startDate: day.date, endDate: day.date, ...emptyCounts(), conversionRate: 0, epc: 0 };
      periods.set(period, row);
    }
    addCounts(row, day);
    if (day.date < row.startDate) row.startDate = day.date;
    if (day.date > row.endDate) row.endDate = day.date;
  }
  return [...periods.values()].map((row) => withRates(row)).sort((a, b) => b.period.localeCompare(a.period));
}
