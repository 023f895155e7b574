import { formatMonthLabel, startOfMonthUtc } from "../lib/dates";
import type { Conversion } from "../tracking/types";
import type { MomComparison, PeriodSummary } from "./types";

const changePct = (current: number, previous: number): number =>
  previous > 0 ? ((current - previous) / previous) * 100 : 0;

const summary = (label: string, clicks: number, conversions: number, revenue: number): PeriodSummary => ({
  label,
  clicks,
  conversions,
  revenue,
  cpaRevenue: revenue,
  cpmRevenue: 0,
  volume: 0,
});

/**
 * Partner-attributed conversions, month to date against the previous calendar
 * month. Clicks are only reported for the whole window, so all of them land in
 * the current month.
 */
export function buildMomComparison(conversions: Conversion[], totalClicks: number, now: Date): MomComparison {
  const currentStart = startOfMonthUtc(now).getTime();
  const previousStart = startOfMonthUtc(now, -1).getTime();
  const nowMs = now.getTime();

  let currentConversions = 0;
  let currentRevenue = 0;
  let previousConversions = 0;
  let previousRevenue = 0;

  for (const conv of conversions) {
    if (!conv.dataPartner || !conv.conversionTime) continue;
    const at = Date.parse(conv.conversionTime);
    if (at >= currentStart && at <= nowMs) {
      currentConversions += 1;
      currentRevenue += conv.revenue;
    } else if (at >= previousStart && at < currentStart) {
      previousConversions += 1;
      previousRevenue += conv.revenue;
    }
  }

  const previousClicks = 0;
  return {
    currentMonth: summary(formatMonthLabel(startOfMonthUtc(now)), totalClicks, currentConversions, currentRevenue),
    previousMonth: summary(formatMonthLabel(startOfMonthUtc(now, -1)), previousClicks, previousConversions, previousRevenue),
    revenueChangePct: changePct(currentRevenue, previousRevenue),
    conversionsChangePct: changePct(currentConversions, previousConversions),
    clicksChangePct: changePct(totalClicks, previousClicks),
  };
}
