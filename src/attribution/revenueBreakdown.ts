import { isCpmOffer } from "../identifiers/offers";
import type { Conversion } from "../tracking/types";
import { byDateDesc } from "./aggregateHelpers";
import type { DailyRevenueBreakdown, OfferPerformance, RevenueBreakdown, RevenueCategory } from "./types";

const emptyCategory = (): RevenueCategory => ({
  offerCount: 0,
  clicks: 0,
  conversions: 0,
  revenue: 0,
  payout: 0,
  percentage: 0,
});

/** CPM against everything else, from offer totals, with a daily trend from conversions. */
export function calculateRevenueBreakdown(offers: OfferPerformance[], conversions: Conversion[]): RevenueBreakdown {
  const cpm = emptyCategory();
  const nonCpm = emptyCategory();
  for (const offer of offers) {
    const category = isCpmOffer(offer.offerName) ? cpm : nonCpm;
    category.offerCount += 1;
    category.clicks += offer.clicks;
    category.conversions += offer.conversions;
    category.revenue += offer.revenue;
    category.payout += offer.payout;
  }
  const total = cpm.revenue + nonCpm.revenue;
  if (total > 0) {
    cpm.percentage = (cpm.revenue / total) * 100;
    nonCpm.percentage = (nonCpm.revenue / total) * 100;
  }

  const daily = new Map<string, DailyRevenueBreakdown>();
  for (const conv of conversions) {
    if (!conv.date) continue;
    const day = daily.get(conv.date) ?? {
      date: conv.date,
      cpmRevenue: 0,
      nonCpmRevenue: 0,
      cpmConversions: 0,
      nonCpmConversions: 0,
    };
    if (isCpmOffer(conv.offerName)) {
      day.cpmRevenue += conv.revenue;
      day.cpmConversions += 1;
    } else {
      day.nonCpmRevenue += conv.revenue;
      day.nonCpmConversions += 1;
    }
    daily.set(conv.date, day);
  }

  return { cpm, nonCpm, dailyTrend: [...daily.values()].sort(byDateDesc) };
}
