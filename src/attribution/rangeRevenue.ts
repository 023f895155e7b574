import type { Conversion } from "../tracking/types";
import { addCounts, byRevenueDesc, emptyCounts, withRates } from "./aggregateHelpers";
import type { CampaignRevenue, OfferPerformance } from "./types";

type Counts = ReturnType<typeof emptyCounts>;

const conversionCounts = (conv: Conversion): Counts => ({
  clicks: 0,
  conversions: 1,
  revenue: conv.revenue,
  payout: conv.payout,
});

/**
 * Campaign rows restricted to a set of conversions. Only campaigns with at
 * least one conversion survive; clicks are not dated per campaign and read 0.
 */
export function buildRangeCampaignRevenue(campaigns: CampaignRevenue[], conversions: Conversion[]): CampaignRevenue[] {
  const byMailing = new Map<string, Counts>();
  for (const conv of conversions) {
    if (!conv.mailingId) continue;
    const counts = byMailing.get(conv.mailingId) ?? emptyCounts();
    addCounts(counts, conversionCounts(conv));
    byMailing.set(conv.mailingId, counts);
  }

  const rows: CampaignRevenue[] = [];
  for (const campaign of campaigns) {
    const counts = byMailing.get(campaign.mailingId);
    if (!counts) continue;
    const row = withRates({ ...campaign, ...counts });
    row.ecpm = row.delivered > 0 ? (row.revenue / row.delivered) * 1000 : 0;
    row.rpm = row.sent > 0 ? (row.revenue / row.sent) * 1000 : 0;
    row.revenuePerOpen = row.uniqueOpens > 0 ? row.revenue / row.uniqueOpens : 0;
    rows.push(row);
  }
  return rows.sort(byRevenueDesc);
}

/** Offer totals from conversions alone. */
export function rangeOfferPerformance(conversions: Conversion[]): OfferPerformance[] {
  const offers = new Map<string, OfferPerformance>();
  for (const conv of conversions) {
    const offer = offers.get(conv.offerId) ?? {
      offerId: conv.offerId,
      offerName: conv.offerName,
      ...emptyCounts(),
      conversionRate: 0,
      epc: 0,
    };
    addCounts(offer, conversionCounts(conv));
    offers.set(conv.offerId, offer);
  }
  return [...offers.values()].map((offer) => withRates(offer)).sort(byRevenueDesc);
}
