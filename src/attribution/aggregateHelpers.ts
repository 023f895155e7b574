import type { CampaignRevenue, PerformanceTotals } from "./types";

type Counts = Pick<PerformanceTotals, "clicks" | "conversions" | "revenue" | "payout">;

export const emptyCounts = (): Counts => ({ clicks: 0, conversions: 0, revenue: 0, payout: 0 });

export function addCounts(target: Counts, source: Counts): void {
  target.clicks += source.clicks;
  target.conversions += source.conversions;
  target.revenue += source.revenue;
  target.payout += source.payout;
}

export function withRates<T extends Counts>(row: T): T & Pick<PerformanceTotals, "conversionRate" | "epc"> {
  const hasClicks = row.clicks > 0;
  return {
    ...row,
    conversionRate: hasClicks ? row.conversions / row.clicks : 0,
    epc: hasClicks ? row.revenue / row.clicks : 0,
  };
}

export const byRevenueDesc = (a: { revenue: number }, b: { revenue: number }): number => b.revenue - a.revenue;

export const byDateDesc = (a: { date: string }, b: { date: string }): number => b.date.localeCompare(a.date);

export const byDateAsc = (a: { date: string }, b: { date: string }): number => a.date.localeCompare(b.date);

export function lastN<T>(items: T[], count: number): T[] {
  return items.length > count ? items.slice(items.length - count) : items.slice();
}

type CampaignSeed = Pick<
  CampaignRevenue,
  "mailingId" | "campaignName" | "propertyCode" | "propertyName" | "offerId" | "offerName"
>;

/** A tracking-only campaign row; sending-platform fields are filled by enrichment. */
export function newCampaign(seed: CampaignSeed): CampaignRevenue {
  return {
    ...seed,
    ...emptyCounts(),
    conversionRate: 0,
    epc: 0,
    audienceSize: 0,
    sent: 0,
    delivered: 0,
    opens: 0,
    uniqueOpens: 0,
    emailClicks: 0,
    sendingDomain: "",
    espName: "",
    sendingLinked: false,
    rpm: 0,
    ecpm: 0,
    revenuePerOpen: 0,
  };
}
