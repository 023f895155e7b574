import { unixSecondsToIsoDate } from "../lib/dates";
import { dateColumnSeconds } from "../tracking/entityRows";
import type { Click, Conversion, EntityReport } from "../tracking/types";
import {
  addCounts,
  byDateDesc,
  byRevenueDesc,
  emptyCounts,
  lastN,
  newCampaign,
  withRates,
} from "./aggregateHelpers";
import { RECENT_LIMIT } from "./aggregateEntityReports";
import type { AttributionMetrics, CampaignRevenue, OfferPerformance, PropertyPerformance } from "./types";

type Counts = ReturnType<typeof emptyCounts>;

function bump<K>(map: Map<K, Counts>, key: K, counts: Counts): void {
  const current = map.get(key) ?? emptyCounts();
  addCounts(current, counts);
  map.set(key, current);
}

/**
 * Aggregates raw clicks and conversions. Used when the date report is
 * unavailable and nothing is cached for it.
 */
export function aggregateClickMetrics(clicks: Click[], conversions: Conversion[], today: string): AttributionMetrics {
  const daily = new Map<string, Counts>();
  const offers = new Map<string, OfferPerformance>();
  const properties = new Map<string, PropertyPerformance>();
  const campaigns = new Map<string, CampaignRevenue>();

  const offerRow = (offerId: string, offerName: string): OfferPerformance => {
    let offer = offers.get(offerId);
    if (!offer) {
      offer = { offerId, offerName, ...emptyCounts(), conversionRate: 0, epc: 0 };
      offers.set(offerId, offer);
    }
    if (!offer.offerName && offerName) offer.offerName = offerName;
    return offer;
  };

  const propertyRow = (code: string, name: string): PropertyPerformance => {
    let property = properties.get(code);
    if (!property) {
      property = {
        propertyCode: code,
        propertyName: name,
        ...emptyCounts(),
        conversionRate: 0,
        epc: 0,
        uniqueOffers: 0,
        isUnattributed: false,
      };
      properties.set(code, property);
    }
    return property;
  };

  const campaignRow = (record: Click | Conversion): CampaignRevenue => {
    let campaign = campaigns.get(record.mailingId);
    if (!campaign) {
      campaign = newCampaign({
        mailingId: record.mailingId,
        campaignName: record.sub1,
        propertyCode: record.propertyCode,
        propertyName: record.propertyName,
        offerId: record.offerId,
        offerName: record.offerName,
      });
      campaigns.set(record.mailingId, campaign);
    }
    return campaign;
  };

  const clickCounts: Counts = { clicks: 1, conversions: 0, revenue: 0, payout: 0 };
  for (const click of clicks) {
    if (click.date) bump(daily, click.date, clickCounts);
    addCounts(offerRow(click.offerId, click.offerName), clickCounts);
    if (click.propertyCode) addCounts(propertyRow(click.propertyCode, click.propertyName), clickCounts);
    if (click.mailingId) addCounts(campaignRow(click), clickCounts);
  }

  const offersByProperty = new Map<string, Set<string>>();
  for (const conv of conversions) {
    const counts: Counts = { clicks: 0, conversions: 1, revenue: conv.revenue, payout: conv.payout };
    if (conv.date) bump(daily, conv.date, counts);
    addCounts(offerRow(conv.offerId, conv.offerName), counts);
    if (conv.propertyCode) {
      addCounts(propertyRow(conv.propertyCode, conv.propertyName), counts);
      const offerIds = offersByProperty.get(conv.propertyCode) ?? new Set<string>();
      offerIds.add(conv.offerId);
      offersByProperty.set(conv.propertyCode, offerIds);
    }
    if (conv.mailingId) {
      const campaign = campaignRow(conv);
      if (!campaign.campaignName) campaign.campaignName = conv.sub1;
      addCounts(campaign, counts);
    }
  }

  return {
    today: { ...(daily.get(today) ?? emptyCounts()) },
    dailyPerformance: [...daily.entries()].map(([date, counts]) => withRates({ date, ...counts })).sort(byDateDesc),
    offerPerformance: [...offers.values()].map((offer) => withRates(offer)).sort(byRevenueDesc),
    propertyPerformance: [...properties.values()]
      .map((property) =>
        withRates({ ...property, uniqueOffers: offersByProperty.get(property.propertyCode)?.size ?? 0 })
      )
      .sort(byRevenueDesc),
    campaignRevenue: [...campaigns.values()].map((campaign) => withRates(campaign)).sort(byRevenueDesc),
    recentClicks: lastN(clicks, RECENT_LIMIT),
    recentConversions: lastN(conversions, RECENT_LIMIT),
  };
}

/**
 * Overwrites today's daily row and totals with the rows of a fresh date
 * report dated today. Rows for other days are ignored, so a report left over
 * from a previous day changes nothing.
 */
export function applyTodayReport(metrics: AttributionMetrics, todayReport: EntityReport, today: string): AttributionMetrics {
  const totals = emptyCounts();
  let matched = false;
  for (const row of todayReport.table) {
    const seconds = dateColumnSeconds(row);
    if (!seconds || unixSecondsToIsoDate(seconds) !== today) continue;
    matched = true;
    const { totalClick, conversions, revenue, payout } = row.reporting;
    addCounts(totals, { clicks: totalClick, conversions, revenue, payout });
  }
  if (!matched) return metrics;

  const todayRow = withRates({ date: today, ...totals });
  return {
    ...metrics,
    today: { ...totals },
    dailyPerformance: [...metrics.dailyPerformance.filter((day) => day.date !== today), todayRow].sort(byDateDesc),
  };
}
