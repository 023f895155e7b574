import type { SendingCampaign } from "../sources/types";
import { byRevenueDesc } from "./aggregateHelpers";
import {
  aggregateOfferAttributionToEsps,
  attributeOfferRevenueToEsps,
  buildOfferEspVolumeMap,
  normalizeEspName,
} from "./offerEspVolume";
import type {
  CampaignRevenue,
  EspRevenuePerformance,
  OfferPerformance,
  ReconciliationGap,
  ReconciliationMethod,
} from "./types";

const CENT = 0.01;
export const UNATTRIBUTED_ESP = "Unattributed";

export type EspRevenueResult = {
  esps: EspRevenuePerformance[];
  reconciliation: ReconciliationGap;
};

function newEsp(espName: string): EspRevenuePerformance {
  return {
    espName,
    campaignCount: 0,
    totalSent: 0,
    totalDelivered: 0,
    totalOpens: 0,
    clicks: 0,
    conversions: 0,
    revenue: 0,
    payout: 0,
    percentage: 0,
    avgEcpm: 0,
    conversionRate: 0,
    epc: 0,
  };
}

const sumRevenue = (esps: Iterable<EspRevenuePerformance>): number => {
  let total = 0;
  for (const esp of esps) total += esp.revenue;
  return total;
};

/**
 * Revenue per ESP. Sending-linked campaigns give the conversion-based split;
 * the offer-level total is authoritative, and whatever the campaigns miss is
 * spread by offer send volume, then by scaling, then into an explicit
 * "Unattributed" entry, so the ESP rows always add up to the offer total.
 */
export function calculateEspRevenue(
  campaigns: CampaignRevenue[],
  offers: OfferPerformance[],
  sendingCampaigns: SendingCampaign[]
): EspRevenueResult {
  const esps = new Map<string, EspRevenuePerformance>();
  let conversionBasedTotal = 0;

  for (const campaign of campaigns) {
    if (!campaign.sendingLinked) continue;
    const name = normalizeEspName(campaign.espName);
    const esp = esps.get(name) ?? newEsp(name);
    esp.campaignCount += 1;
    esp.totalSent += campaign.sent;
    esp.totalDelivered += campaign.delivered;
    esp.totalOpens += campaign.uniqueOpens;
    esp.clicks += campaign.clicks;
    esp.conversions += campaign.conversions;
    esp.revenue += campaign.revenue;
    esp.payout += campaign.payout;
    esps.set(name, esp);
    conversionBasedTotal += campaign.revenue;
  }

  const authoritativeTotal = offers.length
    ? offers.reduce((total, offer) => total + offer.revenue, 0)
    : conversionBasedTotal;
  const gap = authoritativeTotal - conversionBasedTotal;
  let method: ReconciliationMethod = "none";
  let unattributedRevenue = 0;

  if (gap > CENT && sendingCampaigns.length) {
    console.log(
      `ESP revenue: $${gap.toFixed(2)} not linked to campaigns (total $${authoritativeTotal.toFixed(2)}, campaign-based $${conversionBasedTotal.toFixed(2)})`
    );
    const offerBased = aggregateOfferAttributionToEsps(
      attributeOfferRevenueToEsps(offers, buildOfferEspVolumeMap(sendingCampaigns))
    );
    let offerBasedTotal = 0;
    for (const esp of offerBased.values()) offerBasedTotal += esp.revenue;

    if (offerBasedTotal > 0) {
      const scale = gap / offerBasedTotal;
      for (const [name, share] of offerBased) {
        const existing = esps.get(name);
        const esp = existing ?? { ...newEsp(name), totalSent: share.totalSent };
        esp.revenue += share.revenue * scale;
        esp.payout += share.payout * scale;
        esps.set(name, esp);
      }
      method = "offer_volume";
    }
  }

  const current = sumRevenue(esps.values());
  const residual = authoritativeTotal - current;
  if (Math.abs(residual) > CENT) {
    if (current > 0) {
      const scale = authoritativeTotal / current;
      console.log(`ESP revenue: scaling ESP revenue by ${scale.toFixed(4)} to close $${residual.toFixed(2)}`);
      for (const esp of esps.values()) {
        esp.revenue *= scale;
        esp.payout *= scale;
      }
      if (method === "none") method = "proportional_scale";
    } else {
      console.log(`ESP revenue: no ESP attribution possible, $${residual.toFixed(2)} left unattributed`);
      const entry = esps.get(UNATTRIBUTED_ESP) ?? newEsp(UNATTRIBUTED_ESP);
      entry.revenue += residual;
      entry.payout += offers.reduce((total, offer) => total + offer.payout, 0);
      esps.set(UNATTRIBUTED_ESP, entry);
      method = "unattributed_entry";
      unattributedRevenue = residual;
    }
  }

  const total = sumRevenue(esps.values());
  const rows = [...esps.values()]
    .map((esp) => ({
      ...esp,
      percentage: total > 0 ? (esp.revenue / total) * 100 : 0,
      avgEcpm: esp.totalDelivered > 0 ? (esp.revenue / esp.totalDelivered) * 1000 : 0,
      conversionRate: esp.clicks > 0 ? esp.conversions / esp.clicks : 0,
      epc: esp.clicks > 0 ? esp.revenue / esp.clicks : 0,
    }))
    .sort(byRevenueDesc);

  return {
    esps: rows,
    reconciliation: { authoritativeTotal, conversionBasedTotal, gap, method, unattributedRevenue },
  };
}
