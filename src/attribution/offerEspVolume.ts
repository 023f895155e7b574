import { tryParseCampaignName } from "../identifiers/parseCampaignName";
import type { SendingCampaign } from "../sources/types";
import type { OfferPerformance } from "./types";

export type OfferEspVolume = {
  offerId: string;
  offerName: string;
  totalSent: number;
  espVolumes: Map<string, number>;
};

export type OfferEspAttribution = {
  espName: string;
  offerId: string;
  offerName: string;
  revenue: number;
  payout: number;
  sentVolume: number;
  /** Share of the offer's sends that went through this ESP, 0-100. */
  percentage: number;
};

export type OfferBasedEsp = {
  espName: string;
  revenue: number;
  payout: number;
  totalSent: number;
};

const ESP_ALIASES: Record<string, string> = {
  "SparkPost Enterprise": "SparkPost",
  "SparkPost Momentum": "SparkPost",
};

export function normalizeEspName(name: string): string {
  if (!name) return "Unknown";
  return ESP_ALIASES[name] ?? name;
}

/** Send volume per ESP for every offer whose id can be read from a campaign name. */
export function buildOfferEspVolumeMap(campaigns: SendingCampaign[]): Map<string, OfferEspVolume> {
  const offers = new Map<string, OfferEspVolume>();
  for (const campaign of campaigns) {
    if (campaign.sent <= 0 || !campaign.espName) continue;
    const parsed = tryParseCampaignName(campaign.name);
    if (!parsed?.offerId) continue;

    let offer = offers.get(parsed.offerId);
    if (!offer) {
      offer = { offerId: parsed.offerId, offerName: parsed.offerName, totalSent: 0, espVolumes: new Map() };
      offers.set(parsed.offerId, offer);
    }
    const espName = normalizeEspName(campaign.espName);
    offer.totalSent += campaign.sent;
    offer.espVolumes.set(espName, (offer.espVolumes.get(espName) ?? 0) + campaign.sent);
  }
  return offers;
}

export function attributeOfferRevenueToEsps(
  offers: OfferPerformance[],
  volumes: Map<string, OfferEspVolume>
): OfferEspAttribution[] {
  const attributions: OfferEspAttribution[] = [];
  for (const offer of offers) {
    const volume = volumes.get(offer.offerId);
    if (!volume || volume.totalSent <= 0) continue;
    for (const [espName, sent] of volume.espVolumes) {
      const share = sent / volume.totalSent;
      attributions.push({
        espName,
        offerId: offer.offerId,
        offerName: offer.offerName,
        revenue: offer.revenue * share,
        payout: offer.payout * share,
        sentVolume: sent,
        percentage: share * 100,
      });
    }
  }
  return attributions;
}

export function aggregateOfferAttributionToEsps(attributions: OfferEspAttribution[]): Map<string, OfferBasedEsp> {
  const esps = new Map<string, OfferBasedEsp>();
  for (const attribution of attributions) {
    const esp = esps.get(attribution.espName) ?? { espName: attribution.espName, revenue: 0, payout: 0, totalSent: 0 };
    esp.revenue += attribution.revenue;
    esp.payout += attribution.payout;
    esp.totalSent += attribution.sentVolume;
    esps.set(attribution.espName, esp);
  }
  return esps;
}
