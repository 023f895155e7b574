import { byRevenueDesc } from "./aggregateHelpers";
import type { DataPartnerPerformance, OfferPartnerEntry, OfferWithPartnerBreakdown } from "./types";

type OfferAccum = {
  offerId: string;
  offerName: string;
  isCpm: boolean;
  partners: Map<string, OfferPartnerEntry>;
};

const byTotalRevenueDesc = (a: OfferWithPartnerBreakdown, b: OfferWithPartnerBreakdown): number =>
  b.totalRevenue - a.totalRevenue;

/** Inverts each partner's offer breakdown into per-offer partner lists. */
export function buildOfferCentricView(partners: DataPartnerPerformance[]): {
  cpmOffers: OfferWithPartnerBreakdown[];
  cpaOffers: OfferWithPartnerBreakdown[];
} {
  const offers = new Map<string, OfferAccum>();
  for (const partner of partners) {
    for (const offer of partner.offerBreakdown) {
      let accum = offers.get(offer.offerId);
      if (!accum) {
        accum = { offerId: offer.offerId, offerName: offer.offerName, isCpm: offer.isCpm, partners: new Map() };
        offers.set(offer.offerId, accum);
      }
      let entry = accum.partners.get(partner.partnerKey);
      if (!entry) {
        entry = {
          partnerKey: partner.partnerKey,
          partnerName: partner.partnerName,
          clicks: 0,
          clickShare: 0,
          conversions: 0,
          revenue: 0,
        };
        accum.partners.set(partner.partnerKey, entry);
      }
      entry.clicks += offer.clicks;
      entry.conversions += offer.conversions;
      entry.revenue += offer.revenue;
    }
  }

  const cpmOffers: OfferWithPartnerBreakdown[] = [];
  const cpaOffers: OfferWithPartnerBreakdown[] = [];
  for (const accum of offers.values()) {
    const entries = [...accum.partners.values()];
    const totalClicks = entries.reduce((sum, entry) => sum + entry.clicks, 0);
    const view: OfferWithPartnerBreakdown = {
      offerId: accum.offerId,
      offerName: accum.offerName,
      isCpm: accum.isCpm,
      totalClicks,
      totalConversions: entries.reduce((sum, entry) => sum + entry.conversions, 0),
      totalRevenue: entries.reduce((sum, entry) => sum + entry.revenue, 0),
      partners: entries
        .map((entry) => ({ ...entry, clickShare: totalClicks > 0 ? (entry.clicks / totalClicks) * 100 : 0 }))
        .sort(byRevenueDesc),
    };
    (accum.isCpm ? cpmOffers : cpaOffers).push(view);
  }

  return { cpmOffers: cpmOffers.sort(byTotalRevenueDesc), cpaOffers: cpaOffers.sort(byTotalRevenueDesc) };
}
