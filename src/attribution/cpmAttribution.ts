import { PARTNER_GROUP_NAMES } from "../identifiers/catalog";
import { isCpmOffer } from "../identifiers/offers";
import { parseSub2 } from "../identifiers/parseSub2";
import { findColumn, reportRows } from "../tracking/entityRows";
import type { EntityReport } from "../tracking/types";
import type { CpmSummary, OfferPerformance } from "./types";

export type CpmPartnerShare = {
  partnerKey: string;
  partnerName: string;
  offerId: string;
  offerName: string;
  clicks: number;
  revenue: number;
};

export type CpmAttributionInput = {
  offerReport: EntityReport | null;
  offerSub2Report: EntityReport | null;
  /** Used when the offer report is missing or empty. */
  fallbackOffers?: OfferPerformance[];
};

export type CpmAttributionResult = {
  shares: CpmPartnerShare[];
  summary: CpmSummary;
};

type CpmOffer = { offerId: string; offerName: string; revenue: number };

function cpmOfferRevenue(input: CpmAttributionInput): Map<string, CpmOffer> {
  const offers = new Map<string, CpmOffer>();
  const rows = reportRows(input.offerReport);
  if (rows.length) {
    for (const row of rows) {
      const column = findColumn(row, "offer");
      if (!column?.id || !isCpmOffer(column.label)) continue;
      const current = offers.get(column.id) ?? { offerId: column.id, offerName: column.label, revenue: 0 };
      current.revenue += row.reporting.revenue;
      offers.set(column.id, current);
    }
    return offers;
  }
  for (const offer of input.fallbackOffers ?? []) {
    if (!isCpmOffer(offer.offerName)) continue;
    offers.set(offer.offerId, { offerId: offer.offerId, offerName: offer.offerName, revenue: offer.revenue });
  }
  return offers;
}

/** Partner clicks per CPM offer, keyed by uppercased partner key. */
function partnerClicksByOffer(report: EntityReport | null, cpmOffers: Map<string, CpmOffer>): Map<string, Map<string, number>> {
  const byOffer = new Map<string, Map<string, number>>();
  for (const row of reportRows(report)) {
    const offerId = findColumn(row, "offer")?.id;
    if (!offerId || !cpmOffers.has(offerId)) continue;
    const parsed = parseSub2(findColumn(row, "sub2")?.label ?? "");
    if (!parsed || parsed.isEmailHash || !parsed.partnerPrefix) continue;
    const key = parsed.partnerPrefix.toUpperCase();
    const partners = byOffer.get(offerId) ?? new Map<string, number>();
    partners.set(key, (partners.get(key) ?? 0) + row.reporting.totalClick);
    byOffer.set(offerId, partners);
  }
  return byOffer;
}

/**
 * CPM revenue has no conversions to follow, so each offer's revenue is split
 * across partners by their share of the offer's clicks.
 */
export function attributeCpmRevenue(input: CpmAttributionInput): CpmAttributionResult {
  const cpmOffers = cpmOfferRevenue(input);
  const clicksByOffer = partnerClicksByOffer(input.offerSub2Report, cpmOffers);

  const shares: CpmPartnerShare[] = [];
  const warnings: string[] = [];
  let totalRevenue = 0;
  let attributedRevenue = 0;

  for (const offer of cpmOffers.values()) {
    totalRevenue += offer.revenue;
    const partners = clicksByOffer.get(offer.offerId) ?? new Map<string, number>();
    let totalClicks = 0;
    for (const clicks of partners.values()) totalClicks += clicks;

    if (offer.revenue > 0 && totalClicks === 0) {
      const warning = `Offer ${offer.offerId} (${offer.offerName}) has $${offer.revenue.toFixed(2)} CPM revenue but no partner clicks`;
      console.warn(`CPM attribution: ${warning}`);
      warnings.push(warning);
    }
    if (totalClicks === 0 || offer.revenue === 0) continue;

    for (const [partnerKey, clicks] of partners) {
      const revenue = (offer.revenue * clicks) / totalClicks;
      attributedRevenue += revenue;
      shares.push({
        partnerKey,
        partnerName: PARTNER_GROUP_NAMES[partnerKey] ?? partnerKey,
        offerId: offer.offerId,
        offerName: offer.offerName,
        clicks,
        revenue,
      });
    }
  }

  const unattributedRevenue = totalRevenue - attributedRevenue;
  if (cpmOffers.size) {
    console.log(
      `CPM attribution: $${attributedRevenue.toFixed(2)} of $${totalRevenue.toFixed(2)} attributed across ${cpmOffers.size} offers ($${unattributedRevenue.toFixed(2)} unattributed)`
    );
  }

  return { shares, summary: { totalRevenue, attributedRevenue, unattributedRevenue, warnings } };
}
