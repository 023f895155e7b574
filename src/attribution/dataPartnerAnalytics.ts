import { PARTNER_GROUP_NAMES } from "../identifiers/catalog";
import { parseSub2, resolvePartnerGroup, type PartnerGroup } from "../identifiers/parseSub2";
import { formatRangeLabel, isWithinRange, type DateRange } from "../lib/dates";
import { findColumn, reportRows } from "../tracking/entityRows";
import type { Conversion, EntityReport } from "../tracking/types";
import { createPartnerVolumeResolver } from "../volume/partnerVolumeResolver";
import type { VolumeResult } from "../volume/types";
import { byDateAsc, byRevenueDesc } from "./aggregateHelpers";
import { attributeCpmRevenue } from "./cpmAttribution";
import { buildMomComparison } from "./momSummary";
import { buildOfferCentricView } from "./offerCentricView";
import type {
  DataPartnerAnalytics,
  DataPartnerDaily,
  DataPartnerPerformance,
  OfferPerformance,
  PartnerOfferMetrics,
} from "./types";

export type DataPartnerAnalyticsInput = {
  range: DateRange;
  sub2Report: EntityReport | null;
  offerReport: EntityReport | null;
  offerSub2Report: EntityReport | null;
  /** CPM revenue source when the offer report is unavailable. */
  fallbackOffers: OfferPerformance[];
  /** Conversions outside the range are ignored for CPA attribution. */
  conversions: Conversion[];
  /** The whole lookback window, for the month-over-month comparison. */
  lookbackConversions: Conversion[];
  volume: VolumeResult;
  totalEspSends: number;
  now: Date;
};

type DataSetAccum = { code: string; clicks: number; conversions: number; revenue: number };

type PartnerAccum = {
  key: string;
  name: string;
  clicks: number;
  conversions: number;
  revenue: number;
  cpaRevenue: number;
  cpmRevenue: number;
  payout: number;
  daily: Map<string, DataPartnerDaily>;
  dataSets: Map<string, DataSetAccum>;
  offers: Map<string, PartnerOfferMetrics>;
};

/** Owner of a conversion: parsed sub2, then the carried data-set code, then the carried partner name. */
function conversionPartner(conv: Conversion): { group: PartnerGroup; dataSetCode: string } | null {
  const parsed = parseSub2(conv.sub2);
  if (parsed && !parsed.isEmailHash && parsed.partnerName) {
    return { group: { key: parsed.partnerPrefix, name: parsed.partnerName }, dataSetCode: parsed.dataSetCode };
  }
  if (conv.dataSetCode) return { group: resolvePartnerGroup(conv.dataSetCode), dataSetCode: conv.dataSetCode };
  if (conv.dataPartner) return { group: resolvePartnerGroup(conv.dataPartner), dataSetCode: conv.dataPartner };
  return null;
}

export function buildDataPartnerAnalytics(input: DataPartnerAnalyticsInput): DataPartnerAnalytics {
  const accums = new Map<string, PartnerAccum>();

  const partnerAccum = (group: PartnerGroup): PartnerAccum => {
    let accum = accums.get(group.key);
    if (!accum) {
      accum = {
        key: group.key,
        name: group.name,
        clicks: 0,
        conversions: 0,
        revenue: 0,
        cpaRevenue: 0,
        cpmRevenue: 0,
        payout: 0,
        daily: new Map(),
        dataSets: new Map(),
        offers: new Map(),
      };
      accums.set(group.key, accum);
    }
    return accum;
  };

  const dataSetAccum = (partner: PartnerAccum, dataSetCode: string): DataSetAccum => {
    const code = dataSetCode || partner.key;
    let accum = partner.dataSets.get(code);
    if (!accum) {
      accum = { code, clicks: 0, conversions: 0, revenue: 0 };
      partner.dataSets.set(code, accum);
    }
    return accum;
  };

  const offerAccum = (partner: PartnerAccum, offerId: string, offerName: string, isCpm: boolean): PartnerOfferMetrics => {
    let accum = partner.offers.get(offerId);
    if (!accum) {
      accum = { offerId, offerName, isCpm, clicks: 0, conversions: 0, revenue: 0 };
      partner.offers.set(offerId, accum);
    }
    if (isCpm) accum.isCpm = true;
    return accum;
  };

  for (const row of reportRows(input.sub2Report)) {
    const parsed = parseSub2(findColumn(row, "sub2")?.label ?? "");
    if (!parsed || parsed.isEmailHash || !parsed.partnerName) continue;
    const partner = partnerAccum({ key: parsed.partnerPrefix, name: parsed.partnerName });
    partner.clicks += row.reporting.totalClick;
    dataSetAccum(partner, parsed.dataSetCode).clicks += row.reporting.totalClick;
  }

  const cpm = attributeCpmRevenue({
    offerReport: input.offerReport,
    offerSub2Report: input.offerSub2Report,
    fallbackOffers: input.fallbackOffers,
  });
  for (const share of cpm.shares) {
    const partner = partnerAccum({ key: share.partnerKey, name: PARTNER_GROUP_NAMES[share.partnerKey] ?? share.partnerKey });
    partner.revenue += share.revenue;
    partner.cpmRevenue += share.revenue;
    const offer = offerAccum(partner, share.offerId, share.offerName, true);
    offer.clicks += share.clicks;
    offer.revenue += share.revenue;
  }

  for (const conv of input.conversions) {
    if (!isWithinRange(conv.date, input.range)) continue;
    const owner = conversionPartner(conv);
    if (!owner) continue;
    const partner = partnerAccum(owner.group);
    partner.conversions += 1;
    partner.payout += conv.payout;
    partner.revenue += conv.revenue;
    partner.cpaRevenue += conv.revenue;

    const dataSet = dataSetAccum(partner, owner.dataSetCode);
    dataSet.conversions += 1;
    dataSet.revenue += conv.revenue;

    if (conv.offerId) {
      const offer = offerAccum(partner, conv.offerId, conv.offerName, false);
      offer.conversions += 1;
      offer.revenue += conv.revenue;
    }

    const day = partner.daily.get(conv.date) ?? { date: conv.date, clicks: 0, conversions: 0, revenue: 0 };
    day.conversions += 1;
    day.revenue += conv.revenue;
    partner.daily.set(conv.date, day);
  }

  let grandTotalClicks = 0;
  let grandTotalConversions = 0;
  for (const accum of accums.values()) {
    grandTotalClicks += accum.clicks;
    grandTotalConversions += accum.conversions;
  }
  const resolver = createPartnerVolumeResolver({
    volume: input.volume,
    knownPartners: new Set(accums.keys()),
    grandTotalClicks,
    grandTotalConversions,
    totalEspSends: input.totalEspSends,
  });

  const partners: DataPartnerPerformance[] = [...accums.values()]
    .map((accum) => {
      const partnerVolume = resolver.resolvePartnerVolume(accum.key, accum.clicks, accum.conversions);
      return {
        partnerKey: accum.key,
        partnerName: accum.name,
        clicks: accum.clicks,
        conversions: accum.conversions,
        revenue: accum.revenue,
        cpaRevenue: accum.cpaRevenue,
        cpmRevenue: accum.cpmRevenue,
        payout: accum.payout,
        volume: partnerVolume.volume,
        volumeMode: partnerVolume.mode,
        cvr: accum.clicks > 0 ? (accum.conversions / accum.clicks) * 100 : 0,
        epc: accum.clicks > 0 ? accum.revenue / accum.clicks : 0,
        dailySeries: [...accum.daily.values()].sort(byDateAsc),
        dataSetBreakdown: [...accum.dataSets.values()]
          .map((dataSet) => {
            const resolved = resolver.resolveVolume(dataSet.code, dataSet.clicks, dataSet.conversions);
            return {
              dataSetCode: dataSet.code,
              clicks: dataSet.clicks,
              conversions: dataSet.conversions,
              revenue: dataSet.revenue,
              volume: resolved.volume,
              volumeMode: resolved.mode,
              cvr: dataSet.clicks > 0 ? (dataSet.conversions / dataSet.clicks) * 100 : 0,
              epc: dataSet.clicks > 0 ? dataSet.revenue / dataSet.clicks : 0,
            };
          })
          .sort(byRevenueDesc),
        offerBreakdown: [...accum.offers.values()].sort(byRevenueDesc),
      };
    })
    .sort(byRevenueDesc);

  const totals = partners.reduce(
    (sum, partner) => ({
      clicks: sum.clicks + partner.clicks,
      conversions: sum.conversions + partner.conversions,
      revenue: sum.revenue + partner.revenue,
      cpaRevenue: sum.cpaRevenue + partner.cpaRevenue,
      cpmRevenue: sum.cpmRevenue + partner.cpmRevenue,
      volume: sum.volume + partner.volume,
    }),
    { clicks: 0, conversions: 0, revenue: 0, cpaRevenue: 0, cpmRevenue: 0, volume: 0 }
  );

  const { cpmOffers, cpaOffers } = buildOfferCentricView(partners);

  return {
    range: { ...input.range },
    partners,
    totals: {
      label: formatRangeLabel(input.range),
      ...totals,
      volume: Math.max(totals.volume, resolver.totalEspSends),
    },
    mom: buildMomComparison(input.lookbackConversions, totals.clicks, input.now),
    cpmOffers,
    cpaOffers,
    cpm: cpm.summary,
    totalEspSends: resolver.totalEspSends,
    generatedAt: input.now.toISOString(),
  };
}
