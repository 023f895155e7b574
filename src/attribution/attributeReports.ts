import type { DateRange } from "../lib/dates";
import type { SendingCampaign } from "../sources/types";
import type { Conversion, EntityReport } from "../tracking/types";
import { resolveTotalEspSends } from "../volume/partnerVolumeResolver";
import type { VolumeResult } from "../volume/types";
import { aggregateEntityMetrics, collectUnknownPropertyMailingIds } from "./aggregateEntityReports";
import { applySendingData, propertyFromCampaignName } from "./campaignEnricher";
import { buildDataPartnerAnalytics } from "./dataPartnerAnalytics";
import { calculateEspRevenue } from "./espRevenue";
import { calculateRevenueBreakdown } from "./revenueBreakdown";
import type { AttributionReport } from "./types";

export type ReportSet = {
  dateReport: EntityReport | null;
  offerReport: EntityReport | null;
  sub1Report: EntityReport | null;
  sub2Report: EntityReport | null;
  offerSub2Report: EntityReport | null;
};

export type AttributeReportsInput = ReportSet & {
  conversions: Conversion[];
  sendingCampaigns: SendingCampaign[];
  range: DateRange;
  now: Date;
  /** Defaults to estimated mode with no per-partner volumes. */
  volume?: VolumeResult;
};

/**
 * Runs the whole engine over reports already in hand. Campaign links and
 * unknown properties come only from the supplied sending campaigns; nothing is
 * fetched.
 */
export function attributeReports(input: AttributeReportsInput): AttributionReport {
  const byId = new Map(input.sendingCampaigns.map((campaign) => [campaign.id, campaign]));

  const resolvedProperties = new Map<string, string>();
  for (const mailingId of collectUnknownPropertyMailingIds(input.sub1Report, input.conversions)) {
    const sending = byId.get(mailingId);
    const property = sending ? propertyFromCampaignName(sending.name) : null;
    if (property) resolvedProperties.set(mailingId, property);
  }

  const aggregated = aggregateEntityMetrics({
    dateReport: input.dateReport,
    offerReport: input.offerReport,
    sub1Report: input.sub1Report,
    conversions: input.conversions,
    resolvedProperties,
    today: input.range.end,
  });
  const campaignRevenue = aggregated.campaignRevenue.map((campaign) => {
    const sending = byId.get(campaign.mailingId);
    return sending ? applySendingData(campaign, sending) : campaign;
  });
  const metrics = { ...aggregated, campaignRevenue };

  const { esps, reconciliation } = calculateEspRevenue(
    campaignRevenue,
    metrics.offerPerformance,
    input.sendingCampaigns
  );
  const revenueBreakdown = calculateRevenueBreakdown(metrics.offerPerformance, input.conversions);

  const volume: VolumeResult = input.volume ?? { mode: "estimated", volumes: {} };
  const totalEspSends = resolveTotalEspSends(
    0,
    input.sendingCampaigns.map((campaign) => campaign.sent),
    volume.volumes
  );
  const dataPartners = buildDataPartnerAnalytics({
    range: input.range,
    sub2Report: input.sub2Report,
    offerReport: input.offerReport,
    offerSub2Report: input.offerSub2Report,
    fallbackOffers: metrics.offerPerformance,
    conversions: input.conversions,
    lookbackConversions: input.conversions,
    volume,
    totalEspSends,
    now: input.now,
  });

  return { metrics, espRevenue: esps, reconciliation, revenueBreakdown, dataPartners };
}
