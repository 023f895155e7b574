import { getPropertyName, isValidPropertyCode, tryParseSub1 } from "../identifiers/parseSub1";
import { unixSecondsToIsoDate } from "../lib/dates";
import { dateColumnSeconds, findColumn, reportRows } from "../tracking/entityRows";
import type { Conversion, EntityReport } from "../tracking/types";
import {
  addCounts,
  byDateDesc,
  byRevenueDesc,
  emptyCounts,
  lastN,
  newCampaign,
  withRates,
} from "./aggregateHelpers";
import type {
  AttributionMetrics,
  CampaignRevenue,
  DailyPerformance,
  OfferPerformance,
  PropertyPerformance,
  TodayTotals,
  UnattributedReason,
} from "./types";

export const RECENT_LIMIT = 100;

export const UNATTRIBUTED_BUCKETS: Record<UnattributedReason, { code: string; name: string }> = {
  empty_tag: { code: "UNATTRIBUTED", name: "Unattributed" },
  parse_error: { code: "UNPARSEABLE", name: "Unparseable Tag" },
  no_mailing_id: { code: "NO_MAILING_ID", name: "No Mailing ID" },
  unknown_property: { code: "UNKNOWN_PROPERTY", name: "Unknown Property" },
};

const BUCKET_ORDER: UnattributedReason[] = ["empty_tag", "parse_error", "no_mailing_id", "unknown_property"];

export type EntityAggregationInput = {
  dateReport: EntityReport | null;
  offerReport: EntityReport | null;
  sub1Report: EntityReport | null;
  conversions: Conversion[];
  /** mailingId to property code, for campaigns whose tag carries no known property. */
  resolvedProperties?: ReadonlyMap<string, string>;
  today: string;
};

type Counts = ReturnType<typeof emptyCounts>;

/** One sub1 report row, or one conversion when the sub1 report is unusable. */
type TaggedEntry = {
  sub1: string;
  counts: Counts;
  offerId?: string;
  offerName?: string;
};

type Classified =
  | { kind: "bucket"; reason: UnattributedReason }
  | { kind: "campaign"; mailingId: string; propertyCode: string; propertyName: string; offerId: string };

function classify(sub1: string): Classified {
  if (!sub1) return { kind: "bucket", reason: "empty_tag" };
  const result = tryParseSub1(sub1);
  if (result.kind === "unrecognized") return { kind: "bucket", reason: "parse_error" };
  const parsed = result.value;
  if (!parsed.mailingId) return { kind: "bucket", reason: "no_mailing_id" };
  return {
    kind: "campaign",
    mailingId: parsed.mailingId,
    propertyCode: parsed.propertyCode ?? "",
    propertyName: parsed.propertyName ?? "",
    offerId: parsed.offerId ?? "",
  };
}

function sub1Entries(report: EntityReport | null): TaggedEntry[] {
  return reportRows(report).map((row) => ({
    sub1: findColumn(row, "sub1")?.label ?? "",
    counts: {
      clicks: row.reporting.totalClick,
      conversions: row.reporting.conversions,
      revenue: row.reporting.revenue,
      payout: row.reporting.payout,
    },
  }));
}

function conversionEntries(conversions: Conversion[]): TaggedEntry[] {
  return conversions.map((conv) => ({
    sub1: conv.sub1,
    counts: { clicks: 0, conversions: 1, revenue: conv.revenue, payout: conv.payout },
    offerId: conv.offerId,
    offerName: conv.offerName,
  }));
}

const hasCampaignEntry = (entries: TaggedEntry[]): boolean =>
  entries.some((entry) => classify(entry.sub1).kind === "campaign");

/**
 * The sub1 report is authoritative when it carries at least one campaign row.
 * Otherwise conversions stand in for it, bucketed by the same rules.
 */
function selectEntries(sub1Report: EntityReport | null, conversions: Conversion[]): TaggedEntry[] {
  const fromReport = sub1Entries(sub1Report);
  if (hasCampaignEntry(fromReport)) return fromReport;
  if (conversions.length) {
    console.log("Attribution: sub1 report unusable, aggregating campaigns from conversions");
  }
  return conversionEntries(conversions);
}

/** Mailing ids whose tag has no known property, in first-seen order. */
export function collectUnknownPropertyMailingIds(
  sub1Report: EntityReport | null,
  conversions: Conversion[]
): string[] {
  const ids = new Set<string>();
  for (const entry of selectEntries(sub1Report, conversions)) {
    const classified = classify(entry.sub1);
    if (classified.kind === "campaign" && !isValidPropertyCode(classified.propertyCode)) {
      ids.add(classified.mailingId);
    }
  }
  return [...ids];
}

function buildDaily(report: EntityReport | null, today: string): { daily: DailyPerformance[]; today: TodayTotals } {
  const byDate = new Map<string, Counts>();
  for (const row of reportRows(report)) {
    const seconds = dateColumnSeconds(row);
    if (!seconds) continue;
    const date = unixSecondsToIsoDate(seconds);
    const counts = byDate.get(date) ?? emptyCounts();
    addCounts(counts, {
      clicks: row.reporting.totalClick,
      conversions: row.reporting.conversions,
      revenue: row.reporting.revenue,
      payout: row.reporting.payout,
    });
    byDate.set(date, counts);
  }
  const daily = [...byDate.entries()].map(([date, counts]) => withRates({ date, ...counts })).sort(byDateDesc);
  return { daily, today: { ...(byDate.get(today) ?? emptyCounts()) } };
}

function buildOffers(report: EntityReport | null, offerNames: Map<string, string>): OfferPerformance[] {
  const offers = new Map<string, OfferPerformance>();
  for (const row of reportRows(report)) {
    const column = findColumn(row, "offer");
    if (!column?.id) continue;
    const existing = offers.get(column.id);
    const counts = existing ?? { offerId: column.id, offerName: column.label, ...emptyCounts() };
    addCounts(counts, {
      clicks: row.reporting.totalClick,
      conversions: row.reporting.conversions,
      revenue: row.reporting.revenue,
      payout: row.reporting.payout,
    });
    offers.set(column.id, withRates(counts));
  }
  return [...offers.values()]
    .map((offer) => (offer.offerName ? offer : { ...offer, offerName: offerNames.get(offer.offerId) ?? "" }))
    .sort(byRevenueDesc);
}

function newProperty(code: string, name: string, reason?: UnattributedReason): PropertyPerformance {
  return {
    propertyCode: code,
    propertyName: name,
    ...emptyCounts(),
    conversionRate: 0,
    epc: 0,
    uniqueOffers: 0,
    isUnattributed: reason !== undefined,
    ...(reason ? { unattributedReason: reason } : {}),
  };
}

/** Rebuilds every tracking aggregate from the reports. Calling it twice with the same input gives equal output. */
export function aggregateEntityMetrics(input: EntityAggregationInput): AttributionMetrics {
  const { conversions, today } = input;
  const resolved = input.resolvedProperties ?? new Map<string, string>();

  const offerNames = new Map<string, string>();
  for (const conv of conversions) {
    if (conv.offerName) offerNames.set(conv.offerId, conv.offerName);
  }

  const { daily, today: todayTotals } = buildDaily(input.dateReport, today);
  const offers = buildOffers(input.offerReport, offerNames);

  const buckets = new Map<UnattributedReason, Counts>();
  const properties = new Map<string, PropertyPerformance>();
  const campaigns = new Map<string, CampaignRevenue>();

  const addToProperty = (code: string, counts: Counts) => {
    const property = properties.get(code) ?? newProperty(code, getPropertyName(code));
    addCounts(property, counts);
    properties.set(code, property);
  };

  for (const entry of selectEntries(input.sub1Report, conversions)) {
    const classified = classify(entry.sub1);
    if (classified.kind === "bucket") {
      const bucket = buckets.get(classified.reason) ?? emptyCounts();
      addCounts(bucket, entry.counts);
      buckets.set(classified.reason, bucket);
      continue;
    }

    const offerId = entry.offerId ?? classified.offerId;
    let campaign = campaigns.get(classified.mailingId);
    if (!campaign) {
      campaign = newCampaign({
        mailingId: classified.mailingId,
        campaignName: entry.sub1,
        propertyCode: classified.propertyCode,
        propertyName: classified.propertyName,
        offerId,
        offerName: entry.offerName ?? offerNames.get(offerId) ?? "",
      });
      campaigns.set(classified.mailingId, campaign);
    }
    addCounts(campaign, entry.counts);

    const resolvedCode = resolved.get(classified.mailingId);
    if (isValidPropertyCode(classified.propertyCode)) {
      addToProperty(classified.propertyCode, entry.counts);
    } else if (resolvedCode && isValidPropertyCode(resolvedCode)) {
      campaign.propertyCode = resolvedCode;
      campaign.propertyName = getPropertyName(resolvedCode);
      addToProperty(resolvedCode, entry.counts);
    } else {
      const bucket = buckets.get("unknown_property") ?? emptyCounts();
      addCounts(bucket, entry.counts);
      buckets.set("unknown_property", bucket);
    }
  }

  for (const reason of BUCKET_ORDER) {
    const counts = buckets.get(reason);
    if (!counts || counts.revenue <= 0) continue;
    const { code, name } = UNATTRIBUTED_BUCKETS[reason];
    const property = newProperty(code, name, reason);
    addCounts(property, counts);
    properties.set(code, property);
  }

  const offersByProperty = new Map<string, Set<string>>();
  for (const conv of conversions) {
    const code = resolved.get(conv.mailingId) ?? conv.propertyCode;
    if (!code) continue;
    const offerIds = offersByProperty.get(code) ?? new Set<string>();
    offerIds.add(conv.offerId);
    offersByProperty.set(code, offerIds);
  }

  const propertyPerformance = [...properties.values()]
    .map((property) => withRates({ ...property, uniqueOffers: offersByProperty.get(property.propertyCode)?.size ?? 0 }))
    .sort(byRevenueDesc);

  const campaignRevenue = [...campaigns.values()].map((campaign) => withRates(campaign)).sort(byRevenueDesc);

  return {
    today: todayTotals,
    dailyPerformance: daily,
    offerPerformance: offers,
    propertyPerformance,
    campaignRevenue,
    recentConversions: lastN(conversions, RECENT_LIMIT),
    recentClicks: [],
  };
}
