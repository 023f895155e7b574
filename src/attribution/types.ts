import type { Click, Conversion } from "../tracking/types";
import type { VolumeMode } from "../volume/types";

/** Clicks, conversions and money for any aggregation key. Rates are ratios, 0 when there are no clicks. */
export type PerformanceTotals = {
  clicks: number;
  conversions: number;
  revenue: number;
  payout: number;
  conversionRate: number;
  epc: number;
};

export type DailyPerformance = PerformanceTotals & {
  date: string;
};

export type OfferPerformance = PerformanceTotals & {
  offerId: string;
  offerName: string;
};

export type UnattributedReason = "empty_tag" | "parse_error" | "no_mailing_id" | "unknown_property";

export type PropertyPerformance = PerformanceTotals & {
  propertyCode: string;
  propertyName: string;
  uniqueOffers: number;
  isUnattributed: boolean;
  unattributedReason?: UnattributedReason;
};

export type CampaignRevenue = PerformanceTotals & {
  mailingId: string;
  campaignName: string;
  propertyCode: string;
  propertyName: string;
  offerId: string;
  offerName: string;
  audienceSize: number;
  sent: number;
  delivered: number;
  opens: number;
  uniqueOpens: number;
  emailClicks: number;
  sendingDomain: string;
  espName: string;
  sendingLinked: boolean;
  rpm: number;
  ecpm: number;
  revenuePerOpen: number;
};

/** One mailing's tracking results joined with its sending-platform stats. */
export type CampaignDetails = {
  mailingId: string;
  campaignName: string;
  propertyCode: string;
  propertyName: string;
  offerId: string;
  offerName: string;
  clicks: number;
  conversions: number;
  revenue: number;
  payout: number;
  conversionRate: number;
  revenuePerClick: number;
  sendingLinked: boolean;
  /** Why the sending-platform lookup came back empty; null when linked. */
  linkError: string | null;
  espName: string;
  sendingDomain: string;
  scheduleDate: string | null;
  status: string | null;
  audienceSize: number;
  sent: number;
  delivered: number;
  opens: number;
  uniqueOpens: number;
  emailClicks: number;
  bounces: number;
  unsubscribes: number;
  complaints: number;
  /** Revenue per thousand of the audience. */
  ecpm: number;
  deliveryRate: number;
  openRate: number;
  clickToOpenRate: number;
};

export type EspRevenuePerformance = {
  espName: string;
  campaignCount: number;
  totalSent: number;
  totalDelivered: number;
  totalOpens: number;
  clicks: number;
  conversions: number;
  revenue: number;
  payout: number;
  percentage: number;
  avgEcpm: number;
  conversionRate: number;
  epc: number;
};

export type ReconciliationMethod = "none" | "offer_volume" | "proportional_scale" | "unattributed_entry";

export type ReconciliationGap = {
  authoritativeTotal: number;
  conversionBasedTotal: number;
  gap: number;
  method: ReconciliationMethod;
  unattributedRevenue: number;
};

export type RevenueCategory = {
  offerCount: number;
  clicks: number;
  conversions: number;
  revenue: number;
  payout: number;
  percentage: number;
};

export type DailyRevenueBreakdown = {
  date: string;
  cpmRevenue: number;
  nonCpmRevenue: number;
  cpmConversions: number;
  nonCpmConversions: number;
};

export type RevenueBreakdown = {
  cpm: RevenueCategory;
  nonCpm: RevenueCategory;
  dailyTrend: DailyRevenueBreakdown[];
};

export type PeriodType = "weekly" | "monthly";

export type PeriodPerformance = PerformanceTotals & {
  period: string;
  periodType: PeriodType;
  startDate: string;
  endDate: string;
};

export type TodayTotals = {
  clicks: number;
  conversions: number;
  revenue: number;
  payout: number;
};

export type AttributionMetrics = {
  today: TodayTotals;
  dailyPerformance: DailyPerformance[];
  offerPerformance: OfferPerformance[];
  propertyPerformance: PropertyPerformance[];
  campaignRevenue: CampaignRevenue[];
  recentConversions: Conversion[];
  recentClicks: Click[];
};

export type DataPartnerDaily = {
  date: string;
  clicks: number;
  conversions: number;
  revenue: number;
};

export type DataSetMetrics = {
  dataSetCode: string;
  clicks: number;
  conversions: number;
  revenue: number;
  volume: number;
  volumeMode: VolumeMode;
  /** Percentage, 0-100. */
  cvr: number;
  epc: number;
};

export type PartnerOfferMetrics = {
  offerId: string;
  offerName: string;
  isCpm: boolean;
  clicks: number;
  conversions: number;
  revenue: number;
};

export type DataPartnerPerformance = {
  partnerKey: string;
  partnerName: string;
  clicks: number;
  conversions: number;
  revenue: number;
  cpaRevenue: number;
  cpmRevenue: number;
  payout: number;
  volume: number;
  volumeMode: VolumeMode;
  /** Percentage, 0-100. */
  cvr: number;
  epc: number;
  dailySeries: DataPartnerDaily[];
  dataSetBreakdown: DataSetMetrics[];
  offerBreakdown: PartnerOfferMetrics[];
};

export type PeriodSummary = {
  label: string;
  clicks: number;
  conversions: number;
  revenue: number;
  cpaRevenue: number;
  cpmRevenue: number;
  volume: number;
};

export type MomComparison = {
  currentMonth: PeriodSummary;
  previousMonth: PeriodSummary;
  revenueChangePct: number;
  conversionsChangePct: number;
  clicksChangePct: number;
};

export type OfferPartnerEntry = {
  partnerKey: string;
  partnerName: string;
  clicks: number;
  /** Percentage of the offer's partner clicks, 0-100. */
  clickShare: number;
  conversions: number;
  revenue: number;
};

export type OfferWithPartnerBreakdown = {
  offerId: string;
  offerName: string;
  isCpm: boolean;
  totalClicks: number;
  totalConversions: number;
  totalRevenue: number;
  partners: OfferPartnerEntry[];
};

export type CpmSummary = {
  totalRevenue: number;
  attributedRevenue: number;
  unattributedRevenue: number;
  warnings: string[];
};

export type DataPartnerAnalytics = {
  range: { start: string; end: string };
  partners: DataPartnerPerformance[];
  totals: PeriodSummary;
  mom: MomComparison;
  cpmOffers: OfferWithPartnerBreakdown[];
  cpaOffers: OfferWithPartnerBreakdown[];
  cpm: CpmSummary;
  totalEspSends: number;
  generatedAt: string;
};

/** One complete attribution pass: the aggregates plus the ESP split and partner view built from them. */
export type AttributionReport = {
  metrics: AttributionMetrics;
  espRevenue: EspRevenuePerformance[];
  reconciliation: ReconciliationGap;
  revenueBreakdown: RevenueBreakdown;
  dataPartners: DataPartnerAnalytics | null;
};
