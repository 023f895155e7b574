import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import type {
  AttributionReport,
  CampaignRevenue,
  DataPartnerPerformance,
  EspRevenuePerformance,
  OfferPerformance,
  PropertyPerformance,
} from "../attribution/types";
import { isCpmOffer } from "../identifiers/offers";

type Cell = string | number | boolean;

type Column<T> = {
  header: string;
  value: (row: T) => Cell;
};

export const SHEET_NAMES = [
  "Properties",
  "Campaigns",
  "Offers",
  "ESP Revenue",
  "Data Partners",
  "Reconciliation",
] as const;

const round = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const PROPERTY_COLUMNS: Column<PropertyPerformance>[] = [
  { header: "Property Code", value: (row) => row.propertyCode },
  { header: "Property", value: (row) => row.propertyName },
  { header: "Clicks", value: (row) => row.clicks },
  { header: "Conversions", value: (row) => row.conversions },
  { header: "Revenue", value: (row) => round(row.revenue) },
  { header: "Payout", value: (row) => round(row.payout) },
  { header: "Conversion Rate", value: (row) => round(row.conversionRate, 4) },
  { header: "EPC", value: (row) => round(row.epc, 4) },
  { header: "Unique Offers", value: (row) => row.uniqueOffers },
  { header: "Unattributed Reason", value: (row) => row.unattributedReason ?? "" },
];

const CAMPAIGN_COLUMNS: Column<CampaignRevenue>[] = [
  { header: "Mailing ID", value: (row) => row.mailingId },
  { header: "Campaign", value: (row) => row.campaignName },
  { header: "Property Code", value: (row) => row.propertyCode },
  { header: "Offer ID", value: (row) => row.offerId },
  { header: "Offer", value: (row) => row.offerName },
  { header: "ESP", value: (row) => row.espName },
  { header: "Sending Domain", value: (row) => row.sendingDomain },
  { header: "Sent", value: (row) => row.sent },
  { header: "Delivered", value: (row) => row.delivered },
  { header: "Unique Opens", value: (row) => row.uniqueOpens },
  { header: "Clicks", value: (row) => row.clicks },
  { header: "Conversions", value: (row) => row.conversions },
  { header: "Revenue", value: (row) => round(row.revenue) },
  { header: "RPM", value: (row) => round(row.rpm) },
  { header: "eCPM", value: (row) => round(row.ecpm) },
  { header: "Revenue per Open", value: (row) => round(row.revenuePerOpen, 4) },
  { header: "Sending Linked", value: (row) => row.sendingLinked },
];

const OFFER_COLUMNS: Column<OfferPerformance>[] = [
  { header: "Offer ID", value: (row) => row.offerId },
  { header: "Offer", value: (row) => row.offerName },
  { header: "CPM", value: (row) => isCpmOffer(row.offerName) },
  { header: "Clicks", value: (row) => row.clicks },
  { header: "Conversions", value: (row) => row.conversions },
  { header: "Revenue", value: (row) => round(row.revenue) },
  { header: "Payout", value: (row) => round(row.payout) },
  { header: "Conversion Rate", value: (row) => round(row.conversionRate, 4) },
  { header: "EPC", value: (row) => round(row.epc, 4) },
];

const ESP_COLUMNS: Column<EspRevenuePerformance>[] = [
  { header: "ESP", value: (row) => row.espName },
  { header: "Campaigns", value: (row) => row.campaignCount },
  { header: "Sent", value: (row) => row.totalSent },
  { header: "Delivered", value: (row) => row.totalDelivered },
  { header: "Opens", value: (row) => row.totalOpens },
  { header: "Clicks", value: (row) => row.clicks },
  { header: "Conversions", value: (row) => row.conversions },
  { header: "Revenue", value: (row) => round(row.revenue) },
  { header: "Share %", value: (row) => round(row.percentage) },
  { header: "Avg eCPM", value: (row) => round(row.avgEcpm) },
];

const PARTNER_COLUMNS: Column<DataPartnerPerformance>[] = [
  { header: "Partner Key", value: (row) => row.partnerKey },
  { header: "Partner", value: (row) => row.partnerName },
  { header: "Clicks", value: (row) => row.clicks },
  { header: "Conversions", value: (row) => row.conversions },
  { header: "Revenue", value: (row) => round(row.revenue) },
  { header: "CPA Revenue", value: (row) => round(row.cpaRevenue) },
  { header: "CPM Revenue", value: (row) => round(row.cpmRevenue) },
  { header: "Volume", value: (row) => row.volume },
  { header: "Volume Mode", value: (row) => row.volumeMode },
  { header: "CVR %", value: (row) => round(row.cvr) },
  { header: "EPC", value: (row) => round(row.epc, 4) },
];

function tableRows<T>(columns: Column<T>[], rows: readonly T[]): Cell[][] {
  return [columns.map((column) => column.header), ...rows.map((row) => columns.map((column) => column.value(row)))];
}

function reconciliationRows(report: AttributionReport): Cell[][] {
  const gap = report.reconciliation;
  const { cpm, nonCpm } = report.revenueBreakdown;
  const rows: Cell[][] = [
    ["Metric", "Value"],
    ["Authoritative Total", round(gap.authoritativeTotal)],
    ["Conversion-Based Total", round(gap.conversionBasedTotal)],
    ["Gap", round(gap.gap)],
    ["Method", gap.method],
    ["Unattributed Revenue", round(gap.unattributedRevenue)],
    ["CPM Revenue", round(cpm.revenue)],
    ["Non-CPM Revenue", round(nonCpm.revenue)],
  ];
  if (report.dataPartners) {
    rows.push(["Data Partner Range", report.dataPartners.totals.label]);
    rows.push(["Unattributed CPM Revenue", round(report.dataPartners.cpm.unattributedRevenue)]);
  }
  return rows;
}

export function buildAttributionWorkbook(report: AttributionReport): XLSX.WorkBook {
  const sheets: Record<(typeof SHEET_NAMES)[number], Cell[][]> = {
    Properties: tableRows(PROPERTY_COLUMNS, report.metrics.propertyPerformance),
    Campaigns: tableRows(CAMPAIGN_COLUMNS, report.metrics.campaignRevenue),
    Offers: tableRows(OFFER_COLUMNS, report.metrics.offerPerformance),
    "ESP Revenue": tableRows(ESP_COLUMNS, report.espRevenue),
    "Data Partners": tableRows(PARTNER_COLUMNS, report.dataPartners?.partners ?? []),
    Reconciliation: reconciliationRows(report),
  };

  const workbook = XLSX.utils.book_new();
  for (const name of SHEET_NAMES) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(sheets[name]), name);
  }
  return workbook;
}

export function writeAttributionXlsx(report: AttributionReport, outPath: string): string {
  const outDir = path.dirname(outPath);
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }
  XLSX.writeFile(buildAttributionWorkbook(report), outPath);
  return outPath;
}
