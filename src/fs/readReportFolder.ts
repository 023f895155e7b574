import fs from "node:fs";
import type { SendingCampaign } from "../sources/types";
import type {
  ConversionRecord,
  EntityColumn,
  EntityReport,
  EntityReporting,
  EntityReportRow,
} from "../tracking/types";
import { locateReportFiles } from "./reportLocator";

export type ReportFolderData = {
  folder: string;
  dateReport: EntityReport;
  offerReport: EntityReport;
  sub1Report: EntityReport;
  sub2Report: EntityReport;
  offerSub2Report: EntityReport;
  conversions: ConversionRecord[];
  sendingCampaigns: SendingCampaign[];
};

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Exports come from either the API (snake_case) or an earlier dump of our own types (camelCase). */
function field(obj: JsonObject, camel: string, snake: string): unknown {
  return obj[camel] ?? obj[snake];
}

class Decoder {
  constructor(private readonly filePath: string) {}

  fail(where: string, reason: string): never {
    throw new Error(`Invalid report file ${this.filePath}: ${where} ${reason}`);
  }

  object(value: unknown, where: string): JsonObject {
    if (!isObject(value)) return this.fail(where, "must be an object");
    return value;
  }

  array(value: unknown, where: string): unknown[] {
    if (!Array.isArray(value)) return this.fail(where, "must be an array");
    return value;
  }

  string(value: unknown, where: string): string {
    if (typeof value === "string") return value;
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return this.fail(where, "must be a string");
  }

  optionalString(value: unknown, where: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    return this.string(value, where);
  }

  number(value: unknown, where: string): number {
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
    return this.fail(where, "must be a number");
  }

  optionalNumber(value: unknown, where: string): number | undefined {
    if (value === undefined || value === null) return undefined;
    return this.number(value, where);
  }

  /** Missing counts read as 0. */
  count(value: unknown, where: string): number {
    if (value === undefined || value === null) return 0;
    return this.number(value, where);
  }
}

function readJson(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function decodeReporting(d: Decoder, value: unknown, where: string): EntityReporting {
  const obj = d.object(value, where);
  return {
    totalClick: d.count(field(obj, "totalClick", "total_click"), `${where}.total_click`),
    conversions: d.count(obj.conversions, `${where}.conversions`),
    revenue: d.count(obj.revenue, `${where}.revenue`),
    payout: d.count(obj.payout, `${where}.payout`),
  };
}

function decodeColumn(d: Decoder, value: unknown, where: string): EntityColumn {
  const obj = d.object(value, where);
  return {
    columnType: d.string(field(obj, "columnType", "column_type"), `${where}.column_type`),
    id: d.string(obj.id ?? "", `${where}.id`),
    label: d.string(obj.label ?? "", `${where}.label`),
  };
}

export function decodeEntityReport(value: unknown, filePath: string): EntityReport {
  const d = new Decoder(filePath);
  const obj = d.object(value, "report");
  const table = d.array(obj.table, "table").map((rowValue, index): EntityReportRow => {
    const row = d.object(rowValue, `table[${index}]`);
    return {
      columns: d.array(row.columns, `table[${index}].columns`).map((column, columnIndex) =>
        decodeColumn(d, column, `table[${index}].columns[${columnIndex}]`)
      ),
      reporting: decodeReporting(d, row.reporting, `table[${index}].reporting`),
    };
  });
  const report: EntityReport = { table };
  if (obj.summary !== undefined && obj.summary !== null) {
    report.summary = decodeReporting(d, obj.summary, "summary");
  }
  return report;
}

function decodeConversion(d: Decoder, value: unknown, where: string): ConversionRecord {
  const obj = d.object(value, where);
  const record: ConversionRecord = {
    conversionId: d.string(field(obj, "conversionId", "conversion_id"), `${where}.conversion_id`),
    transactionId: d.optionalString(field(obj, "transactionId", "transaction_id"), `${where}.transaction_id`),
    clickId: d.optionalString(field(obj, "clickId", "click_id"), `${where}.click_id`),
    offerId: d.string(field(obj, "offerId", "network_offer_id") ?? "", `${where}.network_offer_id`),
    offerName: d.string(field(obj, "offerName", "offer_name") ?? "", `${where}.offer_name`),
    status: d.optionalString(obj.status, `${where}.status`),
    revenue: d.count(obj.revenue, `${where}.revenue`),
    payout: d.count(obj.payout, `${where}.payout`),
    sub1: d.string(obj.sub1 ?? "", `${where}.sub1`),
    sub2: d.string(obj.sub2 ?? "", `${where}.sub2`),
    sub3: d.optionalString(obj.sub3, `${where}.sub3`),
    conversionUnixTimestamp: d.number(
      field(obj, "conversionUnixTimestamp", "conversion_unix_timestamp"),
      `${where}.conversion_unix_timestamp`
    ),
    clickUnixTimestamp: d.optionalNumber(field(obj, "clickUnixTimestamp", "click_unix_timestamp"), `${where}.click_unix_timestamp`),
    country: d.optionalString(obj.country, `${where}.country`),
  };
  const relationship = obj.relationship;
  if (isObject(relationship) && isObject(relationship.offer)) {
    const offer = relationship.offer;
    record.relationship = {
      offer: {
        networkOfferId: d.number(field(offer, "networkOfferId", "network_offer_id"), `${where}.relationship.offer.network_offer_id`),
        name: d.string(offer.name ?? "", `${where}.relationship.offer.name`),
      },
    };
  }
  return record;
}

/** Accepts a bare array or the `{ conversions: [...] }` page shape. */
export function decodeConversionRecords(value: unknown, filePath: string): ConversionRecord[] {
  const d = new Decoder(filePath);
  const list = isObject(value) ? value.conversions : value;
  return d.array(list, "conversions").map((item, index) => decodeConversion(d, item, `conversions[${index}]`));
}

function decodeSendingCampaign(d: Decoder, value: unknown, where: string): SendingCampaign {
  const obj = d.object(value, where);
  const campaign: SendingCampaign = {
    id: d.string(obj.id, `${where}.id`),
    name: d.string(obj.name ?? "", `${where}.name`),
    espName: d.string(field(obj, "espName", "esp_name") ?? "", `${where}.esp_name`),
    sendingDomain: d.string(field(obj, "sendingDomain", "sending_domain") ?? "", `${where}.sending_domain`),
    audienceSize: d.count(field(obj, "audienceSize", "audience_size"), `${where}.audience_size`),
    sent: d.count(obj.sent, `${where}.sent`),
    delivered: d.count(obj.delivered, `${where}.delivered`),
    opens: d.count(obj.opens, `${where}.opens`),
    uniqueOpens: d.count(field(obj, "uniqueOpens", "unique_opens"), `${where}.unique_opens`),
    clicks: d.count(obj.clicks, `${where}.clicks`),
  };
  const scheduleDate = d.optionalString(field(obj, "scheduleDate", "schedule_date"), `${where}.schedule_date`);
  if (scheduleDate) campaign.scheduleDate = scheduleDate;
  const status = d.optionalString(obj.status, `${where}.status`);
  if (status) campaign.status = status;
  const bounces = d.optionalNumber(obj.bounces, `${where}.bounces`);
  if (bounces !== undefined) campaign.bounces = bounces;
  const unsubscribes = d.optionalNumber(obj.unsubscribes, `${where}.unsubscribes`);
  if (unsubscribes !== undefined) campaign.unsubscribes = unsubscribes;
  const complaints = d.optionalNumber(obj.complaints, `${where}.complaints`);
  if (complaints !== undefined) campaign.complaints = complaints;
  return campaign;
}

export function decodeSendingCampaigns(value: unknown, filePath: string): SendingCampaign[] {
  const d = new Decoder(filePath);
  const list = isObject(value) ? value.campaigns : value;
  return d.array(list, "campaigns").map((item, index) => decodeSendingCampaign(d, item, `campaigns[${index}]`));
}

export function readReportFolder(dateFolder: string): ReportFolderData {
  const files = locateReportFiles(dateFolder);
  const readReport = (filePath: string) => decodeEntityReport(readJson(filePath), filePath);

  const data: ReportFolderData = {
    folder: files.folder,
    dateReport: readReport(files.date),
    offerReport: readReport(files.offer),
    sub1Report: readReport(files.sub1),
    sub2Report: readReport(files.sub2),
    offerSub2Report: readReport(files.offerSub2),
    conversions: decodeConversionRecords(readJson(files.conversions), files.conversions),
    sendingCampaigns: files.sendingCampaigns
      ? decodeSendingCampaigns(readJson(files.sendingCampaigns), files.sendingCampaigns)
      : [],
  };

  if (!files.sendingCampaigns) {
    console.warn(`Attribution: no sending campaigns export in ${dateFolder}, campaigns stay unlinked`);
  }
  console.log(
    `Attribution: loaded ${data.conversions.length} conversions and ${data.sendingCampaigns.length} sending campaigns from ${dateFolder}`
  );
  return data;
}
