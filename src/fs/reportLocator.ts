import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/env";

export const REPORT_FILE_NAMES = {
  date: "entity_date.json",
  offer: "entity_offer.json",
  sub1: "entity_sub1.json",
  sub2: "entity_sub2.json",
  offerSub2: "entity_offer_sub2.json",
  conversions: "conversions.json",
  sendingCampaigns: "sending_campaigns.json",
} as const;

export type ReportFolderFiles = {
  folder: string;
  date: string;
  offer: string;
  sub1: string;
  sub2: string;
  offerSub2: string;
  conversions: string;
  /** Optional export; null when the folder has none. */
  sendingCampaigns: string | null;
};

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isDateArgument(value: string): boolean {
  return DATE_RE.test(value);
}

export function resolveDateFolder(inputPathOrDate: string, reportsRoot = loadConfig().reportsRoot): string {
  if (!isDateArgument(inputPathOrDate)) {
    return inputPathOrDate;
  }
  if (!reportsRoot) {
    throw new Error("Missing ATTRIBUTION_REPORTS_ROOT. Put it in .env.local or pass a folder path");
  }
  return path.join(reportsRoot, inputPathOrDate);
}

function requireReport(dateFolder: string, fileName: string, label: string): string {
  const filePath = path.join(dateFolder, fileName);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Missing ${label} report: ${filePath}`);
  }
  return filePath;
}

export function getEntityDateJson(dateFolder: string): string {
  return requireReport(dateFolder, REPORT_FILE_NAMES.date, "entity date");
}

export function getEntityOfferJson(dateFolder: string): string {
  return requireReport(dateFolder, REPORT_FILE_NAMES.offer, "entity offer");
}

export function getEntitySub1Json(dateFolder: string): string {
  return requireReport(dateFolder, REPORT_FILE_NAMES.sub1, "entity sub1");
}

export function getEntitySub2Json(dateFolder: string): string {
  return requireReport(dateFolder, REPORT_FILE_NAMES.sub2, "entity sub2");
}

export function getEntityOfferSub2Json(dateFolder: string): string {
  return requireReport(dateFolder, REPORT_FILE_NAMES.offerSub2, "entity offer×sub2");
}

export function getConversionsJson(dateFolder: string): string {
  return requireReport(dateFolder, REPORT_FILE_NAMES.conversions, "conversions");
}

export function findSendingCampaignsJson(dateFolder: string): string | null {
  const filePath = path.join(dateFolder, REPORT_FILE_NAMES.sendingCampaigns);
  return fs.existsSync(filePath) ? filePath : null;
}

export function locateReportFiles(dateFolder: string): ReportFolderFiles {
  if (!fs.existsSync(dateFolder)) {
    throw new Error(`Folder not found: ${dateFolder}`);
  }
  return {
    folder: dateFolder,
    date: getEntityDateJson(dateFolder),
    offer: getEntityOfferJson(dateFolder),
    sub1: getEntitySub1Json(dateFolder),
    sub2: getEntitySub2Json(dateFolder),
    offerSub2: getEntityOfferSub2Json(dateFolder),
    conversions: getConversionsJson(dateFolder),
    sendingCampaigns: findSendingCampaignsJson(dateFolder),
  };
}
