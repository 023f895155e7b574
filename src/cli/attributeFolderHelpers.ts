import path from "node:path";
import { attributeReports } from "../attribution/attributeReports";
import type { AttributionReport } from "../attribution/types";
import { readReportFolder } from "../fs/readReportFolder";
import { isDateArgument } from "../fs/reportLocator";
import { lookbackRange, parseIsoDate, toIsoDate, type DateRange } from "../lib/dates";
import { processConversions } from "../tracking/processRecords";
import type { Conversion } from "../tracking/types";

export const DEFAULT_WORKBOOK_NAME = "attribution.xlsx";

export type FolderAttribution = {
  range: DateRange;
  report: AttributionReport;
};

/** Folder named for a date ends the window on that date; otherwise the latest conversion does. */
export function resolveAttributionRange(
  dateFolder: string,
  conversions: Conversion[],
  lookbackDays: number,
  now: Date
): DateRange {
  const folderName = path.basename(path.resolve(dateFolder));
  let end = toIsoDate(now);
  if (isDateArgument(folderName)) {
    end = folderName;
  } else {
    const dates = conversions.map((conv) => conv.date).filter(Boolean).sort();
    const latest = dates[dates.length - 1];
    if (latest) end = latest;
  }
  return lookbackRange(parseIsoDate(end), lookbackDays);
}

export function defaultOutPath(dateFolder: string): string {
  return path.join(dateFolder, DEFAULT_WORKBOOK_NAME);
}

export function attributeFolder(dateFolder: string, lookbackDays: number, now: Date): FolderAttribution {
  const data = readReportFolder(dateFolder);
  const conversions = processConversions(data.conversions);
  const range = resolveAttributionRange(dateFolder, conversions, lookbackDays, now);

  const report = attributeReports({
    dateReport: data.dateReport,
    offerReport: data.offerReport,
    sub1Report: data.sub1Report,
    sub2Report: data.sub2Report,
    offerSub2Report: data.offerSub2Report,
    conversions,
    sendingCampaigns: data.sendingCampaigns,
    range,
    now: new Date(`${range.end}T23:59:59Z`),
  });
  return { range, report };
}
