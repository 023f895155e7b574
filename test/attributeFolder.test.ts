import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { attributeFolder, defaultOutPath, resolveAttributionRange } from "../src/cli/attributeFolderHelpers";
import { SHEET_NAMES, writeAttributionXlsx } from "../src/export/writeAttributionXlsx";
import { decodeConversionRecords, decodeEntityReport, decodeSendingCampaigns } from "../src/fs/readReportFolder";
import { REPORT_FILE_NAMES } from "../src/fs/reportLocator";
import { entityReport } from "./utils/fakeSources";
import { conversion, conversionRecord, sendingCampaign, unixSeconds } from "./utils/fakeRecords";

type Cell = string | number | boolean;

const MAILING = "3219537100";
const SUB1 = `TDIH_407_3926_01262026_${MAILING}`;
const LIFE_COVER = { id: "407", label: "Life Cover (407)" };

const dayColumn = (iso: string) => ({ date: { id: String(unixSeconds(`${iso}T00:00:00Z`)), label: iso } });

function writeJson(folder: string, name: string, value: unknown) {
  fs.writeFileSync(path.join(folder, name), JSON.stringify(value, null, 2));
}

function makeReportFolder(withSending: boolean): string {
  const folder = path.resolve(__dirname, "tmp", `attribute-${Date.now()}-${withSending ? "linked" : "plain"}`, "2026-01-26");
  fs.mkdirSync(folder, { recursive: true });

  writeJson(
    folder,
    REPORT_FILE_NAMES.date,
    entityReport([
      { columns: dayColumn("2026-01-25"), clicks: 100, conversions: 2, revenue: 300, payout: 200 },
      { columns: dayColumn("2026-01-26"), clicks: 50, conversions: 1, revenue: 225, payout: 150 },
    ])
  );
  writeJson(
    folder,
    REPORT_FILE_NAMES.offer,
    entityReport([{ columns: { offer: LIFE_COVER }, clicks: 150, conversions: 3, revenue: 525, payout: 350 }])
  );
  writeJson(
    folder,
    REPORT_FILE_NAMES.sub1,
    entityReport([{ columns: { sub1: { label: SUB1 } }, clicks: 150, conversions: 3, revenue: 525, payout: 350 }])
  );
  writeJson(folder, REPORT_FILE_NAMES.sub2, entityReport([{ columns: { sub2: { label: "GLB_AUTO" } }, clicks: 150 }]));
  writeJson(
    folder,
    REPORT_FILE_NAMES.offerSub2,
    entityReport([{ columns: { offer: LIFE_COVER, sub2: { label: "GLB_AUTO" } }, clicks: 150 }])
  );
  writeJson(folder, REPORT_FILE_NAMES.conversions, [
    conversionRecord({ sub1: SUB1, sub2: "GLB_AUTO", revenue: 300, payout: 200, at: "2026-01-25T12:00:00Z" }),
    conversionRecord({ sub1: SUB1, sub2: "GLB_AUTO", revenue: 225, payout: 150, at: "2026-01-26T15:00:00Z" }),
  ]);
  if (withSending) {
    writeJson(folder, REPORT_FILE_NAMES.sendingCampaigns, [
      sendingCampaign({ id: MAILING, sent: 10000, delivered: 10000, uniqueOpens: 500 }),
    ]);
  }
  return folder;
}

function readSheet(filePath: string, sheetName: string): Cell[][] {
  const workbook = XLSX.readFile(filePath);
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) throw new Error(`Sheet missing: ${sheetName}`);
  return XLSX.utils.sheet_to_json<Cell[]>(sheet, { header: 1 });
}

function cellByHeader(rows: Cell[][], header: string, rowIndex = 1): Cell | undefined {
  const column = rows[0]?.indexOf(header) ?? -1;
  return rows[rowIndex]?.[column];
}

describe("report decoding", () => {
  it("reads snake_case conversion exports", () => {
    const records = decodeConversionRecords(
      {
        conversions: [
          {
            conversion_id: 77,
            network_offer_id: 407,
            offer_name: "Life Cover (407)",
            revenue: "12.5",
            payout: 5,
            sub1: SUB1,
            sub2: "GLB_AUTO",
            conversion_unix_timestamp: 1769439600,
          },
        ],
      },
      "conversions.json"
    );
    expect(records).toEqual([
      {
        conversionId: "77",
        offerId: "407",
        offerName: "Life Cover (407)",
        revenue: 12.5,
        payout: 5,
        sub1: SUB1,
        sub2: "GLB_AUTO",
        conversionUnixTimestamp: 1769439600,
      },
    ]);
  });

  it("reads entity rows with snake_case reporting", () => {
    const report = decodeEntityReport(
      {
        table: [
          {
            columns: [{ column_type: "offer", id: "407", label: "Life Cover (407)" }],
            reporting: { total_click: 12, conversions: 1, revenue: 40, payout: 30 },
          },
        ],
      },
      "entity_offer.json"
    );
    expect(report).toEqual({
      table: [
        {
          columns: [{ columnType: "offer", id: "407", label: "Life Cover (407)" }],
          reporting: { totalClick: 12, conversions: 1, revenue: 40, payout: 30 },
        },
      ],
    });
  });

  it("names the bad field", () => {
    expect(() =>
      decodeEntityReport({ table: [{ columns: [], reporting: { revenue: "abc" } }] }, "entity_date.json")
    ).toThrow("Invalid report file entity_date.json: table[0].reporting.revenue must be a number");
    expect(() => decodeSendingCampaigns({ campaigns: "nope" }, "sending_campaigns.json")).toThrow(
      "Invalid report file sending_campaigns.json: campaigns must be an array"
    );
  });
});

describe("resolveAttributionRange", () => {
  const now = new Date("2026-02-10T08:00:00Z");

  it("ends on the folder date", () => {
    expect(resolveAttributionRange("/exports/2026-01-26", [], 30, now)).toEqual({
      start: "2025-12-27",
      end: "2026-01-26",
    });
  });

  it("ends on the latest conversion for other folders", () => {
    const conversions = [conversion({ at: "2026-01-22T09:00:00Z" }), conversion({ at: "2026-01-20T09:00:00Z" })];
    expect(resolveAttributionRange("/exports/january", conversions, 7, now)).toEqual({
      start: "2026-01-15",
      end: "2026-01-22",
    });
  });

  it("ends today without conversions", () => {
    expect(resolveAttributionRange("/exports/january", [], 1, now)).toEqual({ start: "2026-02-09", end: "2026-02-10" });
  });
});

describe("attributeFolder", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("links campaigns from the sending export and writes the workbook", () => {
    const folder = makeReportFolder(true);
    const { range, report } = attributeFolder(folder, 1, new Date("2026-02-10T08:00:00Z"));

    expect(range).toEqual({ start: "2026-01-25", end: "2026-01-26" });
    const [campaign] = report.metrics.campaignRevenue;
    expect(campaign).toMatchObject({ mailingId: MAILING, revenue: 525, sendingLinked: true, ecpm: 52.5, rpm: 52.5 });
    expect(report.reconciliation.method).toBe("none");
    expect(report.espRevenue.map((esp) => [esp.espName, esp.revenue])).toEqual([["SparkPost", 525]]);
    expect(report.dataPartners?.partners.map((partner) => [partner.partnerKey, partner.clicks, partner.revenue])).toEqual([
      ["GLB", 150, 525],
    ]);

    const outPath = writeAttributionXlsx(report, defaultOutPath(folder));
    expect(outPath).toBe(path.join(folder, "attribution.xlsx"));
    expect(XLSX.readFile(outPath).SheetNames).toEqual([...SHEET_NAMES]);

    const campaigns = readSheet(outPath, "Campaigns");
    expect(cellByHeader(campaigns, "Mailing ID")).toBe(MAILING);
    expect(cellByHeader(campaigns, "Revenue")).toBe(525);
    expect(cellByHeader(campaigns, "eCPM")).toBe(52.5);
    expect(cellByHeader(campaigns, "Revenue per Open")).toBe(1.05);
    expect(cellByHeader(campaigns, "Sending Linked")).toBe(true);

    const properties = readSheet(outPath, "Properties");
    expect(cellByHeader(properties, "Property Code")).toBe("TDIH");
    expect(cellByHeader(properties, "Property")).toBe("thisdayinhistory.example");

    const reconciliation = readSheet(outPath, "Reconciliation");
    expect(reconciliation.slice(0, 5)).toEqual([
      ["Metric", "Value"],
      ["Authoritative Total", 525],
      ["Conversion-Based Total", 525],
      ["Gap", 0],
      ["Method", "none"],
    ]);

    const partners = readSheet(outPath, "Data Partners");
    expect(cellByHeader(partners, "Partner Key")).toBe("GLB");
    expect(cellByHeader(partners, "Clicks")).toBe(150);
  });

  it("leaves campaigns unlinked without a sending export", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const folder = makeReportFolder(false);
    const { report } = attributeFolder(folder, 1, new Date("2026-02-10T08:00:00Z"));

    expect(report.metrics.campaignRevenue[0]?.sendingLinked).toBe(false);
    expect(report.metrics.campaignRevenue[0]?.ecpm).toBe(0);
    expect(warn).toHaveBeenCalledWith(`Attribution: no sending campaigns export in ${folder}, campaigns stay unlinked`);
  });
});
