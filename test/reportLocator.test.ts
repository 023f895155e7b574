import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import {
  REPORT_FILE_NAMES,
  getEntityDateJson,
  locateReportFiles,
  resolveDateFolder,
} from "../src/fs/reportLocator";

function makeFolder(name: string): string {
  const tmpDir = path.resolve(__dirname, "tmp", `${name}-${Date.now()}`);
  fs.mkdirSync(tmpDir, { recursive: true });
  return tmpDir;
}

function writeRequired(folder: string) {
  const required = [
    REPORT_FILE_NAMES.date,
    REPORT_FILE_NAMES.offer,
    REPORT_FILE_NAMES.sub1,
    REPORT_FILE_NAMES.sub2,
    REPORT_FILE_NAMES.offerSub2,
    REPORT_FILE_NAMES.conversions,
  ];
  for (const name of required) {
    fs.writeFileSync(path.join(folder, name), "{}");
  }
}

describe("reportLocator", () => {
  it("joins a date onto the reports root", () => {
    expect(resolveDateFolder("2026-01-26", "/data/attribution")).toBe(path.join("/data/attribution", "2026-01-26"));
  });

  it("passes folder paths through", () => {
    expect(resolveDateFolder("./exports/jan", null)).toBe("./exports/jan");
  });

  it("throws for a date without a reports root", () => {
    expect(() => resolveDateFolder("2026-01-26", null)).toThrow(/Missing ATTRIBUTION_REPORTS_ROOT/);
  });

  it("throws when a required report is missing", () => {
    const tmpDir = makeFolder("missing-date");
    expect(() => getEntityDateJson(tmpDir)).toThrow(
      `Missing entity date report: ${path.join(tmpDir, "entity_date.json")}`
    );
  });

  it("names the first missing report", () => {
    const tmpDir = makeFolder("missing-offer");
    fs.writeFileSync(path.join(tmpDir, REPORT_FILE_NAMES.date), "{}");
    expect(() => locateReportFiles(tmpDir)).toThrow(/Missing entity offer report/);
  });

  it("treats the sending campaigns export as optional", () => {
    const tmpDir = makeFolder("optional-sending");
    writeRequired(tmpDir);

    expect(locateReportFiles(tmpDir).sendingCampaigns).toBeNull();

    fs.writeFileSync(path.join(tmpDir, REPORT_FILE_NAMES.sendingCampaigns), "[]");
    const files = locateReportFiles(tmpDir);
    expect(files.sendingCampaigns).toBe(path.join(tmpDir, "sending_campaigns.json"));
    expect(files.offerSub2).toBe(path.join(tmpDir, "entity_offer_sub2.json"));
  });

  it("throws for a missing folder", () => {
    const missing = path.resolve(__dirname, "tmp", "does-not-exist");
    expect(() => locateReportFiles(missing)).toThrow(`Folder not found: ${missing}`);
  });
});
