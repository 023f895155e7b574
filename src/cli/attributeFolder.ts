import { loadConfig } from "../config/env";
import { writeAttributionXlsx } from "../export/writeAttributionXlsx";
import { resolveDateFolder } from "../fs/reportLocator";
import { attributeFolder, defaultOutPath } from "./attributeFolderHelpers";

function usage() {
  console.log("Usage: npm run attribute:folder -- <date-folder-or-YYYY-MM-DD> [--out <workbook.xlsx>]");
}

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

async function main() {
  const input = process.argv[2];
  if (!input || input.startsWith("--")) {
    usage();
    process.exit(1);
  }

  const config = loadConfig();
  const dateFolder = resolveDateFolder(input, config.reportsRoot);
  const outPath = getArg("--out") ?? defaultOutPath(dateFolder);

  const { range, report } = attributeFolder(dateFolder, config.lookbackDays, new Date());
  writeAttributionXlsx(report, outPath);

  const revenue = report.metrics.offerPerformance.reduce((total, offer) => total + offer.revenue, 0);
  console.log(
    `Attribution: ${range.start} to ${range.end}, ${report.metrics.campaignRevenue.length} campaigns, $${revenue.toFixed(2)} revenue, gap method ${report.reconciliation.method}`
  );
  console.log(`Attribution: wrote ${outPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
