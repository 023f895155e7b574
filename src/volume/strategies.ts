import { SEGMENT_PARTNER_PREFIXES } from "../identifiers/catalog";
import { isValidVolumeKey, normalizeVolumeKey, trimTrailingUnderscores } from "../identifiers/parseSub2";
import { mapHeaders, parseCsv, parseIntSafe } from "../lib/csv";
import type { ListSends, MailingList, SegmentSends } from "../sources/types";
import type { VolumeMap } from "./types";

export type Strategy<T> = () => Promise<T | null>;

// Stripped in this order, each at most once.
const ENGAGEMENT_SUFFIXES = [
  "_OPENERS",
  "_CLICKERS",
  "_ALL",
  "_ACTIVE",
  "_INACTIVE",
  "_ABS",
  "_CAB",
  "_OPENS",
  "_CLICKS",
  "_ENGAGED",
  "_UNENGAGED",
  "_30D",
  "_60D",
  "_90D",
  "_7D",
  "_14D",
];

/** Runs strategies in order and returns the first non-null result. Later ones never start. */
export async function resolveFirst<T>(strategies: Strategy<T>[]): Promise<T | null> {
  for (const strategy of strategies) {
    const result = await strategy();
    if (result !== null) return result;
  }
  return null;
}

export function isPartnerSegment(segmentName: string): boolean {
  const upper = segmentName.trim().toUpperCase();
  return SEGMENT_PARTNER_PREFIXES.some((prefix) => upper === prefix || upper.startsWith(`${prefix}_`));
}

/** `M77_WIT_OPENERS` -> `M77_WIT`. */
export function extractDataSetCodeFromSegment(segmentName: string): string {
  let result = segmentName.trim().toUpperCase();
  for (const suffix of ENGAGEMENT_SUFFIXES) {
    if (result.endsWith(suffix)) {
      result = result.slice(0, -suffix.length);
    }
  }
  return trimTrailingUnderscores(result);
}

export function buildSegmentVolumes(rows: SegmentSends[]): VolumeMap {
  const volumes: VolumeMap = {};
  let matched = 0;
  for (const row of rows) {
    if (!row.segmentName.trim() || !row.sent || !isPartnerSegment(row.segmentName)) continue;
    const code = extractDataSetCodeFromSegment(row.segmentName);
    if (!code) continue;
    volumes[code] = (volumes[code] ?? 0) + row.sent;
    matched += 1;
  }
  console.log(
    `Volume: segment parsing matched ${matched} of ${rows.length} rows, ${Object.keys(volumes).length} data-set codes`
  );
  return volumes;
}

export function buildListVolumes(lists: MailingList[], rows: ListSends[]): VolumeMap {
  const nameById = new Map(lists.map((list) => [list.id, list.name] as const));
  const volumes: VolumeMap = {};
  for (const row of rows) {
    if (!row.listId || !row.sent) continue;
    const name = nameById.get(row.listId);
    if (!name) continue;
    const code = normalizeVolumeKey(name);
    if (!code) continue;
    volumes[code] = (volumes[code] ?? 0) + row.sent;
  }
  return volumes;
}

const CONTACT_ACTIVITY_HEADERS: Record<string, string[]> = {
  dataSet: ["data set", "dataset"],
  sent: ["sent", "sends"],
};

/** Aggregates a `data_set,sent` export per normalised data-set code. */
export function parseContactActivityCsv(content: string): VolumeMap {
  const rows = parseCsv(content);
  if (!rows.length) return {};
  const headerIndex = mapHeaders(rows[0], CONTACT_ACTIVITY_HEADERS);
  const dataSetIdx = headerIndex.dataSet;
  const sentIdx = headerIndex.sent;
  if (dataSetIdx === undefined || sentIdx === undefined) {
    throw new Error(`Contact activity export is missing data_set/sent columns: ${rows[0].join(",")}`);
  }

  const volumes: VolumeMap = {};
  for (const row of rows.slice(1)) {
    const rawKey = row[dataSetIdx] ?? "";
    const sent = parseIntSafe(row[sentIdx] ?? "");
    if (!sent || !isValidVolumeKey(rawKey)) continue;
    const code = normalizeVolumeKey(rawKey);
    if (!code) continue;
    volumes[code] = (volumes[code] ?? 0) + sent;
  }
  return volumes;
}

export const volumeEntryCount = (volumes: VolumeMap): number => Object.keys(volumes).length;

export const sumVolumes = (volumes: VolumeMap): number =>
  Object.values(volumes).reduce((total, value) => total + value, 0);
