import { ParseError } from "../lib/errors";

// Offsets in minutes east of UTC.
const US_ZONE_OFFSETS: Record<string, number> = {
  UTC: 0,
  GMT: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
  AKST: -540,
  AKDT: -480,
  HST: -600,
};

const US_FORMAT_RE = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2})(?: ([A-Z]{2,5}))?$/;
const ISO_DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RFC3339_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

function utcFromParts(parts: string[], offsetMinutes: number): Date | null {
  const [year, month, day, hour, minute, second] = parts.map((part) => Number.parseInt(part, 10));
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return new Date(ms - offsetMinutes * 60 * 1000);
}

/**
 * Parses the timestamp shapes the tracking network emits. Returns null for an
 * empty value. Zone abbreviations outside the US table are read as UTC.
 */
export function parseTrackingTimestamp(value: string): Date | null {
  const raw = value.trim();
  if (!raw) return null;

  let parsed: Date | null = null;
  const us = raw.match(US_FORMAT_RE);
  const isoDateTime = raw.match(ISO_DATETIME_RE);
  const isoDate = raw.match(ISO_DATE_RE);
  if (us) {
    const offset = us[7] ? US_ZONE_OFFSETS[us[7]] ?? 0 : 0;
    parsed = utcFromParts([us[3], us[1], us[2], us[4], us[5], us[6]], offset);
  } else if (isoDateTime) {
    parsed = utcFromParts(isoDateTime.slice(1, 7), 0);
  } else if (isoDate) {
    parsed = utcFromParts([...isoDate.slice(1, 4), "0", "0", "0"], 0);
  } else if (RFC3339_RE.test(raw)) {
    const date = new Date(raw);
    parsed = Number.isNaN(date.getTime()) ? null : date;
  }

  if (!parsed) {
    throw new ParseError(raw, "unsupported timestamp format");
  }
  return parsed;
}
