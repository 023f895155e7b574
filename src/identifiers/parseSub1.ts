import { ParseError } from "../lib/errors";
import { PROPERTY_NAMES } from "./catalog";

export type ParsedSub1 = {
  raw: string;
  propertyCode?: string;
  propertyName?: string;
  offerId?: string;
  /** mmddyyyy, as it appears in the tag. */
  date?: string;
  mailingId?: string;
};

export type Sub1ParseResult =
  | { kind: "parsed"; value: ParsedSub1 }
  | { kind: "unrecognized"; reason: string };

const SUB1_DATE_RE = /^\d{8}$/;

export function isNumeric(value: string): boolean {
  return /^\d+$/.test(value);
}

export function isValidPropertyCode(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(PROPERTY_NAMES, code.toUpperCase());
}

export function getPropertyName(code: string): string {
  const upper = code.toUpperCase();
  return isValidPropertyCode(upper) ? PROPERTY_NAMES[upper] : code;
}

/**
 * Tags look like `TDIH_407_3926_01262026_3219537162`:
 * property, offer, creative, send date (mmddyyyy), mailing id. The property
 * is sometimes missing (`400_3875_01262026_3219015617`).
 */
export function parseSub1(raw: string): ParsedSub1 {
  if (!raw) {
    throw new ParseError(raw, "empty sub1");
  }
  let parts = raw.split("_");
  if (parts.length < 2) {
    throw new ParseError(raw, "expected at least two '_' separated segments");
  }

  const parsed: ParsedSub1 = { raw };
  const first = parts[0].toUpperCase();
  if (isValidPropertyCode(first)) {
    parsed.propertyCode = first;
    parsed.propertyName = PROPERTY_NAMES[first];
    parts = parts.slice(1);
  } else if (!isNumeric(parts[0])) {
    parsed.propertyCode = first;
    parsed.propertyName = first;
    parts = parts.slice(1);
  }

  if (parts.length && isNumeric(parts[0])) {
    parsed.offerId = parts[0];
  }

  const dateIndex = parts.findIndex((part) => SUB1_DATE_RE.test(part));
  if (dateIndex >= 0) {
    parsed.date = parts[dateIndex];
    const next = parts[dateIndex + 1];
    if (next) parsed.mailingId = next;
  }

  if (!parsed.mailingId && parts.length) {
    const last = parts[parts.length - 1];
    if (isNumeric(last) && last.length >= 5) parsed.mailingId = last;
  }

  return parsed;
}

export function tryParseSub1(raw: string): Sub1ParseResult {
  try {
    return { kind: "parsed", value: parseSub1(raw) };
  } catch (err) {
    if (err instanceof ParseError) return { kind: "unrecognized", reason: err.reason };
    throw err;
  }
}

/** mmddyyyy to YYYY-MM-DD, or null when the value is not a real calendar date. */
export function parseSub1Date(value: string): string | null {
  if (!SUB1_DATE_RE.test(value)) return null;
  const iso = `${value.slice(4, 8)}-${value.slice(0, 2)}-${value.slice(2, 4)}`;
  const parsed = new Date(`${iso}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== iso) return null;
  return iso;
}
