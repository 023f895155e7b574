import { ParseError } from "../lib/errors";
import { isNumeric } from "./parseSub1";

export type ParsedCampaignName = {
  date: string;
  property: string;
  offerId: string;
  offerName: string;
  segment: string;
};

const LEADING_DATE_RE = /^\d{8}$/;

/** `02052025_HRO_1944_LifeCover_OPENERS`: date, property, offer id, offer name, segment. */
export function parseCampaignName(name: string): ParsedCampaignName {
  if (!name) {
    throw new ParseError(name, "empty campaign name");
  }
  let parts = name.split("_");
  if (parts.length < 3) {
    throw new ParseError(name, "expected at least three '_' separated segments");
  }

  const result: ParsedCampaignName = { date: "", property: "", offerId: "", offerName: "", segment: "" };
  if (LEADING_DATE_RE.test(parts[0])) {
    result.date = parts[0];
    parts = parts.slice(1);
  }
  if (parts.length) {
    result.property = parts[0].toUpperCase();
    parts = parts.slice(1);
  }
  if (parts.length && isNumeric(parts[0])) {
    result.offerId = parts[0];
    parts = parts.slice(1);
  }
  if (parts.length >= 2) {
    result.offerName = parts.slice(0, -1).join("_");
    result.segment = parts[parts.length - 1];
  } else if (parts.length === 1) {
    result.offerName = parts[0];
  }
  return result;
}

export function tryParseCampaignName(name: string): ParsedCampaignName | null {
  try {
    return parseCampaignName(name);
  } catch (err) {
    if (err instanceof ParseError) return null;
    throw err;
  }
}
