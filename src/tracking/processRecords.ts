import { tryParseSub1 } from "../identifiers/parseSub1";
import { parseSub2 } from "../identifiers/parseSub2";
import { parseTrackingTimestamp } from "../identifiers/timestamps";
import { ParseError } from "../lib/errors";
import type { Click, ClickRecord, Conversion, ConversionRecord, TagFields } from "./types";

function readTags(sub1: string, sub2: string): TagFields {
  const tags: TagFields = {
    propertyCode: "",
    propertyName: "",
    mailingId: "",
    parsedOfferId: "",
    dataSetCode: "",
    dataPartner: "",
  };
  const parsed = tryParseSub1(sub1);
  if (parsed.kind === "parsed") {
    tags.propertyCode = parsed.value.propertyCode ?? "";
    tags.propertyName = parsed.value.propertyName ?? "";
    tags.mailingId = parsed.value.mailingId ?? "";
    tags.parsedOfferId = parsed.value.offerId ?? "";
  }
  const partner = parseSub2(sub2);
  if (partner && !partner.isEmailHash) {
    tags.dataSetCode = partner.dataSetCode;
    tags.dataPartner = partner.partnerName;
  }
  return tags;
}

function readClickTimestamp(value: string): Date | null {
  try {
    return parseTrackingTimestamp(value);
  } catch (err) {
    if (err instanceof ParseError) return null;
    throw err;
  }
}

export function processClick(record: ClickRecord): Click {
  const timestamp = readClickTimestamp(record.timestamp);
  return {
    clickId: record.clickId,
    offerId: record.offerId,
    offerName: record.offerName,
    sub1: record.sub1,
    sub2: record.sub2,
    timestamp: timestamp ? timestamp.toISOString() : null,
    date: timestamp ? timestamp.toISOString().slice(0, 10) : "",
    ...readTags(record.sub1, record.sub2),
  };
}

/** The relationship block, when present, carries the canonical offer id and name. */
export function processConversion(record: ConversionRecord): Conversion {
  const offer = record.relationship?.offer;
  const conversionTime =
    record.conversionUnixTimestamp > 0 ? new Date(record.conversionUnixTimestamp * 1000).toISOString() : null;
  return {
    conversionId: record.conversionId,
    offerId: offer ? String(offer.networkOfferId) : record.offerId,
    offerName: offer ? offer.name : record.offerName,
    status: record.status ?? "",
    revenue: record.revenue,
    payout: record.payout,
    sub1: record.sub1,
    sub2: record.sub2,
    conversionTime,
    date: conversionTime ? conversionTime.slice(0, 10) : "",
    ...readTags(record.sub1, record.sub2),
  };
}

export const processClicks = (records: ClickRecord[]): Click[] => records.map(processClick);

export const processConversions = (records: ConversionRecord[]): Conversion[] =>
  records.map(processConversion);
