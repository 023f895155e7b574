/** Content properties keyed by the code used as the first sub1 segment. */
export const PROPERTY_NAMES: Record<string, string> = {
  FTT: "financetipstoday.example",
  DHF: "dailyhistoryfacts.example",
  SFT: "savvyfinancetips.example",
  EHG: "everydayhealthguide.example",
  BPG: "bestpropertyguides.example",
  JOTD: "jokeoftheday.example",
  SH: "sportshistory.example",
  NPY: "newproductsforyou.example",
  FNI: "financialsinfo.example",
  AFI: "affordinginsurance.example",
  SBD: "beautydiscounts.example",
  OTD: "theoftheday.example",
  HRO: "horoscopeinfo.example",
  TDIH: "thisdayinhistory.example",
  OTDD: "onthisdaydaily.example",
  FMO: "financialmoney.example",
  ALC: "islandhistoryblog.example",
  MHH: "healthyhabits.example",
  GHH: "goodhomehub.example",
  DIH: "dayinhistory.example",
  FTD: "financialtipsdaily.example",
  FYF: "findyourfit.example",
  IGN: "in-house.example",
};

export const INTERNAL_PARTNER_KEY = "IGN";

/** External data partners by data-set prefix. Anything else is in-house data. */
export const DATA_PARTNER_NAMES: Record<string, string> = {
  ATT: "Attribution Data Co",
  GLB: "Globe Audience",
  SCO: "Scout Connect",
  M77: "Meridian 77",
};

export const PARTNER_GROUP_NAMES: Record<string, string> = {
  ...DATA_PARTNER_NAMES,
  [INTERNAL_PARTNER_KEY]: "In-House",
};

// Data-set codes whose owner does not follow the prefix rule.
export const DATA_SET_CODE_OVERRIDES: Record<string, string> = {
  ATT: "IGN",
  GLB_BR: "IGN",
  SCO_BATH: "IGN",
  M77_HW: "IGN",
  BANKRUPTCYSEND: "ATT",
  HAR_HOME_09232024: "GLB",
  MAS_SP: "M77",
  SENIOR_SIGNAL: "IGN",
};

/** Prefixes that mark a sending-platform segment as partner data. */
export const SEGMENT_PARTNER_PREFIXES = ["ATT", "GLB", "SCO", "M77", "IGN", "HAR", "EVS", "MAS"];

export const SUB2_SENTINELS = new Set(["N/A", "NA", "NULL", "UNDEFINED", "TEST", "TESTDATASET", "WMRY"]);

export const VOLUME_KEY_SENTINELS = new Set(["N/A", "NA", "WMRY", "NULL", "TESTDATASET"]);

export const OFFER_TYPES = ["CPM", "CPA", "CPL", "CPS", "CPC", "CPV"] as const;

export type OfferType = (typeof OFFER_TYPES)[number] | "OTHER";
