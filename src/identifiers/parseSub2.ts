import {
  DATA_PARTNER_NAMES,
  DATA_SET_CODE_OVERRIDES,
  INTERNAL_PARTNER_KEY,
  PARTNER_GROUP_NAMES,
  SUB2_SENTINELS,
  VOLUME_KEY_SENTINELS,
} from "./catalog";

export type ParsedSub2 = {
  raw: string;
  dataSetCode: string;
  partnerPrefix: string;
  partnerName: string;
  isEmailHash: boolean;
};

export type PartnerGroup = {
  key: string;
  name: string;
};

const EMAIL_HASH_RE = /^[a-f0-9]{10}$/;

export const trimTrailingUnderscores = (value: string): string => value.replace(/_+$/, "");

const isTemplate = (value: string): boolean => value.includes("{{") || value.includes("}}");

/** Owner of a data-set code: exact override, then the prefix before the first `_`, then in-house. */
export function resolvePartnerGroup(dataSetCode: string): PartnerGroup {
  const upper = dataSetCode.toUpperCase();
  const override = DATA_SET_CODE_OVERRIDES[upper];
  if (override) {
    return { key: override, name: PARTNER_GROUP_NAMES[override] ?? override };
  }
  const prefix = upper.split("_")[0];
  const partnerName = DATA_PARTNER_NAMES[prefix];
  if (partnerName) return { key: prefix, name: partnerName };
  return { key: INTERNAL_PARTNER_KEY, name: PARTNER_GROUP_NAMES[INTERNAL_PARTNER_KEY] };
}

export function parseSub2(raw: string): ParsedSub2 | null {
  const value = raw.trim();
  if (!value) return null;

  if (EMAIL_HASH_RE.test(value)) {
    return { raw: value, dataSetCode: "", partnerPrefix: "", partnerName: "", isEmailHash: true };
  }
  if (isTemplate(value)) return null;

  const code = trimTrailingUnderscores(value);
  if (!code || SUB2_SENTINELS.has(code.toUpperCase())) return null;

  const group = resolvePartnerGroup(code);
  return {
    raw: value,
    dataSetCode: code,
    partnerPrefix: group.key,
    partnerName: group.name,
    isEmailHash: false,
  };
}

/** Keys of a volume map that can be matched against data-set codes. */
export function isValidVolumeKey(key: string): boolean {
  const value = key.trim();
  if (!value || isTemplate(value)) return false;
  return !VOLUME_KEY_SENTINELS.has(trimTrailingUnderscores(value).toUpperCase());
}

export function normalizeVolumeKey(key: string): string {
  return trimTrailingUnderscores(key.trim()).toUpperCase();
}
