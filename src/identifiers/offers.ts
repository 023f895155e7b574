import { OFFER_TYPES, type OfferType } from "./catalog";

export function isCpmOffer(offerName: string): boolean {
  return offerName.toUpperCase().includes("CPM");
}

export function getOfferType(offerName: string): OfferType {
  const upper = offerName.toUpperCase();
  return OFFER_TYPES.find((type) => upper.includes(type)) ?? "OTHER";
}

/** Offer names end with their id, e.g. `Life Cover CPM (1944)`. */
export function extractOfferIdFromName(offerName: string): string {
  const open = offerName.lastIndexOf("(");
  if (open === -1) return "";
  const close = offerName.indexOf(")", open);
  if (close === -1) return "";
  const candidate = offerName.slice(open + 1, close).trim();
  return /^\d+$/.test(candidate) ? candidate : "";
}
