import { isValidVolumeKey, resolvePartnerGroup } from "../identifiers/parseSub2";
import { sumVolumes } from "./strategies";
import type { VolumeMap, VolumeMode, VolumeResult } from "./types";

export type ResolvedVolume = {
  volume: number;
  mode: VolumeMode;
};

export type PartnerVolumeInput = {
  volume: VolumeResult;
  knownPartners: Set<string>;
  grandTotalClicks: number;
  grandTotalConversions: number;
  totalEspSends: number;
};

export type PartnerVolumeResolver = {
  hasMatchingVolume: boolean;
  totalEspSends: number;
  proportionalVolume(clicks: number, conversions: number): number;
  resolveVolume(dataSetCode: string, clicks: number, conversions: number): ResolvedVolume;
  resolvePartnerVolume(partnerKey: string, clicks: number, conversions: number): ResolvedVolume;
};

/** First non-zero of the range total, the ESP send totals and the volume map itself. */
export function resolveTotalEspSends(rangeTotal: number, espSent: number[], volumes: VolumeMap): number {
  if (rangeTotal > 0) return rangeTotal;
  const espTotal = espSent.reduce((total, sent) => total + sent, 0);
  if (espTotal > 0) return espTotal;
  return sumVolumes(volumes);
}

export function hasMatchingVolume(volumes: VolumeMap, knownPartners: Set<string>): boolean {
  const keys = Object.keys(volumes);
  if (keys.length <= 2) return false;
  return keys.some((key) => isValidVolumeKey(key) && knownPartners.has(resolvePartnerGroup(key).key));
}

export function createPartnerVolumeResolver(input: PartnerVolumeInput): PartnerVolumeResolver {
  const volumes = input.volume.volumes;
  const matching = hasMatchingVolume(volumes, input.knownPartners);
  const { grandTotalClicks, grandTotalConversions, totalEspSends } = input;

  const proportionalVolume = (clicks: number, conversions: number): number => {
    if (totalEspSends <= 0) return 0;
    if (grandTotalClicks > 0) return Math.floor((clicks / grandTotalClicks) * totalEspSends);
    if (grandTotalConversions > 0) return Math.floor((conversions / grandTotalConversions) * totalEspSends);
    return 0;
  };

  const estimated = (clicks: number, conversions: number): ResolvedVolume => ({
    volume: proportionalVolume(clicks, conversions),
    mode: "estimated",
  });

  return {
    hasMatchingVolume: matching,
    totalEspSends,
    proportionalVolume,

    resolveVolume(dataSetCode, clicks, conversions) {
      if (matching) {
        const direct = volumes[dataSetCode.toUpperCase()] ?? 0;
        if (direct > 0) return { volume: direct, mode: input.volume.mode };
      }
      return estimated(clicks, conversions);
    },

    resolvePartnerVolume(partnerKey, clicks, conversions) {
      if (matching) {
        let total = 0;
        for (const [key, sent] of Object.entries(volumes)) {
          if (isValidVolumeKey(key) && resolvePartnerGroup(key).key === partnerKey) total += sent;
        }
        if (total > 0) return { volume: total, mode: input.volume.mode };
      }
      return estimated(clicks, conversions);
    },
  };
}
