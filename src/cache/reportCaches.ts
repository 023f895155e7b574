import type { AttributionConfig } from "../config/env";
import type { Conversion, EntityReport } from "../tracking/types";
import type { VolumeResult } from "../volume/types";
import { CacheStore } from "./cacheStore";

export type ReportCaches = {
  partnerClicks: CacheStore<EntityReport>;
  offerPartnerClicks: CacheStore<EntityReport>;
  conversions: CacheStore<Conversion[]>;
  volume: CacheStore<VolumeResult>;
};

type CacheTtls = Pick<AttributionConfig, "partnerCacheRefreshMs" | "volumeEstimateTtlMs">;

/** Range-keyed caches owned by the collector. Volume entries carry their own TTL. */
export function createReportCaches(config: CacheTtls, now?: () => number): ReportCaches {
  const reportTtl = { ttlMs: config.partnerCacheRefreshMs, now };
  return {
    partnerClicks: new CacheStore<EntityReport>(reportTtl),
    offerPartnerClicks: new CacheStore<EntityReport>(reportTtl),
    conversions: new CacheStore<Conversion[]>(reportTtl),
    volume: new CacheStore<VolumeResult>({ ttlMs: config.volumeEstimateTtlMs, now }),
  };
}
