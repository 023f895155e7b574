import { CampaignEnricher } from "../attribution/campaignEnricher";
import { createReportCaches } from "../cache/reportCaches";
import type { AttributionConfig } from "../config/env";
import type { SendingPlatformSource, TrackingNetworkSource } from "../sources/types";
import { createSupabaseVolumeBlobStore, type VolumeBlobStore } from "../volume/volumeBlobStore";
import { VolumeService } from "../volume/volumeService";
import { SendingCollector } from "./sendingCollector";
import { TrackingCollector } from "./trackingCollector";

export type CollectorSources = {
  tracking: TrackingNetworkSource;
  sending: SendingPlatformSource;
};

export type CreateCollectorOptions = {
  /** Defaults to Supabase Storage in the configured bucket; null keeps exact volumes in memory only. */
  blobStore?: VolumeBlobStore | null;
  now?: () => Date;
};

/** Wires the caches, sending collector, enricher and volume service around one tracking collector. */
export function createCollector(
  config: AttributionConfig,
  sources: CollectorSources,
  options: CreateCollectorOptions = {}
): TrackingCollector {
  const now = options.now ?? (() => new Date());
  const nowMs = () => now().getTime();
  const caches = createReportCaches(config, nowMs);

  const sending = new SendingCollector({
    source: sources.sending,
    lookbackDays: config.lookbackDays,
    requestTimeoutMs: config.requestTimeoutMs,
    now,
  });
  const enricher = new CampaignEnricher({
    source: sources.sending,
    requestTimeoutMs: config.requestTimeoutMs,
    knownCampaigns: () => sending.getCampaigns(),
    now: nowMs,
  });
  const volume = new VolumeService({
    source: sources.sending,
    cache: caches.volume,
    config,
    blobStore: options.blobStore === undefined ? createSupabaseVolumeBlobStore(config.volumeBlobBucket) : options.blobStore,
    periodicTotal: () => sending.getTotalSent(),
    now: nowMs,
  });

  return new TrackingCollector({
    tracking: sources.tracking,
    sending,
    enricher,
    volume,
    caches,
    config,
    now,
  });
}
