export { createCollector, type CollectorSources, type CreateCollectorOptions } from "./collector/createCollector";
export { TrackingCollector, type CollectorConfig } from "./collector/trackingCollector";
export { SendingCollector } from "./collector/sendingCollector";
export type { CollectorSnapshot, CollectorState, RangeMetrics, VolumeProvider } from "./collector/types";
export { loadConfig, requireEnv, type AttributionConfig } from "./config/env";
export { attributeReports, type AttributeReportsInput } from "./attribution/attributeReports";
export { CampaignEnricher } from "./attribution/campaignEnricher";
export type * from "./attribution/types";
export { VolumeService } from "./volume/volumeService";
export { createSupabaseVolumeBlobStore, type VolumeBlobStore } from "./volume/volumeBlobStore";
export type { VolumeMap, VolumeMode, VolumeResult } from "./volume/types";
export type * from "./sources/types";
export type * from "./tracking/types";
export { parseSub1, tryParseSub1 } from "./identifiers/parseSub1";
export { parseSub2 } from "./identifiers/parseSub2";
export { parseCampaignName, tryParseCampaignName } from "./identifiers/parseCampaignName";
export { buildAttributionWorkbook, writeAttributionXlsx } from "./export/writeAttributionXlsx";
export { ParseError, RateLimitError, UpstreamError } from "./lib/errors";
