import type { AttributionReport, DailyPerformance } from "../attribution/types";
import type { DateRange } from "../lib/dates";
import type { VolumeResult } from "../volume/types";

export type CollectorState = "idle" | "fetching_full" | "fetching_incremental" | "stopped";

/** Everything readers see, replaced as one frozen object per publish. */
export type CollectorSnapshot = AttributionReport & {
  lastFetch: string;
};

export type RangeMetrics = {
  range: DateRange;
  clicks: number;
  conversions: number;
  revenue: number;
  payout: number;
  conversionRate: number;
  epc: number;
  days: number;
  daily: DailyPerformance[];
};

/** The slice of VolumeService the collector depends on. */
export type VolumeProvider = {
  getVolumeForRange(range: DateRange): Promise<VolumeResult>;
  getTotalSendsForRange(range: DateRange): Promise<number>;
  shutdown(): Promise<void>;
};
