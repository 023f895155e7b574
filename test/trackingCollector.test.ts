import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { CampaignEnricher } from "../src/attribution/campaignEnricher";
import { createReportCaches } from "../src/cache/reportCaches";
import { createCollector } from "../src/collector/createCollector";
import { SendingCollector } from "../src/collector/sendingCollector";
import { mergeTodayRows, TrackingCollector, type CollectorConfig } from "../src/collector/trackingCollector";
import type { VolumeProvider } from "../src/collector/types";
import type { AttributionConfig } from "../src/config/env";
import type { DateRange } from "../src/lib/dates";
import type { VolumeResult } from "../src/volume/types";
import { UpstreamError } from "../src/lib/errors";
import type { SendingPlatformSource, TrackingNetworkSource } from "../src/sources/types";
import type { ConversionsPage, EntityDimension, EntityReport } from "../src/tracking/types";
import { entityReport, fakeSendingSource, fakeTrackingSource } from "./utils/fakeSources";
import { clickRecord, conversionRecord, sendingCampaign, unixSeconds } from "./utils/fakeRecords";

const NOW = new Date("2026-01-26T18:00:00Z");
const MAILING = "3219537100";
const SUB1 = `TDIH_407_3926_01262026_${MAILING}`;
const LIFE_COVER = { id: "407", label: "Life Cover (407)" };

const dayColumn = (iso: string) => ({ date: { id: String(unixSeconds(`${iso}T00:00:00Z`)), label: iso } });

const config: CollectorConfig = {
  lookbackDays: 1,
  fetchIntervalMs: 60_000,
  sendingRefreshMs: 60_000,
  partnerCacheRefreshMs: 60_000,
  reportSpacingMs: 0,
  reportRetryDelayMs: 0,
  conversionSpacingMs: 0,
  requestTimeoutMs: 5_000,
};

const periodicReports: Record<string, EntityReport> = {
  date: entityReport([
    { columns: dayColumn("2026-01-25"), clicks: 100, conversions: 2, revenue: 300, payout: 200 },
    { columns: dayColumn("2026-01-26"), clicks: 50, conversions: 1, revenue: 225, payout: 150 },
  ]),
  offer: entityReport([{ columns: { offer: LIFE_COVER }, clicks: 150, conversions: 3, revenue: 525, payout: 350 }]),
  sub1: entityReport([{ columns: { sub1: { label: SUB1 } }, clicks: 150, conversions: 3, revenue: 525, payout: 350 }]),
  sub2: entityReport([{ columns: { sub2: { label: "GLB_AUTO" } }, clicks: 150 }]),
  "offer,sub2": entityReport([{ columns: { offer: LIFE_COVER, sub2: { label: "GLB_AUTO" } }, clicks: 150 }]),
};

const todayDateReport = entityReport([
  { columns: dayColumn("2026-01-26"), clicks: 80, conversions: 2, revenue: 400, payout: 300 },
]);

const rangeSub2Report = entityReport([{ columns: { sub2: { label: "GLB_AUTO" } }, clicks: 40 }]);

const isSingleDay = (range: DateRange, day: string) => range.start === day && range.end === day;

type Harness = {
  collector: TrackingCollector;
  tracking: TrackingNetworkSource;
  sending: SendingPlatformSource;
  volume: VolumeProvider;
  /** Report dimensions that fail, with the status they fail with. */
  failing: Map<string, number>;
  conversionsByDate: Map<string, ConversionsPage | Error>;
};

function makeHarness(): Harness {
  const failing = new Map<string, number>();
  const conversionsByDate = new Map<string, ConversionsPage | Error>([
    [
      "2026-01-25",
      {
        conversions: [conversionRecord({ sub1: SUB1, sub2: "GLB_AUTO", revenue: 300, payout: 200, at: "2026-01-25T12:00:00Z" })],
        paging: null,
      },
    ],
    [
      "2026-01-26",
      {
        conversions: [conversionRecord({ sub1: SUB1, sub2: "GLB_AUTO", revenue: 225, payout: 150, at: "2026-01-26T15:00:00Z" })],
        paging: null,
      },
    ],
  ]);

  const tracking = fakeTrackingSource({
    getEntityReport: vi.fn(async (dimensions: EntityDimension[], range: DateRange) => {
      const key = dimensions.join(",");
      const status = failing.get(key);
      if (status) {
        throw new UpstreamError({ source: "tracking", operation: "getEntityReport", status });
      }
      if (key === "date" && isSingleDay(range, "2026-01-26")) return todayDateReport;
      if (key === "sub2" && isSingleDay(range, "2026-01-26")) return rangeSub2Report;
      return periodicReports[key];
    }),
    getConversionsPage: vi.fn(async (date: string) => {
      const page = conversionsByDate.get(date) ?? { conversions: [], paging: null };
      if (page instanceof Error) throw page;
      return page;
    }),
    getClicks: vi.fn(async () => [
      clickRecord({ sub1: SUB1, timestamp: "2026-01-26T10:00:00Z" }),
      clickRecord({ sub1: SUB1, timestamp: "2026-01-26T11:00:00Z" }),
    ]),
  });

  const sending = fakeSendingSource({
    getCampaign: vi.fn(async (id: string) =>
      id === MAILING ? sendingCampaign({ id, sent: 10000, delivered: 10000, uniqueOpens: 500 }) : null
    ),
    listCampaigns: vi.fn(async () => [sendingCampaign({ sent: 10000 })]),
  });

  const volume: VolumeProvider = {
    getVolumeForRange: vi.fn(async () => ({ mode: "estimated" as const, volumes: {} })),
    getTotalSendsForRange: vi.fn(async () => 0),
    shutdown: vi.fn(async () => undefined),
  };

  const sendingCollector = new SendingCollector({
    source: sending,
    lookbackDays: config.lookbackDays,
    requestTimeoutMs: config.requestTimeoutMs,
    now: () => NOW,
  });
  const collector = new TrackingCollector({
    tracking,
    sending: sendingCollector,
    enricher: new CampaignEnricher({
      source: sending,
      requestTimeoutMs: config.requestTimeoutMs,
      knownCampaigns: () => sendingCollector.getCampaigns(),
    }),
    volume,
    caches: createReportCaches({ partnerCacheRefreshMs: 60_000, volumeEstimateTtlMs: 60_000 }),
    config,
    now: () => NOW,
  });
  return { collector, tracking, sending, volume, failing, conversionsByDate };
}

const entityCalls = (tracking: TrackingNetworkSource, key: string) =>
  vi.mocked(tracking.getEntityReport).mock.calls.filter(([dimensions]) => dimensions.join(",") === key);

describe("mergeTodayRows", () => {
  it("replaces only today's rows", () => {
    const merged = mergeTodayRows(periodicReports.date, todayDateReport, "2026-01-26");
    expect(merged.table.map((row) => row.reporting.totalClick)).toEqual([100, 80]);
  });
});

describe("TrackingCollector", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("publishes every aggregate after a full fetch", async () => {
    const { collector } = makeHarness();
    expect(collector.getLatestMetrics()).toBeNull();

    expect(await collector.fetchAll()).toBe(true);
    expect(collector.getState()).toBe("idle");

    expect(collector.getDailyPerformance().map((day) => [day.date, day.clicks, day.revenue])).toEqual([
      ["2026-01-26", 50, 225],
      ["2026-01-25", 100, 300],
    ]);
    expect(collector.getLatestMetrics()?.today).toEqual({ clicks: 50, conversions: 1, revenue: 225, payout: 150 });
    expect(collector.getTotalRevenue()).toBe(525);
    expect(collector.getRecentConversions()).toHaveLength(2);
    expect(collector.lastFetch()).toBe("2026-01-26T18:00:00.000Z");

    const campaign = collector.getCampaignRevenueById(MAILING);
    expect(campaign).toMatchObject({ revenue: 525, sendingLinked: true, espName: "SparkPost", ecpm: 52.5, rpm: 52.5 });
    expect(campaign?.revenuePerOpen).toBe(1.05);
    expect(collector.getCampaignRevenueById("1")).toBeNull();
    expect(collector.getPropertyRevenueByCode("TDIH")?.propertyName).toBe("thisdayinhistory.example");

    expect(collector.getReconciliationGap()).toEqual({
      authoritativeTotal: 525,
      conversionBasedTotal: 525,
      gap: 0,
      method: "none",
      unattributedRevenue: 0,
    });
    expect(collector.getEspRevenue().map((esp) => [esp.espName, esp.revenue])).toEqual([["SparkPost", 525]]);
    expect(collector.getRevenueBreakdown()?.nonCpm.revenue).toBe(525);

    const partners = collector.getDataPartnerAnalytics()?.partners ?? [];
    expect(partners.map((partner) => [partner.partnerKey, partner.clicks, partner.conversions, partner.revenue])).toEqual([
      ["GLB", 150, 2, 525],
    ]);
  });

  it("publishes a frozen snapshot", async () => {
    const { collector } = makeHarness();
    await collector.fetchAll();
    const snapshot = collector.getSnapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(collector.getDailyPerformance())).toBe(true);
    expect(Object.isFrozen(collector.getCampaignRevenue()[0])).toBe(true);
  });

  it("rolls daily rows into weeks, months and date ranges", async () => {
    const { collector } = makeHarness();
    await collector.fetchAll();

    expect(collector.getWeeklyPerformance().map((week) => [week.period, week.revenue])).toEqual([
      ["2026-W05", 225],
      ["2026-W04", 300],
    ]);
    expect(collector.getMonthlyPerformance().map((month) => [month.period, month.clicks])).toEqual([["2026-01", 150]]);

    const metrics = collector.getMetricsByDateRange({ start: "2026-01-26", end: "2026-01-26" });
    expect(metrics).toMatchObject({ clicks: 50, conversions: 1, revenue: 225, payout: 150, epc: 4.5, days: 1 });
    expect(metrics.conversionRate).toBe(0.02);
  });

  it("retries a failed report once and keeps the previous copy", async () => {
    const { collector, tracking, failing } = makeHarness();
    await collector.fetchAll();

    failing.set("sub2", 503);
    await collector.fetchAll();

    expect(entityCalls(tracking, "sub2")).toHaveLength(3);
    expect(console.warn).toHaveBeenCalledWith(
      "Collector: sub2 report unavailable, keeping previous data: status 503 tracking getEntityReport failed (status 503)"
    );
    expect(collector.getDataPartnerAnalytics()?.partners[0].clicks).toBe(150);
  });

  it("keeps the cached conversions of a day that fails", async () => {
    const { collector, conversionsByDate } = makeHarness();
    await collector.fetchAll();

    conversionsByDate.set("2026-01-25", new UpstreamError({ source: "tracking", operation: "getConversionsPage", status: 500 }));
    await collector.fetchAll();

    expect(collector.getRecentConversions().map((conv) => conv.date)).toEqual(["2026-01-25", "2026-01-26"]);
  });

  it("falls back to raw clicks when the date report is unavailable", async () => {
    const { collector, tracking, failing } = makeHarness();
    failing.set("date", 503);

    await collector.fetchAll();

    expect(tracking.getClicks).toHaveBeenCalledTimes(1);
    expect(collector.getDailyPerformance().map((day) => [day.date, day.clicks, day.conversions])).toEqual([
      ["2026-01-26", 2, 1],
      ["2026-01-25", 0, 1],
    ]);
    expect(collector.getRecentClicks()).toHaveLength(2);
  });

  it("refreshes today's row and conversions incrementally", async () => {
    const { collector, conversionsByDate } = makeHarness();
    await collector.fetchAll();

    conversionsByDate.set("2026-01-26", {
      conversions: [
        conversionRecord({ sub1: SUB1, sub2: "GLB_AUTO", revenue: 150, at: "2026-01-26T16:00:00Z" }),
        conversionRecord({ sub1: SUB1, sub2: "GLB_AUTO", revenue: 250, at: "2026-01-26T17:00:00Z" }),
      ],
      paging: null,
    });
    expect(await collector.fetchToday()).toBe(true);

    expect(collector.getDailyPerformance().map((day) => [day.date, day.clicks, day.revenue])).toEqual([
      ["2026-01-26", 80, 400],
      ["2026-01-25", 100, 300],
    ]);
    expect(collector.getLatestMetrics()?.today).toEqual({ clicks: 80, conversions: 2, revenue: 400, payout: 300 });
    expect(collector.getRecentConversions().map((conv) => conv.revenue)).toEqual([300, 150, 250]);
  });

  it("leaves the snapshot alone when today's report fails", async () => {
    const { collector, failing } = makeHarness();
    await collector.fetchAll();
    const before = collector.getSnapshot();

    failing.set("date", 503);
    expect(await collector.fetchToday()).toBe(false);
    expect(collector.getSnapshot()).toBe(before);
    expect(collector.getState()).toBe("idle");
  });

  it("does not start an incremental fetch during a full one", async () => {
    const { collector } = makeHarness();
    const full = collector.fetchAll();
    expect(collector.getState()).toBe("fetching_full");
    expect(await collector.fetchToday()).toBe(false);
    await full;
  });

  it("builds range analytics from the range caches", async () => {
    const { collector, tracking, failing } = makeHarness();
    await collector.fetchAll();
    const range = { start: "2026-01-26", end: "2026-01-26" };

    const first = await collector.buildDataPartnerAnalyticsForRange(range);
    await collector.buildDataPartnerAnalyticsForRange(range);

    expect(first.partners.map((partner) => [partner.partnerKey, partner.clicks, partner.conversions])).toEqual([
      ["GLB", 40, 1],
    ]);
    const rangeSub2Calls = entityCalls(tracking, "sub2").filter(([, called]) => isSingleDay(called, "2026-01-26"));
    expect(rangeSub2Calls).toHaveLength(1);

    failing.set("sub2", 503);
    const other = await collector.buildDataPartnerAnalyticsForRange({ start: "2026-01-25", end: "2026-01-25" });
    expect(other.partners[0].clicks).toBe(150);
  });

  it("does not retry client errors", async () => {
    const { collector, tracking, failing } = makeHarness();
    failing.set("sub1", 404);

    expect(await collector.fetchAll()).toBe(true);

    expect(entityCalls(tracking, "sub1")).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith(
      "Collector: sub1 report unavailable, keeping previous data: status 404 tracking getEntityReport failed (status 404)"
    );
  });

  it("replaces undated conversions instead of piling them up", async () => {
    const { collector, conversionsByDate } = makeHarness();
    conversionsByDate.set("2026-01-26", {
      conversions: [conversionRecord({ sub1: SUB1, revenue: 10, conversionUnixTimestamp: 0 })],
      paging: null,
    });

    await collector.fetchAll();
    for (let i = 0; i < 3; i += 1) {
      expect(await collector.fetchToday()).toBe(true);
    }

    expect(collector.getRecentConversions().map((conv) => [conv.date, conv.revenue])).toEqual([
      ["2026-01-25", 300],
      ["2026-01-26", 10],
    ]);
  });

  it("refreshes today's row incrementally while running on raw clicks", async () => {
    const { collector, failing } = makeHarness();
    failing.set("date", 503);
    await collector.fetchAll();

    failing.delete("date");
    expect(await collector.fetchToday()).toBe(true);

    expect(collector.getDailyPerformance().map((day) => [day.date, day.clicks, day.revenue])).toEqual([
      ["2026-01-26", 80, 400],
      ["2026-01-25", 0, 300],
    ]);
    expect(collector.getLatestMetrics()?.today).toEqual({ clicks: 80, conversions: 2, revenue: 400, payout: 300 });
    expect(collector.getRecentClicks()).toHaveLength(2);
  });

  it("discards a data partner refresh that a newer snapshot overtook", async () => {
    const { collector, volume, conversionsByDate } = makeHarness();
    await collector.fetchAll();

    let release: () => void = () => undefined;
    vi.mocked(volume.getVolumeForRange).mockImplementationOnce(
      () =>
        new Promise<VolumeResult>((resolve) => {
          release = () => resolve({ mode: "estimated", volumes: {} });
        })
    );
    const refresh = collector.refreshDataPartnerCache();

    conversionsByDate.set("2026-01-26", {
      conversions: [conversionRecord({ sub1: SUB1, sub2: "GLB_AUTO", revenue: 400, at: "2026-01-26T16:00:00Z" })],
      paging: null,
    });
    expect(await collector.fetchToday()).toBe(true);
    const incremental = collector.getSnapshot();

    release();
    await refresh;

    expect(collector.getSnapshot()).toBe(incremental);
    expect(collector.getLatestMetrics()?.today.revenue).toBe(400);
  });

  it("totals revenue and splits it by ESP for a date range", async () => {
    const { collector } = makeHarness();
    await collector.fetchAll();

    expect(collector.getTotalRevenueByDateRange({ start: "2026-01-25", end: "2026-01-25" })).toBe(300);
    expect(collector.getTotalRevenueByDateRange({ start: "2026-01-20", end: "2026-01-26" })).toBe(525);

    const esps = collector.getEspRevenueByDateRange({ start: "2026-01-26", end: "2026-01-26" });
    expect(esps.map((esp) => [esp.espName, esp.campaignCount, esp.conversions, esp.revenue])).toEqual([
      ["SparkPost", 1, 1, 225],
    ]);
    expect(collector.getEspRevenueByDateRange({ start: "2026-01-01", end: "2026-01-02" })).toEqual([]);
  });

  it("falls back to the lookback volume for a window without any", async () => {
    const { collector, volume } = makeHarness();
    vi.mocked(volume.getVolumeForRange).mockImplementation(async (range: DateRange): Promise<VolumeResult> =>
      range.start === "2026-01-25"
        ? { mode: "segment", volumes: { GLB_AUTO: 9000, GLB_HOME: 1000, GLB_EXTRA: 500 } }
        : { mode: "estimated", volumes: {} }
    );
    await collector.fetchAll();

    const analytics = await collector.buildDataPartnerAnalyticsForRange({ start: "2026-01-26", end: "2026-01-26" });

    expect(analytics.partners[0]).toMatchObject({ partnerKey: "GLB", volume: 10500, volumeMode: "segment" });
    expect(console.log).toHaveBeenCalledWith(
      "Collector: no volume for 2026-01-26|2026-01-26, using the lookback volume (segment)"
    );
  });

  it("drills into one campaign with its sending stats", async () => {
    const { collector } = makeHarness();
    await collector.fetchAll();

    const details = await collector.getCampaignDetails(MAILING);
    expect(details).toMatchObject({
      mailingId: MAILING,
      clicks: 150,
      conversions: 3,
      revenue: 525,
      conversionRate: 0.02,
      revenuePerClick: 3.5,
      sendingLinked: true,
      linkError: null,
      espName: "SparkPost",
      sent: 10000,
      delivered: 10000,
      uniqueOpens: 500,
      deliveryRate: 1,
      openRate: 0.05,
    });
    await expect(collector.getCampaignDetails("1")).rejects.toThrow(
      "Collector: campaign with mailing id 1 not found in tracking data"
    );
  });

  it("starts the periodic tasks and stops cleanly", async () => {
    const { collector, sending, volume } = makeHarness();
    await collector.start();

    expect(sending.listCampaigns).toHaveBeenCalledTimes(1);
    expect(collector.getLatestMetrics()).not.toBeNull();

    await collector.stop();
    expect(collector.getState()).toBe("stopped");
    expect(volume.shutdown).toHaveBeenCalledTimes(1);
    expect(await collector.fetchToday()).toBe(false);
    await expect(collector.start()).rejects.toThrow("Collector: cannot start a stopped collector");
  });
});

describe("createCollector", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("wires a collector that can run a full fetch", async () => {
    const attributionConfig: AttributionConfig = {
      ...config,
      volumeExactTtlMs: 60_000,
      volumeEstimateTtlMs: 60_000,
      volumeBlobBucket: "test-bucket",
      reportsRoot: null,
    };
    const collector = createCollector(
      attributionConfig,
      { tracking: fakeTrackingSource(), sending: fakeSendingSource() },
      { blobStore: null, now: () => NOW }
    );

    expect(await collector.fetchAll()).toBe(true);
    expect(collector.getDailyPerformance()).toEqual([]);
    await collector.stop();
  });
});
