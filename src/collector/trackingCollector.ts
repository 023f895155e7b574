import { aggregateClickMetrics, applyTodayReport } from "../attribution/aggregateClicks";
import { aggregateEntityMetrics, collectUnknownPropertyMailingIds } from "../attribution/aggregateEntityReports";
import { addCounts, emptyCounts, withRates } from "../attribution/aggregateHelpers";
import { buildRangeCampaignRevenue, rangeOfferPerformance } from "../attribution/rangeRevenue";
import type { CampaignEnricher } from "../attribution/campaignEnricher";
import { buildDataPartnerAnalytics } from "../attribution/dataPartnerAnalytics";
import { calculateEspRevenue } from "../attribution/espRevenue";
import { rollupDailyPerformance } from "../attribution/periodRollups";
import { calculateRevenueBreakdown } from "../attribution/revenueBreakdown";
import type {
  AttributionMetrics,
  CampaignDetails,
  CampaignRevenue,
  DailyPerformance,
  DataPartnerAnalytics,
  EspRevenuePerformance,
  OfferPerformance,
  PeriodPerformance,
  PropertyPerformance,
  ReconciliationGap,
  RevenueBreakdown,
} from "../attribution/types";
import { rangeKey, type CacheStore } from "../cache/cacheStore";
import type { ReportCaches } from "../cache/reportCaches";
import type { AttributionConfig } from "../config/env";
import { enumerateDates, isWithinRange, lookbackRange, toIsoDate, unixSecondsToIsoDate, type DateRange } from "../lib/dates";
import { errorMessage } from "../lib/errors";
import { deepFreeze } from "../lib/freeze";
import { formatRetryError, isTransientUpstreamError, retryAsync, sleep } from "../lib/retry";
import type { TrackingNetworkSource } from "../sources/types";
import { dateColumnSeconds } from "../tracking/entityRows";
import { processClicks, processConversions } from "../tracking/processRecords";
import type { Click, Conversion, ConversionRecord, EntityDimension, EntityReport } from "../tracking/types";
import { resolveTotalEspSends } from "../volume/partnerVolumeResolver";
import type { VolumeResult } from "../volume/types";
import { PeriodicTask } from "./scheduler";
import type { SendingCollector } from "./sendingCollector";
import type { CollectorSnapshot, CollectorState, RangeMetrics, VolumeProvider } from "./types";

export type CollectorConfig = Pick<
  AttributionConfig,
  | "lookbackDays"
  | "fetchIntervalMs"
  | "sendingRefreshMs"
  | "partnerCacheRefreshMs"
  | "reportSpacingMs"
  | "reportRetryDelayMs"
  | "conversionSpacingMs"
  | "requestTimeoutMs"
>;

export type TrackingCollectorOptions = {
  tracking: TrackingNetworkSource;
  sending: SendingCollector;
  enricher: CampaignEnricher;
  volume: VolumeProvider;
  caches: ReportCaches;
  config: CollectorConfig;
  now?: () => Date;
  conversionPageSize?: number;
  fullFetchDeadlineMs?: number;
  todayFetchDeadlineMs?: number;
};

type ReportName = "date" | "offer" | "sub1" | "sub2" | "offerSub2";

type HeldReports = Record<ReportName, EntityReport | null>;

const REPORT_DIMENSIONS: Record<ReportName, EntityDimension[]> = {
  date: ["date"],
  offer: ["offer"],
  sub1: ["sub1"],
  sub2: ["sub2"],
  offerSub2: ["offer", "sub2"],
};

const REPORT_LABELS: Record<ReportName, string> = {
  date: "date",
  offer: "offer",
  sub1: "sub1",
  sub2: "sub2",
  offerSub2: "offer×sub2",
};

const FULL_FETCH_ORDER: ReportName[] = ["date", "offer", "sub1", "sub2", "offerSub2"];
const INCREMENTAL_REPORTS: ReportName[] = ["sub2", "offerSub2"];

const MAX_CONVERSION_PAGES = 200;

/** Replaces today's rows of a date report with a fresh single-day report. */
export function mergeTodayRows(report: EntityReport, todayReport: EntityReport, today: string): EntityReport {
  const kept = report.table.filter((row) => {
    const seconds = dateColumnSeconds(row);
    return !seconds || unixSecondsToIsoDate(seconds) !== today;
  });
  return { table: [...kept, ...todayReport.table] };
}

function groupByDate(conversions: Conversion[]): Map<string, Conversion[]> {
  const grouped = new Map<string, Conversion[]>();
  for (const conv of conversions) {
    const group = grouped.get(conv.date) ?? [];
    group.push(conv);
    grouped.set(conv.date, group);
  }
  return grouped;
}

/**
 * Pulls tracking-network reports on a schedule, rebuilds every aggregate from
 * scratch and publishes them as one frozen snapshot. Readers never wait on a
 * fetch: they read whatever snapshot was published last.
 */
export class TrackingCollector {
  private readonly tracking: TrackingNetworkSource;
  private readonly sending: SendingCollector;
  private readonly enricher: CampaignEnricher;
  private readonly volume: VolumeProvider;
  private readonly caches: ReportCaches;
  private readonly config: CollectorConfig;
  private readonly now: () => Date;
  private readonly conversionPageSize: number;
  private readonly fullFetchDeadlineMs: number;
  private readonly todayFetchDeadlineMs: number;
  private readonly lifecycle = new AbortController();

  private state: CollectorState = "idle";
  private reports: HeldReports = { date: null, offer: null, sub1: null, sub2: null, offerSub2: null };
  private conversions: Conversion[] = [];
  private clicks: Click[] | null = null;
  /** Today's date report while running on raw clicks; there is no held date report to merge it into. */
  private todayReport: EntityReport | null = null;
  /** Last non-empty lookback volume, used for windows the volume service has nothing for. */
  private periodicVolume: VolumeResult | null = null;
  private snapshot: CollectorSnapshot | null = null;
  private tasks: PeriodicTask[] = [];

  constructor(options: TrackingCollectorOptions) {
    this.tracking = options.tracking;
    this.sending = options.sending;
    this.enricher = options.enricher;
    this.volume = options.volume;
    this.caches = options.caches;
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
    this.conversionPageSize = options.conversionPageSize ?? 500;
    this.fullFetchDeadlineMs = options.fullFetchDeadlineMs ?? 10 * 60 * 1000;
    this.todayFetchDeadlineMs = options.todayFetchDeadlineMs ?? 2 * 60 * 1000;
  }

  getState(): CollectorState {
    return this.state;
  }

  /** Initial sending refresh and full fetch, then the periodic tasks. */
  async start(): Promise<void> {
    if (this.getState() === "stopped") {
      throw new Error("Collector: cannot start a stopped collector");
    }
    if (this.tasks.length) return;

    this.tasks = [
      new PeriodicTask({
        name: "Collector incremental",
        intervalMs: this.config.fetchIntervalMs,
        run: async () => {
          await this.fetchToday();
        },
      }),
      new PeriodicTask({
        name: "SendingCollector refresh",
        intervalMs: this.config.sendingRefreshMs,
        run: async () => {
          await this.sending.refresh(this.lifecycle.signal);
        },
      }),
      new PeriodicTask({
        name: "Collector data partner cache",
        intervalMs: this.config.partnerCacheRefreshMs,
        run: async () => {
          await this.refreshDataPartnerCache();
        },
      }),
    ];

    await this.sending.refresh(this.lifecycle.signal);
    await this.fetchAll();
    if (this.getState() === "stopped") return;
    for (const task of this.tasks) task.start();
    console.log(
      `Collector: started (incremental every ${this.config.fetchIntervalMs}ms, sending every ${this.config.sendingRefreshMs}ms, data partners every ${this.config.partnerCacheRefreshMs}ms)`
    );
  }

  /** Cancels in-flight work, clears the timers and waits for running ticks. */
  async stop(): Promise<void> {
    if (this.getState() === "stopped") return;
    this.state = "stopped";
    this.lifecycle.abort(new Error("Collector stopped"));
    await Promise.all(this.tasks.map((task) => task.stop()));
    await this.volume.shutdown();
    console.log("Collector: stopped");
  }

  /** Full lookback fetch. Returns false when skipped or when nothing was published. */
  async fetchAll(): Promise<boolean> {
    if (this.getState() !== "idle") {
      console.log(`Collector: full fetch skipped while ${this.state}`);
      return false;
    }
    this.state = "fetching_full";
    try {
      const range = this.lookback();
      const deadline = this.deadline(this.fullFetchDeadlineMs);
      console.log(`Collector: full fetch for ${range.start} to ${range.end}`);

      for (const [index, name] of FULL_FETCH_ORDER.entries()) {
        if (index > 0) await sleep(this.config.reportSpacingMs, deadline);
        const report = await this.fetchReport(name, range, deadline, true);
        if (report) this.storeReport(name, report);
      }

      this.conversions = await this.fetchConversions(enumerateDates(range), deadline, this.conversions);

      this.todayReport = null;
      if (this.reports.date) {
        this.clicks = null;
      } else {
        await this.loadClickFallback(range, deadline);
      }

      await this.rebuild(deadline);
      return true;
    } catch (err) {
      console.error(`Collector: full fetch failed: ${errorMessage(err)}`);
      return false;
    } finally {
      if (this.getState() === "fetching_full") this.state = "idle";
    }
  }

  /** Today's date report, the lookback partner reports and today's conversions. */
  async fetchToday(): Promise<boolean> {
    if (this.getState() !== "idle") {
      console.log(`Collector: incremental fetch skipped while ${this.state}`);
      return false;
    }
    this.state = "fetching_incremental";
    try {
      const now = this.now();
      const today = toIsoDate(now);
      const range = lookbackRange(now, this.config.lookbackDays);
      const deadline = this.deadline(this.todayFetchDeadlineMs);

      const todayReport = await this.fetchReport("date", { start: today, end: today }, deadline, false);
      if (!todayReport) return false;

      for (const name of INCREMENTAL_REPORTS) {
        await sleep(this.config.reportSpacingMs, deadline);
        const report = await this.fetchReport(name, range, deadline, false);
        if (report) this.storeReport(name, report);
      }

      const fresh = await this.fetchConversions([today], deadline, this.conversions);
      this.conversions = [...this.conversions.filter((conv) => conv.date !== today), ...fresh];
      if (this.reports.date) {
        this.storeReport("date", mergeTodayRows(this.reports.date, todayReport, today));
      } else {
        this.todayReport = todayReport;
      }

      await this.rebuild(deadline);
      const totals = this.snapshot?.metrics.today;
      if (totals) {
        console.log(
          `Collector: today ${totals.clicks} clicks, ${totals.conversions} conversions, $${totals.revenue.toFixed(2)} revenue`
        );
      }
      return true;
    } catch (err) {
      console.error(`Collector: incremental fetch failed: ${errorMessage(err)}`);
      return false;
    } finally {
      if (this.getState() === "fetching_incremental") this.state = "idle";
    }
  }

  /** Recomputes the lookback data-partner analytics over the held reports and republishes. */
  async refreshDataPartnerCache(): Promise<DataPartnerAnalytics | null> {
    const current = this.snapshot;
    if (!current) return null;
    const dataPartners = await this.computePeriodicAnalytics(current.metrics.offerPerformance, this.now());
    if (this.snapshot !== current) {
      console.log("Collector: data partner refresh superseded by a newer snapshot, discarding");
      return this.snapshot?.dataPartners ?? null;
    }
    this.publish({ ...current, dataPartners });
    if (dataPartners) {
      console.log(
        `Collector: data partner cache refreshed: ${dataPartners.partners.length} partners, $${dataPartners.totals.revenue.toFixed(2)} revenue`
      );
    }
    return dataPartners;
  }

  /**
   * Analytics for an arbitrary window. Partner reports come from the range
   * caches and fall back to the periodic reports when the range pull fails or
   * comes back empty.
   */
  async buildDataPartnerAnalyticsForRange(range: DateRange): Promise<DataPartnerAnalytics> {
    const signal = this.lifecycle.signal;
    const sub2Report = (await this.loadRangeReport(this.caches.partnerClicks, "sub2", range)) ?? this.reports.sub2;
    const offerSub2Report =
      (await this.loadRangeReport(this.caches.offerPartnerClicks, "offerSub2", range)) ?? this.reports.offerSub2;
    const offerReport = await this.fetchReport("offer", range, signal, false);
    const conversions = await this.conversionsForRange(range);
    const { volume, totalEspSends } = await this.volumeFor(range, true);

    return buildDataPartnerAnalytics({
      range,
      sub2Report,
      offerReport,
      offerSub2Report,
      fallbackOffers: this.getOfferPerformance(),
      conversions,
      lookbackConversions: this.conversions,
      volume,
      totalEspSends,
      now: this.now(),
    });
  }

  getSnapshot(): CollectorSnapshot | null {
    return this.snapshot;
  }

  getLatestMetrics(): AttributionMetrics | null {
    return this.snapshot?.metrics ?? null;
  }

  lastFetch(): string | null {
    return this.snapshot?.lastFetch ?? null;
  }

  getDailyPerformance(): DailyPerformance[] {
    return this.snapshot?.metrics.dailyPerformance ?? [];
  }

  getOfferPerformance(): OfferPerformance[] {
    return this.snapshot?.metrics.offerPerformance ?? [];
  }

  getPropertyPerformance(): PropertyPerformance[] {
    return this.snapshot?.metrics.propertyPerformance ?? [];
  }

  getCampaignRevenue(): CampaignRevenue[] {
    return this.snapshot?.metrics.campaignRevenue ?? [];
  }

  getRecentConversions(): Conversion[] {
    return this.snapshot?.metrics.recentConversions ?? [];
  }

  getRecentClicks(): Click[] {
    return this.snapshot?.metrics.recentClicks ?? [];
  }

  getRevenueBreakdown(): RevenueBreakdown | null {
    return this.snapshot?.revenueBreakdown ?? null;
  }

  getEspRevenue(): EspRevenuePerformance[] {
    return this.snapshot?.espRevenue ?? [];
  }

  getReconciliationGap(): ReconciliationGap | null {
    return this.snapshot?.reconciliation ?? null;
  }

  getWeeklyPerformance(): PeriodPerformance[] {
    return rollupDailyPerformance(this.getDailyPerformance(), "weekly");
  }

  getMonthlyPerformance(): PeriodPerformance[] {
    return rollupDailyPerformance(this.getDailyPerformance(), "monthly");
  }

  getCampaignRevenueById(mailingId: string): CampaignRevenue | null {
    return this.getCampaignRevenue().find((campaign) => campaign.mailingId === mailingId) ?? null;
  }

  getPropertyRevenueByCode(propertyCode: string): PropertyPerformance | null {
    return this.getPropertyPerformance().find((property) => property.propertyCode === propertyCode) ?? null;
  }

  getTotalRevenue(): number {
    return this.getDailyPerformance().reduce((total, day) => total + day.revenue, 0);
  }

  getTotalRevenueByDateRange(range: DateRange): number {
    return this.getDailyPerformanceByDateRange(range).reduce((total, day) => total + day.revenue, 0);
  }

  /**
   * ESP split of the conversions dated inside the window. Campaign rows keep
   * their sending stats; revenue, conversions and payout come from the
   * window's conversions only, so the split is conversion-based.
   */
  getEspRevenueByDateRange(range: DateRange): EspRevenuePerformance[] {
    const conversions = this.conversions.filter((conv) => isWithinRange(conv.date, range));
    const campaigns = buildRangeCampaignRevenue(this.getCampaignRevenue(), conversions);
    return calculateEspRevenue(campaigns, rangeOfferPerformance(conversions), this.sending.getCampaigns()).esps;
  }

  /** Drill-down for one mailing of the last snapshot. Throws when the mailing is not in it. */
  getCampaignDetails(mailingId: string): Promise<CampaignDetails> {
    const campaign = this.getCampaignRevenueById(mailingId);
    if (!campaign) {
      return Promise.reject(new Error(`Collector: campaign with mailing id ${mailingId} not found in tracking data`));
    }
    return this.enricher.getCampaignDetails(campaign, this.lifecycle.signal);
  }

  getDailyPerformanceByDateRange(range: DateRange): DailyPerformance[] {
    return this.getDailyPerformance().filter((day) => isWithinRange(day.date, range));
  }

  getMetricsByDateRange(range: DateRange): RangeMetrics {
    const daily = this.getDailyPerformanceByDateRange(range);
    const totals = emptyCounts();
    for (const day of daily) addCounts(totals, day);
    return { range, ...withRates(totals), days: daily.length, daily };
  }

  /** The periodic analytics published with the last snapshot. */
  getDataPartnerAnalytics(): DataPartnerAnalytics | null {
    return this.snapshot?.dataPartners ?? null;
  }

  private lookback(): DateRange {
    return lookbackRange(this.now(), this.config.lookbackDays);
  }

  private deadline(ms: number): AbortSignal {
    return AbortSignal.any([this.lifecycle.signal, AbortSignal.timeout(ms)]);
  }

  private requestSignal(signal: AbortSignal): AbortSignal {
    return AbortSignal.any([signal, AbortSignal.timeout(this.config.requestTimeoutMs)]);
  }

  private storeReport(name: ReportName, report: EntityReport): void {
    this.reports = { ...this.reports, [name]: report };
  }

  /** The report, or null when it failed. With `retry`, one more attempt after `reportRetryDelayMs`. */
  private async fetchReport(
    name: ReportName,
    range: DateRange,
    signal: AbortSignal,
    retry: boolean
  ): Promise<EntityReport | null> {
    const label = REPORT_LABELS[name];
    try {
      const report = await retryAsync(
        () => this.tracking.getEntityReport(REPORT_DIMENSIONS[name], range, this.requestSignal(signal)),
        {
          retries: retry ? 1 : 0,
          delaysMs: [this.config.reportRetryDelayMs],
          shouldRetry: (err) => !signal.aborted && isTransientUpstreamError(err),
          signal,
          onRetry: ({ error, delayMs }) => {
            console.warn(`Collector: ${label} report failed (${formatRetryError(error)}), retrying in ${delayMs}ms`);
          },
        }
      );
      console.log(`Collector: ${label} report for ${range.start} to ${range.end} has ${report.table.length} rows`);
      return report;
    } catch (err) {
      if (signal.aborted) throw err;
      console.warn(`Collector: ${label} report unavailable, keeping previous data: ${formatRetryError(err)}`);
      return null;
    }
  }

  private async fetchConversionRecords(date: string, signal: AbortSignal): Promise<ConversionRecord[]> {
    const records: ConversionRecord[] = [];
    for (let page = 1; page <= MAX_CONVERSION_PAGES; page += 1) {
      const result = await this.tracking.getConversionsPage(
        date,
        page,
        this.conversionPageSize,
        this.requestSignal(signal)
      );
      records.push(...result.conversions);
      const paging = result.paging;
      if (!paging || !result.conversions.length || page * paging.pageSize >= paging.totalCount) {
        return records;
      }
    }
    console.warn(`Collector: conversions for ${date} exceed ${MAX_CONVERSION_PAGES} pages, truncating`);
    return records;
  }

  /**
   * Day by day. A failed day keeps whatever `previous` held for it.
   * Conversions without a usable timestamp are dated to the day they were
   * fetched for, so replacing a day replaces them too.
   */
  private async fetchConversions(dates: string[], signal: AbortSignal, previous: Conversion[]): Promise<Conversion[]> {
    const previousByDate = groupByDate(previous);
    const collected: Conversion[] = [];
    for (const [index, date] of dates.entries()) {
      if (index > 0) await sleep(this.config.conversionSpacingMs, signal);
      try {
        const conversions = processConversions(await this.fetchConversionRecords(date, signal)).map((conv) =>
          conv.date ? conv : { ...conv, date }
        );
        collected.push(...conversions);
        console.log(`Collector: ${conversions.length} conversions for ${date}`);
      } catch (err) {
        if (signal.aborted) throw err;
        const kept = previousByDate.get(date) ?? [];
        console.warn(`Collector: conversions for ${date} failed, keeping ${kept.length} cached: ${formatRetryError(err)}`);
        collected.push(...kept);
      }
    }
    return collected;
  }

  private async loadClickFallback(range: DateRange, signal: AbortSignal): Promise<void> {
    console.warn("Collector: date report unavailable and none cached, falling back to raw clicks");
    try {
      this.clicks = processClicks(await this.tracking.getClicks(range, this.requestSignal(signal)));
      console.log(`Collector: ${this.clicks.length} raw clicks for ${range.start} to ${range.end}`);
    } catch (err) {
      if (signal.aborted) throw err;
      console.warn(`Collector: raw clicks failed: ${formatRetryError(err)}`);
      this.clicks = this.clicks ?? [];
    }
  }

  private async rebuild(signal: AbortSignal): Promise<void> {
    const now = this.now();
    const today = toIsoDate(now);

    let metrics: AttributionMetrics;
    if (!this.reports.date && this.clicks) {
      metrics = aggregateClickMetrics(this.clicks, this.conversions, today);
      if (this.todayReport) metrics = applyTodayReport(metrics, this.todayReport, today);
    } else {
      const unknown = collectUnknownPropertyMailingIds(this.reports.sub1, this.conversions);
      const resolvedProperties = unknown.length
        ? await this.enricher.resolvePropertyCodes(unknown, signal)
        : new Map<string, string>();
      metrics = aggregateEntityMetrics({
        dateReport: this.reports.date,
        offerReport: this.reports.offer,
        sub1Report: this.reports.sub1,
        conversions: this.conversions,
        resolvedProperties,
        today,
      });
    }

    const campaignRevenue = await this.enricher.enrichCampaigns(metrics.campaignRevenue, signal);
    metrics = { ...metrics, campaignRevenue };

    const { esps, reconciliation } = calculateEspRevenue(
      campaignRevenue,
      metrics.offerPerformance,
      this.sending.getCampaigns()
    );
    const revenueBreakdown = calculateRevenueBreakdown(metrics.offerPerformance, this.conversions);
    const dataPartners = await this.computePeriodicAnalytics(metrics.offerPerformance, now);

    this.publish({
      metrics,
      espRevenue: esps,
      reconciliation,
      revenueBreakdown,
      dataPartners,
      lastFetch: now.toISOString(),
    });

    const revenue = metrics.dailyPerformance.reduce((total, day) => total + day.revenue, 0);
    console.log(
      `Collector: published ${this.conversions.length} conversions, ${campaignRevenue.length} campaigns, $${revenue.toFixed(2)} revenue`
    );
  }

  private publish(snapshot: CollectorSnapshot): void {
    this.snapshot = deepFreeze(snapshot);
  }

  private async volumeFor(
    range: DateRange,
    usePeriodicFallback: boolean
  ): Promise<{ volume: VolumeResult; totalEspSends: number }> {
    let volume = await this.volume.getVolumeForRange(range);
    if (usePeriodicFallback && !Object.keys(volume.volumes).length && this.periodicVolume) {
      console.log(`Collector: no volume for ${rangeKey(range)}, using the lookback volume (${this.periodicVolume.mode})`);
      volume = this.periodicVolume;
    }
    const rangeTotal = await this.volume.getTotalSendsForRange(range);
    const totalEspSends = resolveTotalEspSends(rangeTotal, [...this.sending.getSentByEsp().values()], volume.volumes);
    return { volume, totalEspSends };
  }

  /** Lookback analytics over the held reports. On failure the previously published analytics stay. */
  private async computePeriodicAnalytics(
    offers: OfferPerformance[],
    now: Date
  ): Promise<DataPartnerAnalytics | null> {
    const range = lookbackRange(now, this.config.lookbackDays);
    try {
      const { volume, totalEspSends } = await this.volumeFor(range, false);
      if (Object.keys(volume.volumes).length) this.periodicVolume = volume;
      return buildDataPartnerAnalytics({
        range,
        sub2Report: this.reports.sub2,
        offerReport: this.reports.offer,
        offerSub2Report: this.reports.offerSub2,
        fallbackOffers: offers,
        conversions: this.conversions,
        lookbackConversions: this.conversions,
        volume,
        totalEspSends,
        now,
      });
    } catch (err) {
      console.warn(`Collector: data partner analytics failed, keeping previous: ${errorMessage(err)}`);
      return this.snapshot?.dataPartners ?? null;
    }
  }

  private async loadRangeReport(
    cache: CacheStore<EntityReport>,
    name: ReportName,
    range: DateRange
  ): Promise<EntityReport | null> {
    const key = rangeKey(range);
    try {
      const report = await cache.getOrLoad(
        key,
        () => this.tracking.getEntityReport(REPORT_DIMENSIONS[name], range, this.requestSignal(this.lifecycle.signal)),
        { shouldStore: (loaded) => loaded.table.length > 0 }
      );
      if (report.table.length) return report;
      console.log(`Collector: ${REPORT_LABELS[name]} report for ${key} is empty, using periodic report`);
    } catch (err) {
      console.warn(`Collector: ${REPORT_LABELS[name]} report for ${key} failed, using periodic report: ${formatRetryError(err)}`);
    }
    return null;
  }

  /** Held conversions when the window lies inside the lookback, otherwise a cached day-by-day pull. */
  private async conversionsForRange(range: DateRange): Promise<Conversion[]> {
    const lookback = this.lookback();
    const inRange = this.conversions.filter((conv) => isWithinRange(conv.date, range));
    if (range.start >= lookback.start && range.end <= lookback.end) return inRange;
    try {
      return await this.caches.conversions.getOrLoad(
        rangeKey(range),
        () => this.fetchConversions(enumerateDates(range), this.lifecycle.signal, inRange),
        { shouldStore: (conversions) => conversions.length > 0 }
      );
    } catch (err) {
      console.warn(`Collector: conversions for ${rangeKey(range)} failed: ${errorMessage(err)}`);
      return inRange;
    }
  }
}
