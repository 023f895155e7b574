import { CacheStore, rangeKey } from "../cache/cacheStore";
import { InFlightRegistry } from "../cache/inFlightRegistry";
import type { AttributionConfig } from "../config/env";
import type { DateRange } from "../lib/dates";
import { errorMessage } from "../lib/errors";
import type { SendingPlatformSource } from "../sources/types";
import { runContactActivityExport, type ContactActivityExportOptions } from "./contactActivityExport";
import { buildListVolumes, buildSegmentVolumes, resolveFirst, volumeEntryCount } from "./strategies";
import type { VolumeMap, VolumeResult } from "./types";
import type { VolumeBlobStore } from "./volumeBlobStore";

export type VolumeServiceConfig = Pick<
  AttributionConfig,
  "volumeExactTtlMs" | "volumeEstimateTtlMs" | "requestTimeoutMs"
>;

export type VolumeServiceOptions = {
  source: SendingPlatformSource;
  cache: CacheStore<VolumeResult>;
  config: VolumeServiceConfig;
  blobStore?: VolumeBlobStore | null;
  inFlight?: InFlightRegistry<VolumeMap>;
  totalsCache?: CacheStore<number>;
  /** Periodic all-time total from the sending collector, used when range totals come back empty. */
  periodicTotal?: () => number;
  now?: () => number;
  exportOptions?: Omit<ContactActivityExportOptions, "requestTimeoutMs">;
};

// A map this small is one or two list-level buckets, not per-data-set volume.
const MIN_USEFUL_ENTRIES = 2;

export class VolumeService {
  private readonly source: SendingPlatformSource;
  private readonly cache: CacheStore<VolumeResult>;
  private readonly config: VolumeServiceConfig;
  private readonly blobStore: VolumeBlobStore | null;
  private readonly inFlight: InFlightRegistry<VolumeMap>;
  private readonly totalsCache: CacheStore<number>;
  private readonly periodicTotal: () => number;
  private readonly now: () => number;
  private readonly exportOptions: Omit<ContactActivityExportOptions, "requestTimeoutMs">;
  private readonly exportController = new AbortController();

  constructor(options: VolumeServiceOptions) {
    this.source = options.source;
    this.cache = options.cache;
    this.config = options.config;
    this.blobStore = options.blobStore ?? null;
    this.inFlight = options.inFlight ?? new InFlightRegistry<VolumeMap>();
    this.now = options.now ?? Date.now;
    this.totalsCache =
      options.totalsCache ?? new CacheStore<number>({ ttlMs: options.config.volumeEstimateTtlMs, now: this.now });
    this.periodicTotal = options.periodicTotal ?? (() => 0);
    this.exportOptions = options.exportOptions ?? {};
  }

  /**
   * Best available per-data-set volume for a window. Never waits for the
   * contact-level export: the first miss launches it in the background and
   * answers from the segment or list fallbacks.
   */
  async getVolumeForRange(range: DateRange): Promise<VolumeResult> {
    const key = rangeKey(range);
    const cached = this.cache.get(key);
    if (cached) {
      console.log(`Volume: cache hit for ${key} (${volumeEntryCount(cached.volumes)} entries, ${cached.mode})`);
      return cached;
    }

    const persisted = await this.loadPersisted(range);
    if (persisted) return persisted;

    this.launchExactExport(range);

    const fallback = await resolveFirst<VolumeResult>([
      () => this.fromSegments(range),
      () => this.fromLists(range),
    ]);
    if (fallback && volumeEntryCount(fallback.volumes) > 0) {
      this.cache.set(key, fallback, { ttlMs: this.config.volumeEstimateTtlMs });
      return fallback;
    }
    console.warn(`Volume: no volume source answered for ${key}, not caching`);
    return { mode: "estimated", volumes: {} };
  }

  /** Largest of daily and list totals for the window, else the periodic total. Zero is never cached. */
  getTotalSendsForRange(range: DateRange): Promise<number> {
    const key = rangeKey(range);
    return this.totalsCache.getOrLoad(key, () => this.loadTotalSends(range), {
      shouldStore: (total) => total > 0,
    });
  }

  isExportRunning(range: DateRange): boolean {
    return this.inFlight.has(rangeKey(range));
  }

  waitForExport(range: DateRange): Promise<void> {
    return this.inFlight.settled(rangeKey(range));
  }

  /** Cancels running exports at their next poll and waits for their cleanup. */
  async shutdown(): Promise<void> {
    this.exportController.abort(new Error("Volume service stopped"));
    await this.inFlight.drain();
  }

  private requestSignal(): AbortSignal {
    return AbortSignal.timeout(this.config.requestTimeoutMs);
  }

  private async loadPersisted(range: DateRange): Promise<VolumeResult | null> {
    if (!this.blobStore) return null;
    const key = rangeKey(range);
    try {
      const persisted = await this.blobStore.load(range);
      if (!persisted) return null;
      const generatedAt = Date.parse(persisted.generatedAt);
      const age = this.now() - generatedAt;
      if (volumeEntryCount(persisted.volumes) > MIN_USEFUL_ENTRIES && age < this.config.volumeExactTtlMs) {
        const result: VolumeResult = { mode: "exact", volumes: persisted.volumes };
        this.cache.set(key, result, { ttlMs: this.config.volumeExactTtlMs, storedAt: generatedAt });
        console.log(`Volume: blob hit for ${key} (${volumeEntryCount(persisted.volumes)} entries)`);
        return result;
      }
      console.log(`Volume: blob for ${key} is stale or too small (generated ${persisted.generatedAt})`);
    } catch (err) {
      console.warn(`Volume: blob load failed for ${key}: ${errorMessage(err)}`);
    }
    return null;
  }

  private launchExactExport(range: DateRange): void {
    const key = rangeKey(range);
    const { launched, promise } = this.inFlight.launch(key, () => this.runExactExport(range));
    if (!launched) {
      console.log(`Volume: contact activity export already running for ${key}`);
      return;
    }
    console.log(`Volume: launched background contact activity export for ${key}`);
    void promise.catch((err: unknown) => {
      console.warn(`Volume: background export failed for ${key}: ${errorMessage(err)}`);
    });
  }

  private async runExactExport(range: DateRange): Promise<VolumeMap> {
    const key = rangeKey(range);
    const volumes = await runContactActivityExport(this.source, range, this.exportController.signal, {
      ...this.exportOptions,
      requestTimeoutMs: this.config.requestTimeoutMs,
    });
    if (volumeEntryCount(volumes) <= MIN_USEFUL_ENTRIES) {
      console.warn(`Volume: export for ${key} returned ${volumeEntryCount(volumes)} entries, discarding`);
      return volumes;
    }

    if (this.blobStore) {
      try {
        await this.blobStore.save(range, volumes, new Date(this.now()));
      } catch (err) {
        console.warn(`Volume: blob save failed for ${key}: ${errorMessage(err)}`);
      }
    }
    this.cache.set(key, { mode: "exact", volumes }, { ttlMs: this.config.volumeExactTtlMs });
    console.log(`Volume: exact volumes cached for ${key} (${volumeEntryCount(volumes)} entries)`);
    return volumes;
  }

  private async fromSegments(range: DateRange): Promise<VolumeResult | null> {
    try {
      const rows = await this.source.getSendsBySegment(range, this.requestSignal());
      if (!rows.length) return null;
      const volumes = buildSegmentVolumes(rows);
      if (volumeEntryCount(volumes) > MIN_USEFUL_ENTRIES) return { mode: "segment", volumes };
      console.log(`Volume: segments yielded ${volumeEntryCount(volumes)} codes, trying lists`);
    } catch (err) {
      console.warn(`Volume: segment sends failed: ${errorMessage(err)}`);
    }
    return null;
  }

  private async fromLists(range: DateRange): Promise<VolumeResult | null> {
    try {
      const lists = await this.source.getLists(this.requestSignal());
      const rows = await this.source.getSendsByList(range, this.requestSignal());
      const volumes = buildListVolumes(lists, rows);
      console.log(`Volume: list-level map has ${volumeEntryCount(volumes)} entries for ${rangeKey(range)}`);
      return { mode: "list", volumes };
    } catch (err) {
      console.warn(`Volume: list sends failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async loadTotalSends(range: DateRange): Promise<number> {
    let dailyTotal = 0;
    let listTotal = 0;
    try {
      const rows = await this.source.getDailySends(range, this.requestSignal());
      dailyTotal = rows.reduce((total, row) => total + row.sent, 0);
    } catch (err) {
      console.warn(`Volume: daily sends failed for ${rangeKey(range)}: ${errorMessage(err)}`);
    }
    try {
      const rows = await this.source.getSendsByList(range, this.requestSignal());
      listTotal = rows.reduce((total, row) => total + row.sent, 0);
    } catch (err) {
      console.warn(`Volume: list sends failed for ${rangeKey(range)}: ${errorMessage(err)}`);
    }

    let best = Math.max(dailyTotal, listTotal);
    console.log(`Volume: totals for ${rangeKey(range)}: daily=${dailyTotal}, list=${listTotal}, using=${best}`);
    if (best === 0) {
      best = this.periodicTotal();
      if (best > 0) console.log(`Volume: using periodic total ${best} as fallback`);
    }
    return best;
  }
}
