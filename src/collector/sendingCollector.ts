import { normalizeEspName } from "../attribution/offerEspVolume";
import { lookbackRange, type DateRange } from "../lib/dates";
import { formatRetryError, isTransientUpstreamError, jitteredBackoff, retryAsync } from "../lib/retry";
import type { SendingCampaign, SendingPlatformSource } from "../sources/types";

export type SendingCollectorOptions = {
  source: SendingPlatformSource;
  lookbackDays: number;
  requestTimeoutMs: number;
  now?: () => Date;
  random?: () => number;
};

type SendingSnapshot = {
  range: DateRange;
  campaigns: readonly SendingCampaign[];
  byId: ReadonlyMap<string, SendingCampaign>;
  fetchedAt: string;
};

/** Periodic copy of the sending platform's campaigns for the lookback window. */
export class SendingCollector {
  private readonly source: SendingPlatformSource;
  private readonly lookbackDays: number;
  private readonly requestTimeoutMs: number;
  private readonly now: () => Date;
  private readonly backoff: (attempt: number) => number;
  private snapshot: SendingSnapshot | null = null;

  constructor(options: SendingCollectorOptions) {
    this.source = options.source;
    this.lookbackDays = options.lookbackDays;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.now = options.now ?? (() => new Date());
    this.backoff = jitteredBackoff({ baseMs: 1000, maxMs: 10_000, random: options.random });
  }

  /** Replaces the campaign list. On failure the previous list is kept and false is returned. */
  async refresh(signal?: AbortSignal): Promise<boolean> {
    const range = lookbackRange(this.now(), this.lookbackDays);
    let campaigns: SendingCampaign[];
    try {
      campaigns = await retryAsync(() => this.source.listCampaigns(range, AbortSignal.timeout(this.requestTimeoutMs)), {
        retries: 2,
        delaysMs: (attempt) => this.backoff(attempt),
        shouldRetry: isTransientUpstreamError,
        signal,
      });
    } catch (err) {
      console.warn(`SendingCollector: campaign refresh failed, keeping previous data: ${formatRetryError(err)}`);
      return false;
    }

    this.snapshot = {
      range,
      campaigns,
      byId: new Map(campaigns.map((campaign) => [campaign.id, campaign])),
      fetchedAt: this.now().toISOString(),
    };
    console.log(`SendingCollector: ${campaigns.length} campaigns for ${range.start} to ${range.end}`);
    return true;
  }

  getCampaigns(): SendingCampaign[] {
    return this.snapshot ? [...this.snapshot.campaigns] : [];
  }

  getCampaign(id: string): SendingCampaign | null {
    return this.snapshot?.byId.get(id) ?? null;
  }

  getTotalSent(): number {
    return this.snapshot ? this.snapshot.campaigns.reduce((total, campaign) => total + campaign.sent, 0) : 0;
  }

  /** Sends per normalized ESP name. */
  getSentByEsp(): Map<string, number> {
    const totals = new Map<string, number>();
    for (const campaign of this.snapshot?.campaigns ?? []) {
      const esp = normalizeEspName(campaign.espName);
      totals.set(esp, (totals.get(esp) ?? 0) + campaign.sent);
    }
    return totals;
  }

  lastRefresh(): string | null {
    return this.snapshot?.fetchedAt ?? null;
  }
}
