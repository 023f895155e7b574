import { CacheStore } from "../cache/cacheStore";
import { tryParseCampaignName } from "../identifiers/parseCampaignName";
import { getPropertyName, isValidPropertyCode } from "../identifiers/parseSub1";
import { runWithConcurrency } from "../lib/concurrency";
import { formatRetryError, isTransientUpstreamError, jitteredBackoff, retryAsync, sleep } from "../lib/retry";
import type { SendingCampaign, SendingPlatformSource } from "../sources/types";
import type { CampaignDetails, CampaignRevenue } from "./types";

type CampaignLookup = {
  campaign: SendingCampaign | null;
  failed: boolean;
  error?: string;
};

type DetailsLookup = {
  details: CampaignDetails;
  failed: boolean;
};

export type CampaignEnricherOptions = {
  source: SendingPlatformSource;
  requestTimeoutMs: number;
  /** Campaigns the sending collector already holds; consulted before any lookup. */
  knownCampaigns?: () => SendingCampaign[];
  cacheTtlMs?: number;
  detailsCacheTtlMs?: number;
  concurrency?: number;
  maxResolveLookups?: number;
  resolveSpacingMs?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
};

const DEFAULT_CACHE_TTL_MS = 15 * 60 * 1000;
const DEFAULT_DETAILS_TTL_MS = 5 * 60 * 1000;

export function propertyFromCampaignName(name: string): string | null {
  const parsed = tryParseCampaignName(name);
  if (!parsed?.property || !isValidPropertyCode(parsed.property)) return null;
  return parsed.property;
}

/** Links tracking campaigns to their sending-platform campaign by mailing id. */
export class CampaignEnricher {
  private readonly source: SendingPlatformSource;
  private readonly requestTimeoutMs: number;
  private readonly knownCampaigns: () => SendingCampaign[];
  private readonly cache: CacheStore<CampaignLookup>;
  private readonly details: CacheStore<DetailsLookup>;
  private readonly concurrency: number;
  private readonly maxResolveLookups: number;
  private readonly resolveSpacingMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly backoff: (attempt: number) => number;

  constructor(options: CampaignEnricherOptions) {
    this.source = options.source;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.knownCampaigns = options.knownCampaigns ?? (() => []);
    this.cache = new CacheStore<CampaignLookup>({ ttlMs: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS, now: options.now });
    this.details = new CacheStore<DetailsLookup>({
      ttlMs: options.detailsCacheTtlMs ?? DEFAULT_DETAILS_TTL_MS,
      now: options.now,
    });
    this.concurrency = options.concurrency ?? 10;
    this.maxResolveLookups = options.maxResolveLookups ?? 50;
    this.resolveSpacingMs = options.resolveSpacingMs ?? 100;
    this.sleep = options.sleep ?? sleep;
    this.backoff = jitteredBackoff({ baseMs: 1000, maxMs: 10_000, random: options.random });
  }

  clearCache(): void {
    this.cache.clear();
    this.details.clear();
  }

  cacheSize(): number {
    return this.cache.size();
  }

  /**
   * Property codes for mailing ids whose tag has none, read from the sending
   * campaign name. Cached names are used first; at most `maxResolveLookups`
   * campaigns are fetched per call. Unresolved ids are absent from the result.
   */
  async resolvePropertyCodes(mailingIds: string[], signal?: AbortSignal): Promise<Map<string, string>> {
    const resolved = new Map<string, string>();
    if (!mailingIds.length) return resolved;

    const uncached: string[] = [];
    for (const id of mailingIds) {
      const cached = this.cache.get(id);
      if (!cached) {
        uncached.push(id);
        continue;
      }
      const property = cached.campaign ? propertyFromCampaignName(cached.campaign.name) : null;
      if (property) resolved.set(id, property);
    }

    const toFetch = uncached.slice(0, this.maxResolveLookups);
    if (uncached.length > toFetch.length) {
      console.warn(
        `CampaignEnricher: ${uncached.length} unknown-property campaigns, looking up the first ${toFetch.length}`
      );
    }
    for (const [index, id] of toFetch.entries()) {
      if (signal?.aborted) break;
      if (index > 0) await this.sleep(this.resolveSpacingMs, signal);
      const lookup = await this.lookup(id, signal);
      const property = lookup.campaign ? propertyFromCampaignName(lookup.campaign.name) : null;
      if (property) resolved.set(id, property);
    }

    console.log(`CampaignEnricher: resolved ${resolved.size} of ${mailingIds.length} unknown properties`);
    return resolved;
  }

  /** Copies sending stats onto each campaign that has a sending-platform match. */
  async enrichCampaigns(campaigns: CampaignRevenue[], signal?: AbortSignal): Promise<CampaignRevenue[]> {
    const ids = [...new Set(campaigns.map((campaign) => campaign.mailingId).filter(Boolean))];
    const lookups = new Map<string, CampaignLookup>();
    await runWithConcurrency(ids, this.concurrency, async (id) => {
      lookups.set(id, await this.lookup(id, signal));
    });
    return campaigns.map((campaign) => {
      const match = lookups.get(campaign.mailingId)?.campaign;
      return match ? applySendingData(campaign, match) : campaign;
    });
  }

  /**
   * Tracking results for one mailing joined with its sending-platform stats.
   * A missing or failed link is reported in `linkError`, never thrown.
   * Linked and not-found results are cached; failed lookups are retried on
   * the next call.
   */
  async getCampaignDetails(campaign: CampaignRevenue, signal?: AbortSignal): Promise<CampaignDetails> {
    const result = await this.details.getOrLoad(
      campaign.mailingId,
      async () => {
        const lookup = await this.lookup(campaign.mailingId, signal);
        return { details: buildCampaignDetails(campaign, lookup), failed: lookup.failed };
      },
      { shouldStore: (loaded) => !loaded.failed }
    );
    return result.details;
  }

  private lookup(mailingId: string, signal?: AbortSignal): Promise<CampaignLookup> {
    return this.cache.getOrLoad(mailingId, () => this.fetchCampaign(mailingId, signal), {
      shouldStore: (lookup) => !lookup.failed,
    });
  }

  private async fetchCampaign(mailingId: string, signal?: AbortSignal): Promise<CampaignLookup> {
    const known = this.knownCampaigns().find((campaign) => campaign.id === mailingId);
    if (known) return { campaign: known, failed: false };
    if (signal?.aborted) return { campaign: null, failed: true };

    try {
      const campaign = await retryAsync(
        () => this.source.getCampaign(mailingId, AbortSignal.timeout(this.requestTimeoutMs)),
        {
          retries: 2,
          delaysMs: (attempt) => this.backoff(attempt),
          shouldRetry: isTransientUpstreamError,
          signal,
        }
      );
      return { campaign, failed: false };
    } catch (err) {
      const error = formatRetryError(err);
      console.warn(`CampaignEnricher: lookup for mailing ${mailingId} failed: ${error}`);
      return { campaign: null, failed: true, error };
    }
  }
}

export function applySendingData(campaign: CampaignRevenue, sending: SendingCampaign): CampaignRevenue {
  const enriched: CampaignRevenue = {
    ...campaign,
    audienceSize: sending.audienceSize,
    sent: sending.sent,
    delivered: sending.delivered,
    opens: sending.opens,
    uniqueOpens: sending.uniqueOpens,
    emailClicks: sending.clicks,
    sendingDomain: sending.sendingDomain,
    espName: sending.espName,
    sendingLinked: true,
  };
  if (sending.name && (!enriched.campaignName || enriched.campaignName === campaign.mailingId)) {
    enriched.campaignName = sending.name;
  }
  if (!isValidPropertyCode(enriched.propertyCode)) {
    const property = propertyFromCampaignName(sending.name);
    if (property) {
      enriched.propertyCode = property;
      enriched.propertyName = getPropertyName(property);
    }
  }
  enriched.ecpm = enriched.delivered > 0 ? (enriched.revenue / enriched.delivered) * 1000 : 0;
  enriched.rpm = enriched.sent > 0 ? (enriched.revenue / enriched.sent) * 1000 : 0;
  enriched.revenuePerOpen = enriched.uniqueOpens > 0 ? enriched.revenue / enriched.uniqueOpens : 0;
  return enriched;
}

function buildCampaignDetails(campaign: CampaignRevenue, lookup: CampaignLookup): CampaignDetails {
  const details: CampaignDetails = {
    mailingId: campaign.mailingId,
    campaignName: campaign.campaignName,
    propertyCode: campaign.propertyCode,
    propertyName: campaign.propertyName,
    offerId: campaign.offerId,
    offerName: campaign.offerName,
    clicks: campaign.clicks,
    conversions: campaign.conversions,
    revenue: campaign.revenue,
    payout: campaign.payout,
    conversionRate: campaign.clicks > 0 ? campaign.conversions / campaign.clicks : 0,
    revenuePerClick: campaign.clicks > 0 ? campaign.revenue / campaign.clicks : 0,
    sendingLinked: false,
    linkError: null,
    espName: "",
    sendingDomain: "",
    scheduleDate: null,
    status: null,
    audienceSize: 0,
    sent: 0,
    delivered: 0,
    opens: 0,
    uniqueOpens: 0,
    emailClicks: 0,
    bounces: 0,
    unsubscribes: 0,
    complaints: 0,
    ecpm: 0,
    deliveryRate: 0,
    openRate: 0,
    clickToOpenRate: 0,
  };

  const sending = lookup.campaign;
  if (!sending) {
    details.linkError = lookup.failed
      ? `sending lookup failed: ${lookup.error ?? "unknown error"}`
      : "campaign not found on the sending platform";
    return details;
  }

  details.sendingLinked = true;
  if (sending.name) details.campaignName = sending.name;
  details.espName = sending.espName;
  details.sendingDomain = sending.sendingDomain;
  details.scheduleDate = sending.scheduleDate ?? null;
  details.status = sending.status ?? null;
  details.audienceSize = sending.audienceSize;
  details.sent = sending.sent;
  details.delivered = sending.delivered;
  details.opens = sending.opens;
  details.uniqueOpens = sending.uniqueOpens;
  details.emailClicks = sending.clicks;
  details.bounces = sending.bounces ?? 0;
  details.unsubscribes = sending.unsubscribes ?? 0;
  details.complaints = sending.complaints ?? 0;
  details.ecpm = sending.audienceSize > 0 ? (campaign.revenue / sending.audienceSize) * 1000 : 0;
  details.deliveryRate = sending.sent > 0 ? sending.delivered / sending.sent : 0;
  details.openRate = sending.delivered > 0 ? sending.uniqueOpens / sending.delivered : 0;
  details.clickToOpenRate = sending.uniqueOpens > 0 ? sending.clicks / sending.uniqueOpens : 0;
  return details;
}
