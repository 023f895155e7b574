import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

export type AttributionConfig = {
  lookbackDays: number;
  fetchIntervalMs: number;
  sendingRefreshMs: number;
  partnerCacheRefreshMs: number;
  reportSpacingMs: number;
  reportRetryDelayMs: number;
  conversionSpacingMs: number;
  requestTimeoutMs: number;
  volumeExactTtlMs: number;
  volumeEstimateTtlMs: number;
  volumeBlobBucket: string;
  reportsRoot: string | null;
};

type Env = Record<string, string | undefined>;

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export function requireEnv(name: string, env: Env = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing ${name}. Put it in .env.local`);
  }
  return value;
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${name}: expected a positive number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AttributionConfig {
  return {
    lookbackDays: Math.floor(readPositiveNumber(env, "LOOKBACK_DAYS", 30)),
    fetchIntervalMs: readPositiveNumber(env, "FETCH_INTERVAL_MINUTES", 5) * MINUTE_MS,
    sendingRefreshMs: readPositiveNumber(env, "SENDING_REFRESH_MINUTES", 15) * MINUTE_MS,
    partnerCacheRefreshMs: readPositiveNumber(env, "PARTNER_CACHE_REFRESH_MINUTES", 10) * MINUTE_MS,
    reportSpacingMs: readPositiveNumber(env, "REPORT_SPACING_MS", 10_000),
    reportRetryDelayMs: readPositiveNumber(env, "REPORT_RETRY_DELAY_MS", 60_000),
    conversionSpacingMs: readPositiveNumber(env, "CONVERSION_SPACING_MS", 200),
    requestTimeoutMs: readPositiveNumber(env, "REQUEST_TIMEOUT_MS", 120_000),
    volumeExactTtlMs: readPositiveNumber(env, "VOLUME_EXACT_TTL_HOURS", 24) * HOUR_MS,
    volumeEstimateTtlMs: readPositiveNumber(env, "VOLUME_ESTIMATE_TTL_MINUTES", 30) * MINUTE_MS,
    volumeBlobBucket: env.VOLUME_BLOB_BUCKET || "attribution-cache",
    reportsRoot: env.ATTRIBUTION_REPORTS_ROOT || null,
  };
}
