import { RateLimitError, UpstreamError } from "./errors";

export type DelaySchedule = number[] | ((attempt: number, error: unknown) => number);

export type RetryOptions = {
  retries: number;
  delaysMs: DelaySchedule;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; error: unknown; delayMs: number }) => void;
  signal?: AbortSignal;
};

export type BackoffOptions = {
  baseMs: number;
  maxMs: number;
  random?: () => number;
};

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Capped exponential backoff with "equal jitter": half of the capped step is
 * fixed, the other half is random. Attempt numbers start at 1.
 */
export function jitteredBackoff(options: BackoffOptions): (attempt: number) => number {
  const random = options.random ?? Math.random;
  return (attempt: number) => {
    const step = Math.min(options.maxMs, options.baseMs * 2 ** Math.max(0, attempt - 1));
    const half = step / 2;
    return Math.round(half + random() * half);
  };
}

function delayFor(schedule: DelaySchedule, attempt: number, error: unknown): number {
  if (typeof schedule === "function") return schedule(attempt, error);
  return schedule[Math.min(attempt - 1, schedule.length - 1)] ?? 0;
}

export async function retryAsync<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { retries, delaysMs, shouldRetry, onRetry, signal } = options;
  let attempt = 0;
  while (true) {
    try {
      return await fn(attempt);
    } catch (err) {
      attempt += 1;
      const canRetry = attempt <= retries && !signal?.aborted && shouldRetry(err);
      if (!canRetry) throw err;
      let delayMs = delayFor(delaysMs, attempt, err);
      if (err instanceof RateLimitError && err.retryAfterMs !== undefined) {
        delayMs = Math.max(delayMs, err.retryAfterMs);
      }
      if (onRetry) onRetry({ attempt, error: err, delayMs });
      if (delayMs > 0) await sleep(delayMs, signal);
    }
  }
}

const TRANSIENT_MESSAGE_PATTERNS = [
  "timeout",
  "timed out",
  "network",
  "fetch failed",
  "econnreset",
  "econnrefused",
  "socket hang up",
];

function readStatus(err: object): number | undefined {
  if ("status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

/** 429, 5xx and connection-level failures are worth another attempt; other 4xx are not. */
export function isTransientUpstreamError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  if (err instanceof RateLimitError) return true;
  const status = readStatus(err);
  if (status !== undefined) {
    if (status === 429 || status >= 500) return true;
    if (status >= 400) return false;
  }
  if (err instanceof UpstreamError && status === undefined) return true;
  const message = "message" in err ? String(err.message ?? "").toLowerCase() : "";
  return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

export function formatRetryError(err: unknown): string {
  if (!err || typeof err !== "object") return String(err);
  const status = readStatus(err);
  const statusText = status !== undefined ? `status ${status}` : "";
  const message = "message" in err && typeof err.message === "string" ? err.message : "";
  return [statusText, message].filter(Boolean).join(" ").trim() || "unknown error";
}
