import type { DateRange } from "../lib/dates";
import { errorMessage, RateLimitError } from "../lib/errors";
import { formatRetryError, isTransientUpstreamError, jitteredBackoff, sleep } from "../lib/retry";
import type { SendingPlatformSource } from "../sources/types";
import { parseContactActivityCsv } from "./strategies";
import type { VolumeMap } from "./types";

export type ContactActivityExportOptions = {
  requestTimeoutMs: number;
  pollBaseMs?: number;
  pollMaxMs?: number;
  rateLimitMultiplier?: number;
  maxPolls?: number;
  cleanupTimeoutMs?: number;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

type ContactActivitySource = Pick<
  SendingPlatformSource,
  | "createContactActivityReport"
  | "getContactActivityStatus"
  | "exportContactActivityCsv"
  | "deleteContactActivityReport"
>;

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw signal.reason;
}

/**
 * Builds an exact per-data-set volume map from a contact-level activity report:
 * create, poll until completed, export, delete. Individual requests are bound
 * to their own timeout; the caller's signal is checked between polls. The
 * report is deleted on every exit path with an independent timeout.
 */
export async function runContactActivityExport(
  source: ContactActivitySource,
  range: DateRange,
  signal: AbortSignal,
  options: ContactActivityExportOptions
): Promise<VolumeMap> {
  const wait = options.sleep ?? sleep;
  const maxPolls = options.maxPolls ?? 120;
  const rateLimitMultiplier = options.rateLimitMultiplier ?? 3;
  const backoff = jitteredBackoff({
    baseMs: options.pollBaseMs ?? 5_000,
    maxMs: options.pollMaxMs ?? 60_000,
    random: options.random,
  });
  const requestSignal = () => AbortSignal.timeout(options.requestTimeoutMs);

  throwIfAborted(signal);
  const reportId = await source.createContactActivityReport(range, requestSignal());
  console.log(`Volume: contact activity report ${reportId} created for ${range.start} to ${range.end}`);

  try {
    for (let poll = 1; poll <= maxPolls; poll += 1) {
      throwIfAborted(signal);
      let delayMs = backoff(poll);
      try {
        const status = await source.getContactActivityStatus(reportId, requestSignal());
        if (status === "completed") {
          const csv = await source.exportContactActivityCsv(reportId, requestSignal());
          const volumes = parseContactActivityCsv(csv);
          console.log(
            `Volume: contact activity report ${reportId} exported ${Object.keys(volumes).length} data-set codes`
          );
          return volumes;
        }
      } catch (err) {
        if (err instanceof RateLimitError) {
          delayMs = Math.max(delayMs * rateLimitMultiplier, err.retryAfterMs ?? 0);
          console.warn(`Volume: contact activity poll rate limited, waiting ${delayMs}ms`);
        } else if (isTransientUpstreamError(err)) {
          console.warn(`Volume: contact activity poll failed (${formatRetryError(err)}), retrying`);
        } else {
          throw err;
        }
      }
      await wait(delayMs, signal);
    }
    throw new Error(`Contact activity report ${reportId} did not complete after ${maxPolls} polls`);
  } finally {
    try {
      await source.deleteContactActivityReport(reportId, AbortSignal.timeout(options.cleanupTimeoutMs ?? 30_000));
    } catch (err) {
      console.warn(`Volume: failed to delete contact activity report ${reportId}: ${errorMessage(err)}`);
    }
  }
}
