export type UpstreamSource = "tracking" | "sending" | "storage";

export class ParseError extends Error {
  readonly input: string;
  readonly reason: string;

  constructor(input: string, reason: string) {
    super(`Unable to parse "${input}": ${reason}`);
    this.name = "ParseError";
    this.input = input;
    this.reason = reason;
  }
}

export type UpstreamErrorMeta = {
  source: UpstreamSource;
  operation: string;
  status?: number;
};

export class UpstreamError extends Error {
  readonly source: UpstreamSource;
  readonly operation: string;
  readonly status?: number;

  constructor(meta: UpstreamErrorMeta, message?: string) {
    super(message ?? defaultUpstreamMessage(meta));
    this.name = "UpstreamError";
    this.source = meta.source;
    this.operation = meta.operation;
    this.status = meta.status;
  }
}

export class RateLimitError extends UpstreamError {
  readonly retryAfterMs?: number;

  constructor(meta: Omit<UpstreamErrorMeta, "status"> & { retryAfterMs?: number }, message?: string) {
    super({ ...meta, status: 429 }, message);
    this.name = "RateLimitError";
    this.retryAfterMs = meta.retryAfterMs;
  }
}

function defaultUpstreamMessage(meta: UpstreamErrorMeta): string {
  const status = meta.status !== undefined ? ` (status ${meta.status})` : "";
  return `${meta.source} ${meta.operation} failed${status}`;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  if (err && typeof err === "object" && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}
