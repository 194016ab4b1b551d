export type PollenApiErrorKind =
  | "network"
  | "http_status"
  | "rate_limited"
  | "upstream_format"
  | "unsupported_location";

export abstract class PollenApiError extends Error {
  abstract readonly kind: PollenApiErrorKind;
  abstract readonly retryable: boolean;
}

export class NetworkError extends PollenApiError {
  readonly kind = "network";
  readonly retryable = true;
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "NetworkError";
    this.timedOut = options.timedOut ?? false;
  }
}

export class HttpStatusError extends PollenApiError {
  readonly kind: PollenApiErrorKind = "http_status";
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, message = `Pollen API request failed (${status})`) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
  }

  get retryable(): boolean {
    return this.status === 408 || this.status >= 500;
  }
}

/** 429 or 403: the unofficial API is throttling or blocking this client. */
export class RateLimitOrBlockedError extends HttpStatusError {
  override readonly kind = "rate_limited";
  readonly retryAfterMs: number | undefined;

  constructor(status: number, body: string, retryAfterMs: number | undefined) {
    super(status, body, `Pollen API rate limited or blocked the request (${status})`);
    this.name = "RateLimitOrBlockedError";
    this.retryAfterMs = retryAfterMs;
  }

  override get retryable(): boolean {
    return true;
  }
}

export class UpstreamFormatError extends PollenApiError {
  readonly kind = "upstream_format";
  readonly retryable = false;
  /** The body that failed to decode, kept for diagnostics. */
  readonly raw: unknown;

  constructor(message: string, options: { cause?: unknown; raw?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "UpstreamFormatError";
    this.raw = options.raw;
  }
}

export class UnsupportedLocationError extends PollenApiError {
  readonly kind = "unsupported_location";
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = "UnsupportedLocationError";
  }
}

export function isPollenApiError(error: unknown): error is PollenApiError {
  return error instanceof PollenApiError;
}
