import { errorMessage } from "../../infrastructure/logging/logger.js";
import {
  HttpStatusError,
  NetworkError,
  PollenApiError,
  RateLimitOrBlockedError,
  UpstreamFormatError
} from "./errors.js";
import { calendarDateIn } from "./forecast.js";
import { decodePollenPayload } from "./format.js";
import { regionDefinition, validateLocation, type RegionDefinition } from "./regions.js";
import { DEFAULT_THRESHOLDS } from "./severity.js";
import type {
  FetchPollenOptions,
  PollenApiClientOptions,
  PollenFetchResult,
  PollenForecastProvider,
  PollenLocation,
  Region,
  SeverityThresholds
} from "./types.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = "pollen-radar/1.0";

const CURRENT_PATH = "/api/sitecore/Pollen/GetPollenContent";
const LEGACY_PATH = "/api/sitecore/Pollen/GetPollenData";

interface PollenRequest {
  url: URL;
  init: RequestInit;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

function assertPositiveInt(value: number, fieldName: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${fieldName} must be a positive integer`);
  }
}

/** `Retry-After` is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now: Date): number | undefined {
  if (!value || value.trim() === "") {
    return undefined;
  }
  const seconds = Number(value.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const at = Date.parse(value);
  if (!Number.isFinite(at)) {
    return undefined;
  }
  return Math.max(0, at - now.getTime());
}

function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UpstreamFormatError("Pollen API response is not valid JSON", {
      cause: error,
      raw: text
    });
  }
}

export class PollenApiClient implements PollenForecastProvider {
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly baseUrls: Partial<Record<Region, string>>;
  private readonly thresholds: SeverityThresholds;
  private readonly now: () => Date;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PollenApiClientOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    assertPositiveInt(this.requestTimeoutMs, "requestTimeoutMs");

    this.userAgent = options.userAgent?.trim() || DEFAULT_USER_AGENT;
    this.baseUrls = options.baseUrls ?? {};
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.now = options.now ?? (() => new Date());
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(location: PollenLocation, options: FetchPollenOptions = {}): Promise<PollenFetchResult> {
    validateLocation(location);
    const definition = regionDefinition(location.region);
    const request = this.buildRequest(location, definition);

    const text = await this.perform(request, options.signal);
    const payload = parseJsonBody(text);
    const fetchedAt = this.now();

    try {
      const forecast = decodePollenPayload(definition.family, payload, {
        today: calendarDateIn(fetchedAt, definition.timeZone),
        thresholds: this.thresholds,
        defaultUnit: definition.unit
      });
      return { family: definition.family, forecast, raw: payload, fetchedAt };
    } catch (error) {
      if (error instanceof UpstreamFormatError && error.raw === undefined) {
        throw new UpstreamFormatError(error.message, { cause: error, raw: payload });
      }
      throw error;
    }
  }

  private baseUrlFor(location: PollenLocation, definition: RegionDefinition): string {
    return stripTrailingSlash(this.baseUrls[location.region]?.trim() || definition.baseUrl);
  }

  private buildRequest(location: PollenLocation, definition: RegionDefinition): PollenRequest {
    const baseUrl = this.baseUrlFor(location, definition);
    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": this.userAgent
    };
    const query = location.query;

    switch (definition.family) {
      case "current": {
        const body = new URLSearchParams();
        if (query.by === "coordinates") {
          body.set("lat", String(query.latitude));
          body.set("lng", String(query.longitude));
        } else if (query.by === "city") {
          body.set("city", query.city.trim());
        }
        headers["content-type"] = "application/x-www-form-urlencoded; charset=UTF-8";
        return {
          url: new URL(`${baseUrl}${CURRENT_PATH}`),
          init: { method: "POST", headers, body: body.toString() }
        };
      }
      case "legacy": {
        const url = new URL(`${baseUrl}${LEGACY_PATH}`);
        switch (query.by) {
          case "coordinates":
            url.searchParams.set("lat", String(query.latitude));
            url.searchParams.set("lng", String(query.longitude));
            break;
          case "city":
            url.searchParams.set("city", query.city.trim());
            break;
          case "postal":
            url.searchParams.set("zip", query.postalCode.trim());
            break;
        }
        return { url, init: { method: "GET", headers } };
      }
    }
  }

  private async perform(request: PollenRequest, signal: AbortSignal | undefined): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onCallerAbort = (): void => {
      controller.abort();
    };
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(request.url, {
        ...request.init,
        signal: controller.signal
      });

      if (!response.ok) {
        const body = await response.text();
        if (response.status === 429 || response.status === 403) {
          throw new RateLimitOrBlockedError(
            response.status,
            body,
            parseRetryAfter(response.headers.get("retry-after"), this.now())
          );
        }
        throw new HttpStatusError(response.status, body);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof PollenApiError) {
        throw error;
      }
      if (timedOut) {
        throw new NetworkError(`Pollen API request timed out after ${this.requestTimeoutMs}ms`, {
          timedOut: true,
          cause: error
        });
      }
      if (signal?.aborted) {
        throw new NetworkError("Pollen API request was aborted", { cause: error });
      }
      throw new NetworkError(`Pollen API request failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}

/**
 * Validates a location and fetches a single forecast for it, outside any
 * coordinator. Rejects with the same errors as `fetch`.
 */
export async function probeLocation(
  provider: PollenForecastProvider,
  location: PollenLocation
): Promise<PollenFetchResult> {
  validateLocation(location);
  return provider.fetch(location);
}
