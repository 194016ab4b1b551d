export type Region = "nl" | "uk" | "fr" | "it" | "us";

export type EndpointFamily = "current" | "legacy";

export type LocationQuery =
  | { by: "coordinates"; latitude: number; longitude: number }
  | { by: "city"; city: string }
  | { by: "postal"; postalCode: string };

export type LocationQueryKind = LocationQuery["by"];

export interface PollenLocation {
  readonly region: Region;
  readonly name: string;
  readonly query: LocationQuery;
}

export type PollenType = "tree" | "grass" | "weed";

export type SeverityLevel = "none" | "low" | "moderate" | "high" | "very-high";

export interface PollenDetail {
  name: string;
  count: number | null;
  level: SeverityLevel | null;
}

export interface PollenReading {
  type: PollenType;
  /** Calendar date in the region's time zone, `YYYY-MM-DD`. */
  date: string;
  count: number | null;
  level: SeverityLevel | null;
  unit: string;
  details: PollenDetail[];
}

/** Five contiguous daily readings, today first. */
export type ForecastSet = readonly PollenReading[];

export interface PollenForecast {
  tree: ForecastSet;
  grass: ForecastSet;
  weed: ForecastSet;
}

export interface PollenFetchResult {
  family: EndpointFamily;
  forecast: PollenForecast;
  raw: unknown;
  fetchedAt: Date;
}

export interface FetchPollenOptions {
  signal?: AbortSignal;
}

export interface PollenForecastProvider {
  fetch(location: PollenLocation, options?: FetchPollenOptions): Promise<PollenFetchResult>;
}

/** Upper bounds for `low`, `moderate` and `high`; anything above is `very-high`. */
export type SeverityThresholds = Record<PollenType, readonly [number, number, number]>;

export interface PollenApiClientOptions {
  requestTimeoutMs?: number;
  userAgent?: string;
  baseUrls?: Partial<Record<Region, string>>;
  thresholds?: SeverityThresholds;
  now?: () => Date;
  fetchImpl?: typeof fetch;
}

/** One decoded forecast day before windowing. */
export interface DecodedDay {
  date: string;
  readings: Record<PollenType, PollenReading>;
}

export interface DecodeContext {
  /** Calendar date in the region's time zone; the forecast window starts on or before it. */
  today: string;
  thresholds: SeverityThresholds;
  defaultUnit: string;
}
