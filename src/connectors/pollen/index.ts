export { PollenApiClient, probeLocation, parseRetryAfter } from "./client.js";
export {
  HttpStatusError,
  NetworkError,
  PollenApiError,
  RateLimitOrBlockedError,
  UnsupportedLocationError,
  UpstreamFormatError,
  isPollenApiError
} from "./errors.js";
export type { PollenApiErrorKind } from "./errors.js";
export { decodeCurrentPayload } from "./current-schema.js";
export { decodeLegacyPayload } from "./legacy-schema.js";
export { decodePollenPayload, detectPayloadFormat } from "./format.js";
export { FORECAST_DAYS, calendarDateIn } from "./forecast.js";
export { REGIONS, parseRegion, validateLocation, describeLocationQuery } from "./regions.js";
export {
  DEFAULT_THRESHOLDS,
  POLLEN_TYPES,
  SEVERITY_LEVELS,
  deriveSeverityLevel,
  parseSeverityLevel,
  parseSeverityThresholds,
  severityRank
} from "./severity.js";
export type {
  EndpointFamily,
  FetchPollenOptions,
  ForecastSet,
  LocationQuery,
  PollenApiClientOptions,
  PollenDetail,
  PollenFetchResult,
  PollenForecast,
  PollenForecastProvider,
  PollenLocation,
  PollenReading,
  PollenType,
  Region,
  SeverityLevel,
  SeverityThresholds
} from "./types.js";
