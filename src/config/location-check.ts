import {
  PollenApiError,
  probeLocation,
  type EndpointFamily,
  type PollenApiErrorKind,
  type PollenForecastProvider,
  type PollenLocation
} from "../connectors/pollen/index.js";
import { errorMessage, type Logger } from "../infrastructure/logging/logger.js";

export type LocationCheckResult =
  | { name: string; ok: true; family: EndpointFamily; firstDate: string | undefined }
  | { name: string; ok: false; kind: PollenApiErrorKind | "unknown"; error: string };

/**
 * Fetches one forecast per configured location without starting any
 * coordinator. Locations are checked one after another.
 */
export async function checkLocations(
  provider: PollenForecastProvider,
  locations: readonly PollenLocation[],
  logger: Logger
): Promise<LocationCheckResult[]> {
  const results: LocationCheckResult[] = [];
  for (const location of locations) {
    try {
      const result = await probeLocation(provider, location);
      const firstDate = result.forecast.tree[0]?.date;
      logger.info("location check passed", {
        location: location.name,
        family: result.family,
        first_date: firstDate ?? null
      });
      results.push({ name: location.name, ok: true, family: result.family, firstDate });
    } catch (error) {
      const kind: PollenApiErrorKind | "unknown" = error instanceof PollenApiError ? error.kind : "unknown";
      logger.error("location check failed", {
        location: location.name,
        kind,
        error: errorMessage(error)
      });
      results.push({ name: location.name, ok: false, kind, error: errorMessage(error) });
    }
  }
  return results;
}
