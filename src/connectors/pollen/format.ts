import { decodeCurrentPayload } from "./current-schema.js";
import { UpstreamFormatError } from "./errors.js";
import { decodeLegacyPayload } from "./legacy-schema.js";
import { isObjectRecord } from "./parsing.js";
import type { DecodeContext, EndpointFamily, PollenForecast } from "./types.js";

/**
 * Identifies which endpoint family produced a payload from its top-level
 * markers: `days` for the current family, `Forecast` for the legacy one.
 */
export function detectPayloadFormat(payload: unknown): EndpointFamily {
  if (!isObjectRecord(payload)) {
    throw new UpstreamFormatError("Pollen payload must be a JSON object");
  }

  const hasCurrentMarker = Array.isArray(payload.days);
  const hasLegacyMarker = Array.isArray(payload.Forecast);
  if (hasCurrentMarker && !hasLegacyMarker) {
    return "current";
  }
  if (hasLegacyMarker && !hasCurrentMarker) {
    return "legacy";
  }
  throw new UpstreamFormatError(
    hasCurrentMarker
      ? "Pollen payload carries both current and legacy forecast fields"
      : "Pollen payload matches no known format (expected a days or Forecast array)"
  );
}

export function decodePollenPayload(
  family: EndpointFamily,
  payload: unknown,
  context: DecodeContext
): PollenForecast {
  const detected = detectPayloadFormat(payload);
  if (detected !== family) {
    throw new UpstreamFormatError(
      `Expected a ${family} pollen payload but received a ${detected} one`
    );
  }

  switch (family) {
    case "current":
      return decodeCurrentPayload(payload, context);
    case "legacy":
      return decodeLegacyPayload(payload, context);
  }
}
