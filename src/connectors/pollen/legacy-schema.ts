import { UpstreamFormatError } from "./errors.js";
import { buildPollenForecast, isIsoDate } from "./forecast.js";
import {
  asNonEmptyString,
  parseCount,
  requireArray,
  requireRecord
} from "./parsing.js";
import { resolveSeverityLevel } from "./severity.js";
import type {
  DecodeContext,
  DecodedDay,
  PollenDetail,
  PollenForecast,
  PollenReading,
  PollenType
} from "./types.js";

const LEGACY_TYPE_KEYS: Readonly<Record<PollenType, string>> = {
  tree: "Tree",
  grass: "Grass",
  weed: "Weed"
};

const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function parseUsDate(value: unknown, field: string): string {
  const text = asNonEmptyString(value);
  const match = text ? US_DATE_PATTERN.exec(text) : null;
  if (!match) {
    throw new UpstreamFormatError(`${field} must be a MM/DD/YYYY date`);
  }
  const [, month = "", day = "", year = ""] = match;
  const iso = `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
  if (!isIsoDate(iso)) {
    throw new UpstreamFormatError(`${field} is not a valid calendar date: ${text ?? ""}`);
  }
  return iso;
}

function parseSpecies(
  value: unknown,
  type: PollenType,
  field: string,
  context: DecodeContext
): PollenDetail[] {
  if (value === undefined || value === null) {
    return [];
  }

  return requireArray(value, field).map((item, index) => {
    const species = requireRecord(item, `${field}[${index}]`);
    const name = asNonEmptyString(species.Name);
    if (!name) {
      throw new UpstreamFormatError(`${field}[${index}].Name must be a non-empty string`);
    }
    const count = parseCount(species.Count, `${field}[${index}].Count`);
    return { name, count, level: resolveSeverityLevel(type, count, undefined, context.thresholds) };
  });
}

function parseReading(
  entry: Record<string, unknown>,
  type: PollenType,
  date: string,
  field: string,
  context: DecodeContext
): PollenReading {
  const key = LEGACY_TYPE_KEYS[type];
  const value = requireRecord(entry[key], `${field}.${key}`);
  const count = parseCount(value.Count, `${field}.${key}.Count`);

  return {
    type,
    date,
    count,
    // the legacy schema carries no level, so it is always derived
    level: resolveSeverityLevel(type, count, undefined, context.thresholds),
    unit: context.defaultUnit,
    details: parseSpecies(value.Species, type, `${field}.${key}.Species`, context)
  };
}

function parseForecastEntry(value: unknown, index: number, context: DecodeContext): DecodedDay {
  const field = `Forecast[${index}]`;
  const entry = requireRecord(value, field);
  const date = parseUsDate(entry.ForecastDate, `${field}.ForecastDate`);
  return {
    date,
    readings: {
      tree: parseReading(entry, "tree", date, field, context),
      grass: parseReading(entry, "grass", date, field, context),
      weed: parseReading(entry, "weed", date, field, context)
    }
  };
}

/**
 * Decodes a GetPollenData response (us). Values from this endpoint are known
 * to differ from what the public website shows.
 */
export function decodeLegacyPayload(payload: unknown, context: DecodeContext): PollenForecast {
  const root = requireRecord(payload, "payload");
  const days = requireArray(root.Forecast, "Forecast").map((entry, index) =>
    parseForecastEntry(entry, index, context)
  );
  return buildPollenForecast(days, context.today);
}
