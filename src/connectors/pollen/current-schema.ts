import { UpstreamFormatError } from "./errors.js";
import { buildPollenForecast, isIsoDate } from "./forecast.js";
import {
  asNonEmptyString,
  parseCount,
  parseMeasurement,
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
  PollenType,
  SeverityThresholds
} from "./types.js";

/** Upstream keys of the current API family, per normalized pollen type. */
const CURRENT_TYPE_KEYS: Readonly<Record<PollenType, string>> = {
  tree: "trees",
  grass: "grass",
  weed: "weeds"
};

function parseDetails(
  value: unknown,
  type: PollenType,
  field: string,
  thresholds: SeverityThresholds
): PollenDetail[] {
  if (value === undefined || value === null) {
    return [];
  }

  return requireArray(value, field).map((item, index) => {
    const detail = requireRecord(item, `${field}[${index}]`);
    const name = asNonEmptyString(detail.name);
    if (!name) {
      throw new UpstreamFormatError(`${field}[${index}].name must be a non-empty string`);
    }
    const count = parseCount(detail.count, `${field}[${index}].count`);
    return {
      name,
      count,
      level: resolveSeverityLevel(type, count, detail.level, thresholds)
    };
  });
}

function parseReading(
  pollen: Record<string, unknown>,
  type: PollenType,
  date: string,
  field: string,
  context: DecodeContext
): PollenReading {
  const key = CURRENT_TYPE_KEYS[type];
  const entry = requireRecord(pollen[key], `${field}.${key}`);
  const { count, unit: countUnit } = parseMeasurement(entry.count, `${field}.${key}.count`);
  const declaredUnit = asNonEmptyString(entry.unit)?.toLowerCase();
  if (declaredUnit && countUnit && declaredUnit !== countUnit) {
    throw new UpstreamFormatError(
      `${field}.${key}.unit "${declaredUnit}" does not match count unit "${countUnit}"`
    );
  }

  return {
    type,
    date,
    count,
    level: resolveSeverityLevel(type, count, entry.level, context.thresholds),
    unit: declaredUnit ?? countUnit ?? context.defaultUnit,
    details: parseDetails(entry.details, type, `${field}.${key}.details`, context.thresholds)
  };
}

function parseDay(value: unknown, index: number, context: DecodeContext): DecodedDay {
  const field = `days[${index}]`;
  const day = requireRecord(value, field);
  const date = asNonEmptyString(day.date);
  if (!date || !isIsoDate(date)) {
    throw new UpstreamFormatError(`${field}.date must be a YYYY-MM-DD date`);
  }

  const pollen = requireRecord(day.pollen, `${field}.pollen`);
  return {
    date,
    readings: {
      tree: parseReading(pollen, "tree", date, `${field}.pollen`, context),
      grass: parseReading(pollen, "grass", date, `${field}.pollen`, context),
      weed: parseReading(pollen, "weed", date, `${field}.pollen`, context)
    }
  };
}

/**
 * Decodes a GetPollenContent response (nl, uk, fr, it). Levels supplied by
 * the upstream are kept; missing ones are derived from the threshold table.
 */
export function decodeCurrentPayload(payload: unknown, context: DecodeContext): PollenForecast {
  const root = requireRecord(payload, "payload");
  const days = requireArray(root.days, "days").map((day, index) => parseDay(day, index, context));
  return buildPollenForecast(days, context.today);
}
