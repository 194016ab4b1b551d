import { readFileSync } from "node:fs";

import {
  UnsupportedLocationError,
  parseRegion,
  validateLocation,
  type LocationQuery,
  type PollenLocation
} from "../connectors/pollen/index.js";
import { parseOptionalString, type EnvSource } from "./env.js";

interface RawLocationEntry {
  name?: unknown;
  region?: unknown;
  latitude?: unknown;
  longitude?: unknown;
  city?: unknown;
  postalCode?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function toNumber(value: unknown, field: string, name: string): number {
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new UnsupportedLocationError(`Location ${name}: ${field} must be a number`);
  }
  return parsed;
}

function toOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? parseOptionalString(value) : undefined;
}

function buildQuery(entry: RawLocationEntry, name: string): LocationQuery {
  const city = toOptionalString(entry.city);
  const postalCode =
    typeof entry.postalCode === "number" ? String(entry.postalCode) : toOptionalString(entry.postalCode);
  const hasCoordinates = entry.latitude != null || entry.longitude != null;

  const given = [hasCoordinates, city !== undefined, postalCode !== undefined].filter(Boolean).length;
  if (given !== 1) {
    throw new UnsupportedLocationError(
      `Location ${name}: configure exactly one of latitude/longitude, city or postalCode`
    );
  }

  if (hasCoordinates) {
    return {
      by: "coordinates",
      latitude: toNumber(entry.latitude, "latitude", name),
      longitude: toNumber(entry.longitude, "longitude", name)
    };
  }
  if (city !== undefined) {
    return { by: "city", city };
  }
  return { by: "postal", postalCode: postalCode ?? "" };
}

/**
 * Turns one configuration entry into a validated location. Throws
 * UnsupportedLocationError for anything the endpoint family cannot serve.
 */
export function parseLocationEntry(value: unknown): PollenLocation {
  if (!isRecord(value)) {
    throw new UnsupportedLocationError("Location entry must be an object");
  }
  const entry: RawLocationEntry = value;
  const name = toOptionalString(entry.name);
  if (!name) {
    throw new UnsupportedLocationError("Location name must be non-empty");
  }
  const regionValue = toOptionalString(entry.region);
  if (!regionValue) {
    throw new UnsupportedLocationError(`Location ${name}: region is required`);
  }

  const location: PollenLocation = {
    name,
    region: parseRegion(regionValue),
    query: buildQuery(entry, name)
  };
  validateLocation(location);
  return location;
}

export function parseLocationsDocument(value: unknown): PollenLocation[] {
  if (!isRecord(value) || !Array.isArray(value.locations)) {
    throw new UnsupportedLocationError('Locations config must be an object with a "locations" array');
  }

  const locations = value.locations.map((entry) => parseLocationEntry(entry));
  const seen = new Set<string>();
  for (const location of locations) {
    if (seen.has(location.name)) {
      throw new UnsupportedLocationError(`Location ${location.name} is configured more than once`);
    }
    seen.add(location.name);
  }
  return locations;
}

export function loadLocationsFromFile(path: string): PollenLocation[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new Error(`Locations config could not be read as JSON: ${path}`, { cause: error });
  }
  return parseLocationsDocument(parsed);
}

function envKey(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

/**
 * Reads `POLLEN_LOCATIONS=home,office` plus `POLLEN_LOCATION_HOME_REGION`,
 * `_LATITUDE`, `_LONGITUDE`, `_CITY` or `_POSTAL_CODE` for each name.
 */
export function loadLocationsFromEnv(env: EnvSource): PollenLocation[] {
  const names = (parseOptionalString(env.POLLEN_LOCATIONS) ?? "")
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");

  return parseLocationsDocument({
    locations: names.map((name) => {
      const prefix = `POLLEN_LOCATION_${envKey(name)}_`;
      return {
        name,
        region: env[`${prefix}REGION`],
        latitude: parseOptionalString(env[`${prefix}LATITUDE`]),
        longitude: parseOptionalString(env[`${prefix}LONGITUDE`]),
        city: env[`${prefix}CITY`],
        postalCode: env[`${prefix}POSTAL_CODE`]
      };
    })
  });
}

/** File configuration wins over environment variables when both are present. */
export function loadLocations(configPath: string | undefined, env: EnvSource): PollenLocation[] {
  return configPath ? loadLocationsFromFile(configPath) : loadLocationsFromEnv(env);
}
