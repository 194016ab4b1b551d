import { UnsupportedLocationError } from "./errors.js";
import type { EndpointFamily, LocationQueryKind, PollenLocation, Region } from "./types.js";

export interface RegionDefinition {
  name: string;
  family: EndpointFamily;
  baseUrl: string;
  timeZone: string;
  unit: string;
}

export const REGIONS: Readonly<Record<Region, RegionDefinition>> = {
  fr: {
    name: "France",
    family: "current",
    baseUrl: "https://www.kleenex.fr",
    timeZone: "Europe/Paris",
    unit: "ppm"
  },
  it: {
    name: "Italy",
    family: "current",
    baseUrl: "https://www.it.scottex.com",
    timeZone: "Europe/Rome",
    unit: "ppm"
  },
  nl: {
    name: "Netherlands",
    family: "current",
    baseUrl: "https://www.kleenex.nl",
    timeZone: "Europe/Amsterdam",
    unit: "ppm"
  },
  uk: {
    name: "United Kingdom and Ireland",
    family: "current",
    baseUrl: "https://www.kleenex.co.uk",
    timeZone: "Europe/London",
    unit: "ppm"
  },
  us: {
    name: "United States of America",
    family: "legacy",
    baseUrl: "https://www.kleenex.com",
    timeZone: "America/New_York",
    unit: "gr/m3"
  }
};

const REGION_ALIASES: Readonly<Record<string, Region>> = {
  fr: "fr",
  it: "it",
  nl: "nl",
  uk: "uk",
  gb: "uk",
  ie: "uk",
  us: "us"
};

const SUPPORTED_QUERIES: Readonly<Record<EndpointFamily, readonly LocationQueryKind[]>> = {
  current: ["coordinates", "city"],
  legacy: ["coordinates", "city", "postal"]
};

const US_ZIP_PATTERN = /^\d{5}$/;

export function parseRegion(value: string): Region {
  const region = REGION_ALIASES[value.trim().toLowerCase()];
  if (!region) {
    throw new UnsupportedLocationError(
      `Unsupported region "${value}". Supported regions: ${Object.keys(REGIONS).join(", ")}`
    );
  }
  return region;
}

export function regionDefinition(region: Region): RegionDefinition {
  const definition: RegionDefinition | undefined = REGIONS[region];
  if (!definition) {
    throw new UnsupportedLocationError(`Unsupported region "${String(region)}"`);
  }
  return definition;
}

/**
 * Checks a location against its region's endpoint family. Runs at
 * configuration time so an unusable setup is rejected before any refresh.
 */
export function validateLocation(location: PollenLocation): void {
  const definition = regionDefinition(location.region);
  if (location.name.trim() === "") {
    throw new UnsupportedLocationError("Location name must be non-empty");
  }

  const query = location.query;
  if (!SUPPORTED_QUERIES[definition.family].includes(query.by)) {
    throw new UnsupportedLocationError(
      `Region ${location.region} does not support lookup by ${query.by}`
    );
  }

  switch (query.by) {
    case "coordinates":
      if (
        !Number.isFinite(query.latitude) ||
        !Number.isFinite(query.longitude) ||
        Math.abs(query.latitude) > 90 ||
        Math.abs(query.longitude) > 180
      ) {
        throw new UnsupportedLocationError(
          `Location ${location.name}: coordinates ${query.latitude},${query.longitude} are out of range`
        );
      }
      // zero coordinates mean "not configured" upstream
      if (query.latitude === 0 && query.longitude === 0) {
        throw new UnsupportedLocationError(`Location ${location.name}: coordinates must not be 0,0`);
      }
      return;
    case "city":
      if (query.city.trim() === "") {
        throw new UnsupportedLocationError(`Location ${location.name}: city must be non-empty`);
      }
      return;
    case "postal":
      if (!US_ZIP_PATTERN.test(query.postalCode.trim())) {
        throw new UnsupportedLocationError(
          `Location ${location.name}: postal code must be a 5-digit ZIP code`
        );
      }
      return;
  }
}

export function describeLocationQuery(location: PollenLocation): string {
  const query = location.query;
  switch (query.by) {
    case "coordinates":
      return `${query.latitude}x${query.longitude}`;
    case "city":
      return query.city;
    case "postal":
      return query.postalCode;
  }
}
