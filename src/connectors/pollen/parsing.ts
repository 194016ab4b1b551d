import { UpstreamFormatError } from "./errors.js";

export function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function asNonEmptyString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export interface Measurement {
  count: number | null;
  /** Lower-cased unit suffix of a string count such as "40 GR/M3". */
  unit: string | undefined;
}

/**
 * Reads a pollen count. `null`/absent means "not measured"; anything else
 * must be a finite, non-negative number (or a numeric string with an
 * optional unit suffix).
 */
export function parseMeasurement(value: unknown, field: string): Measurement {
  if (value === undefined || value === null) {
    return { count: null, unit: undefined };
  }

  let parsed: number;
  let unit: string | undefined;
  if (typeof value === "number") {
    parsed = value;
  } else {
    const match = typeof value === "string" ? /^\s*(\d+(?:\.\d+)?)(?:\s+(\S+))?\s*$/.exec(value) : null;
    if (!match) {
      throw new UpstreamFormatError(`${field} must be a number, got ${JSON.stringify(value)}`);
    }
    parsed = Number.parseFloat(match[1] ?? "");
    unit = match[2]?.toLowerCase();
  }

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new UpstreamFormatError(`${field} must be a non-negative number, got ${String(value)}`);
  }
  return { count: parsed, unit };
}

export function parseCount(value: unknown, field: string): number | null {
  return parseMeasurement(value, field).count;
}

export function requireArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new UpstreamFormatError(`${field} must be an array`);
  }
  return value;
}

export function requireRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isObjectRecord(value)) {
    throw new UpstreamFormatError(`${field} must be an object`);
  }
  return value;
}
