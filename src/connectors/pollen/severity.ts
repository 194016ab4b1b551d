import { UpstreamFormatError } from "./errors.js";
import { isObjectRecord } from "./parsing.js";
import type { PollenType, SeverityLevel, SeverityThresholds } from "./types.js";

export const SEVERITY_LEVELS: readonly SeverityLevel[] = [
  "none",
  "low",
  "moderate",
  "high",
  "very-high"
];

export const POLLEN_TYPES: readonly PollenType[] = ["tree", "grass", "weed"];

export const DEFAULT_THRESHOLDS: SeverityThresholds = {
  tree: [95, 207, 703],
  grass: [29, 60, 341],
  weed: [20, 77, 266]
};

const BANDED_LEVELS = ["low", "moderate", "high"] as const;

export function deriveSeverityLevel(
  type: PollenType,
  count: number,
  thresholds: SeverityThresholds = DEFAULT_THRESHOLDS
): SeverityLevel {
  if (!Number.isFinite(count) || count < 0) {
    throw new RangeError(`Pollen count must be a non-negative number, got ${count}`);
  }
  if (count === 0) {
    return "none";
  }

  const bounds = thresholds[type];
  for (let index = 0; index < BANDED_LEVELS.length; index += 1) {
    const bound = bounds[index];
    const level = BANDED_LEVELS[index];
    if (bound !== undefined && level !== undefined && count <= bound) {
      return level;
    }
  }
  return "very-high";
}

export function severityRank(level: SeverityLevel): number {
  return SEVERITY_LEVELS.indexOf(level);
}

/**
 * Normalizes an upstream level label ("Very High", "very_high", "MODERATE").
 * Returns undefined for an absent or blank label so the caller can derive one.
 */
export function parseSeverityLevel(value: unknown): SeverityLevel | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new UpstreamFormatError(`Pollen level must be a string, got ${typeof value}`);
  }

  const normalized = value.trim().toLowerCase().replace(/[\s_]+/g, "-");
  if (normalized === "") {
    return undefined;
  }
  const level = SEVERITY_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new UpstreamFormatError(`Unknown pollen level "${value}"`);
  }
  return level;
}

export function resolveSeverityLevel(
  type: PollenType,
  count: number | null,
  upstreamLevel: unknown,
  thresholds: SeverityThresholds
): SeverityLevel | null {
  const parsed = parseSeverityLevel(upstreamLevel);
  if (parsed) {
    return parsed;
  }
  return count === null ? null : deriveSeverityLevel(type, count, thresholds);
}

function isAscendingBounds(value: unknown): value is [number, number, number] {
  if (!Array.isArray(value) || value.length !== 3) {
    return false;
  }
  let previous = 0;
  for (const bound of value) {
    if (typeof bound !== "number" || !Number.isFinite(bound) || bound <= previous) {
      return false;
    }
    previous = bound;
  }
  return true;
}

/** Validates a threshold table loaded from configuration. */
export function parseSeverityThresholds(value: unknown): SeverityThresholds {
  if (!isObjectRecord(value)) {
    throw new Error("Severity thresholds must be an object keyed by pollen type");
  }
  const { tree, grass, weed } = value;
  if (!isAscendingBounds(tree) || !isAscendingBounds(grass) || !isAscendingBounds(weed)) {
    throw new Error(
      "Severity thresholds for tree, grass and weed must each be three positive, strictly ascending numbers"
    );
  }
  return { tree, grass, weed };
}
