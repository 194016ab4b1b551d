import type {
  ForecastSet,
  PollenDetail,
  SeverityLevel
} from "../connectors/pollen/index.js";
import type { CoordinatorHealth, SnapshotReadResult } from "../coordinator/types.js";

/** Metric names exposed to the host platform, one per pollen type. */
export type PollenMetricKey = "trees" | "grass" | "weeds";

const METRIC_KEYS: readonly PollenMetricKey[] = ["trees", "grass", "weeds"];

export interface ForecastAttribute {
  date: string;
  value: number | null;
  level: SeverityLevel | null;
  details: PollenDetail[];
}

export interface PollenMetric {
  value: number | null;
  level: SeverityLevel | null;
  unit: string;
  details: PollenDetail[];
  forecast: ForecastAttribute[];
}

export interface SensorMetrics {
  location: string;
  available: boolean;
  stale: boolean;
  health: CoordinatorHealth;
  date: string | null;
  lastUpdated: string | null;
  unavailableSince: string | null;
  error: string | null;
  pollen: Record<PollenMetricKey, PollenMetric | null>;
}

function toPollenMetric(set: ForecastSet): PollenMetric | null {
  const [today, ...upcoming] = set;
  if (!today) {
    return null;
  }
  return {
    value: today.count,
    level: today.level,
    unit: today.unit,
    details: today.details,
    forecast: upcoming.map((reading) => ({
      date: reading.date,
      value: reading.count,
      level: reading.level,
      details: reading.details
    }))
  };
}

export function toSensorMetrics(location: string, view: SnapshotReadResult): SensorMetrics {
  if (view.kind === "unavailable") {
    return {
      location,
      available: false,
      stale: false,
      health: view.health,
      date: null,
      lastUpdated: null,
      unavailableSince: view.since?.toISOString() ?? null,
      error: view.lastError?.message ?? null,
      pollen: { trees: null, grass: null, weeds: null }
    };
  }

  const { forecast, updatedAt } = view.snapshot;
  return {
    location,
    available: true,
    stale: view.stale,
    health: view.health,
    date: forecast.tree[0]?.date ?? null,
    lastUpdated: updatedAt.toISOString(),
    unavailableSince: view.unavailableSince?.toISOString() ?? null,
    error: null,
    pollen: {
      trees: toPollenMetric(forecast.tree),
      grass: toPollenMetric(forecast.grass),
      weeds: toPollenMetric(forecast.weed)
    }
  };
}

/**
 * Flattens metrics into string fields (`trees`, `trees_level`, `trees_forecast`, ...)
 * for hash-based stores. Absent values become empty strings.
 */
export function flattenSensorMetrics(metrics: SensorMetrics): Record<string, string> {
  const fields: Record<string, string> = {
    location: metrics.location,
    available: String(metrics.available),
    stale: String(metrics.stale),
    health: metrics.health,
    date: metrics.date ?? "",
    last_updated: metrics.lastUpdated ?? "",
    unavailable_since: metrics.unavailableSince ?? "",
    error: metrics.error ?? ""
  };

  for (const key of METRIC_KEYS) {
    const metric = metrics.pollen[key];
    fields[key] = metric && metric.value !== null ? String(metric.value) : "";
    fields[`${key}_level`] = metric?.level ?? "";
    fields[`${key}_unit`] = metric?.unit ?? "";
    fields[`${key}_details`] = JSON.stringify(metric?.details ?? []);
    fields[`${key}_forecast`] = JSON.stringify(metric?.forecast ?? []);
  }
  return fields;
}
