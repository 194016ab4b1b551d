import { readFileSync } from "node:fs";

import {
  DEFAULT_THRESHOLDS,
  parseSeverityThresholds,
  type SeverityThresholds
} from "../connectors/pollen/index.js";

export interface AppConfig {
  redisUrl: string | undefined;
  redisReconnectMaxDelayMs: number;
  pollenRefreshIntervalMs: number;
  pollenRequestTimeoutMs: number;
  pollenFailureEscalationThreshold: number;
  pollenRetryBaseDelayMs: number;
  pollenMaxBackoffMs: number;
  pollenUserAgent: string | undefined;
  pollenLocationsConfigPath: string | undefined;
  pollenThresholdsPath: string | undefined;
}

export type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

const MIN_REFRESH_INTERVAL_MS = 60_000;

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

export function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const pollenRefreshIntervalMs = parsePositiveInt(
    env.POLLEN_REFRESH_INTERVAL_MS,
    3_600_000,
    "POLLEN_REFRESH_INTERVAL_MS"
  );
  if (pollenRefreshIntervalMs < MIN_REFRESH_INTERVAL_MS) {
    throw new Error(`POLLEN_REFRESH_INTERVAL_MS must be at least ${MIN_REFRESH_INTERVAL_MS}`);
  }

  const pollenRetryBaseDelayMs = parsePositiveInt(
    env.POLLEN_RETRY_BASE_DELAY_MS,
    60_000,
    "POLLEN_RETRY_BASE_DELAY_MS"
  );
  const pollenMaxBackoffMs = parsePositiveInt(
    env.POLLEN_MAX_BACKOFF_MS,
    21_600_000,
    "POLLEN_MAX_BACKOFF_MS"
  );
  if (pollenMaxBackoffMs < pollenRetryBaseDelayMs) {
    throw new Error("POLLEN_MAX_BACKOFF_MS must not be smaller than POLLEN_RETRY_BASE_DELAY_MS");
  }

  return {
    redisUrl: parseOptionalString(env.REDIS_URL),
    redisReconnectMaxDelayMs: parsePositiveInt(
      env.REDIS_RECONNECT_MAX_DELAY_MS,
      2_000,
      "REDIS_RECONNECT_MAX_DELAY_MS"
    ),
    pollenRefreshIntervalMs,
    pollenRequestTimeoutMs: parsePositiveInt(
      env.POLLEN_REQUEST_TIMEOUT_MS,
      10_000,
      "POLLEN_REQUEST_TIMEOUT_MS"
    ),
    pollenFailureEscalationThreshold: parsePositiveInt(
      env.POLLEN_FAILURE_ESCALATION_THRESHOLD,
      3,
      "POLLEN_FAILURE_ESCALATION_THRESHOLD"
    ),
    pollenRetryBaseDelayMs,
    pollenMaxBackoffMs,
    pollenUserAgent: parseOptionalString(env.POLLEN_USER_AGENT),
    pollenLocationsConfigPath: parseOptionalString(env.POLLEN_LOCATIONS_CONFIG_PATH),
    pollenThresholdsPath: parseOptionalString(env.POLLEN_THRESHOLDS_PATH)
  };
}

/**
 * Reads the severity table from a JSON file, or returns the built-in table
 * when no path is configured.
 */
export function loadSeverityThresholds(path: string | undefined): SeverityThresholds {
  if (!path) {
    return DEFAULT_THRESHOLDS;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new Error(`POLLEN_THRESHOLDS_PATH could not be read as JSON: ${path}`, { cause: error });
  }
  return parseSeverityThresholds(parsed);
}
