import type {
  EndpointFamily,
  PollenApiErrorKind,
  PollenForecast,
  PollenForecastProvider,
  PollenLocation
} from "../connectors/pollen/index.js";
import type { Logger } from "../infrastructure/logging/logger.js";

export type CoordinatorState = "idle" | "refreshing" | "stopped";

/**
 * `degraded` while failures stay below the escalation threshold,
 * `failing` once they reach it or the location turns out to be unusable.
 */
export type CoordinatorHealth = "healthy" | "degraded" | "failing";

export interface Snapshot {
  readonly location: PollenLocation;
  readonly family: EndpointFamily;
  readonly forecast: PollenForecast;
  readonly updatedAt: Date;
  readonly raw: unknown;
}

export interface RefreshErrorInfo {
  kind: PollenApiErrorKind | "unknown";
  message: string;
  retryable: boolean;
  at: Date;
}

export interface SnapshotView {
  kind: "snapshot";
  snapshot: Snapshot;
  stale: boolean;
  unavailableSince: Date | undefined;
  health: CoordinatorHealth;
}

export interface Unavailable {
  kind: "unavailable";
  since: Date | undefined;
  lastError: RefreshErrorInfo | undefined;
  health: CoordinatorHealth;
}

export type SnapshotReadResult = SnapshotView | Unavailable;

export type RefreshOutcome =
  | { status: "success"; snapshot: Snapshot; durationMs: number }
  | {
      status: "failure";
      error: RefreshErrorInfo;
      snapshot: Snapshot | undefined;
      durationMs: number;
    }
  | { status: "skipped"; reason: "stopped" | "already_started" };

export interface CoordinatorDiagnostics {
  location: PollenLocation;
  state: CoordinatorState;
  health: CoordinatorHealth;
  rawPayload: unknown;
  lastError: RefreshErrorInfo | undefined;
  consecutiveFailures: number;
  lastUpdated: Date | undefined;
  lastAttemptAt: Date | undefined;
  unavailableSince: Date | undefined;
  nextRefreshAt: Date | undefined;
}

export interface ScheduledTask {
  cancel(): void;
}

export interface Scheduler {
  now(): Date;
  schedule(callback: () => void, delayMs: number): ScheduledTask;
}

export type RefreshListener = (
  outcome: RefreshOutcome,
  diagnostics: CoordinatorDiagnostics
) => void | Promise<void>;

export interface UpdateCoordinatorOptions {
  location: PollenLocation;
  client: PollenForecastProvider;
  refreshIntervalMs?: number;
  failureEscalationThreshold?: number;
  retryBaseDelayMs?: number;
  maxBackoffMs?: number;
  jitterRatio?: number;
  scheduler?: Scheduler;
  random?: () => number;
  logger?: Logger;
  onRefresh?: RefreshListener;
}
