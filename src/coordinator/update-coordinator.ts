import {
  HttpStatusError,
  NetworkError,
  RateLimitOrBlockedError,
  UnsupportedLocationError,
  UpstreamFormatError,
  describeLocationQuery,
  isPollenApiError,
  validateLocation,
  type PollenFetchResult,
  type PollenForecastProvider,
  type PollenLocation
} from "../connectors/pollen/index.js";
import { createNoopLogger, errorMessage, type Logger } from "../infrastructure/logging/logger.js";
import type {
  CoordinatorDiagnostics,
  CoordinatorHealth,
  CoordinatorState,
  RefreshErrorInfo,
  RefreshListener,
  RefreshOutcome,
  ScheduledTask,
  Scheduler,
  Snapshot,
  SnapshotReadResult,
  UpdateCoordinatorOptions
} from "./types.js";

export const DEFAULT_REFRESH_INTERVAL_MS = 60 * 60 * 1000;
export const MIN_REFRESH_INTERVAL_MS = 60 * 1000;
export const DEFAULT_FAILURE_ESCALATION_THRESHOLD = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 60 * 1000;
export const DEFAULT_MAX_BACKOFF_MS = 6 * 60 * 60 * 1000;
export const DEFAULT_JITTER_RATIO = 0.1;

export const systemScheduler: Scheduler = {
  now: () => new Date(),
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return {
      cancel() {
        clearTimeout(handle);
      }
    };
  }
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function toRefreshErrorInfo(error: unknown, at: Date): RefreshErrorInfo {
  if (isPollenApiError(error)) {
    return { kind: error.kind, message: error.message, retryable: error.retryable, at };
  }
  return { kind: "unknown", message: errorMessage(error), retryable: true, at };
}

/**
 * Owns the refresh pipeline and the last good snapshot for one location.
 *
 * At most one client call is outstanding at a time: a refresh requested
 * while another is in flight shares its result. Failures never discard
 * the previous snapshot; they mark it stale and back off instead.
 */
export class PollenUpdateCoordinator {
  readonly location: PollenLocation;

  private readonly client: PollenForecastProvider;
  private readonly refreshIntervalMs: number;
  private readonly failureEscalationThreshold: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxBackoffMs: number;
  private readonly jitterRatio: number;
  private readonly scheduler: Scheduler;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly onRefresh: RefreshListener | undefined;

  private state: CoordinatorState = "idle";
  private started = false;
  private fatal = false;
  private snapshot: Snapshot | undefined;
  private lastRawPayload: unknown;
  private lastError: RefreshErrorInfo | undefined;
  private consecutiveFailures = 0;
  private unavailableSince: Date | undefined;
  private lastAttemptAt: Date | undefined;
  private nextRefreshAt: Date | undefined;
  private timer: ScheduledTask | undefined;
  private inFlight: Promise<RefreshOutcome> | undefined;
  private abortController: AbortController | undefined;

  constructor(options: UpdateCoordinatorOptions) {
    validateLocation(options.location);

    this.location = options.location;
    this.client = options.client;
    this.logger = options.logger ?? createNoopLogger();
    this.scheduler = options.scheduler ?? systemScheduler;
    this.random = options.random ?? Math.random;
    this.onRefresh = options.onRefresh;

    const interval = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    if (interval < MIN_REFRESH_INTERVAL_MS) {
      this.logger.warn("refresh interval too short, using minimum instead", {
        location: this.location.name,
        requested_ms: interval,
        minimum_ms: MIN_REFRESH_INTERVAL_MS
      });
    }
    this.refreshIntervalMs = Math.max(interval, MIN_REFRESH_INTERVAL_MS);

    this.failureEscalationThreshold = Math.max(
      1,
      Math.trunc(options.failureEscalationThreshold ?? DEFAULT_FAILURE_ESCALATION_THRESHOLD)
    );
    this.retryBaseDelayMs = Math.max(1, options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS);
    this.maxBackoffMs = Math.max(this.refreshIntervalMs, options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS);
    this.jitterRatio = Math.min(1, Math.max(0, options.jitterRatio ?? DEFAULT_JITTER_RATIO));
  }

  get health(): CoordinatorHealth {
    if (this.fatal || this.consecutiveFailures >= this.failureEscalationThreshold) {
      return "failing";
    }
    return this.consecutiveFailures > 0 ? "degraded" : "healthy";
  }

  /** Runs the first refresh and keeps the schedule going until `stop()`. */
  start(): Promise<RefreshOutcome> {
    if (this.started) {
      return Promise.resolve({ status: "skipped", reason: "already_started" });
    }
    this.started = true;
    this.logger.info("starting pollen coordinator", {
      location: this.location.name,
      region: this.location.region,
      query: describeLocationQuery(this.location),
      refresh_interval_ms: this.refreshIntervalMs
    });
    return this.refresh();
  }

  stop(): void {
    if (this.state === "stopped") {
      return;
    }
    this.state = "stopped";
    this.cancelTimer();
    this.abortController?.abort();
    this.logger.info("stopped pollen coordinator", { location: this.location.name });
  }

  /** Never rejects; a refresh requested mid-flight gets the in-flight result. */
  refresh(): Promise<RefreshOutcome> {
    if (this.state === "stopped") {
      return Promise.resolve({ status: "skipped", reason: "stopped" });
    }
    if (this.inFlight) {
      return this.inFlight;
    }

    this.cancelTimer();
    const run = this.runRefresh().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = run;
    return run;
  }

  requestRefresh(): void {
    void this.refresh();
  }

  isRefreshing(): boolean {
    return this.inFlight !== undefined;
  }

  getSnapshot(): SnapshotReadResult {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return {
        kind: "unavailable",
        since: this.unavailableSince,
        lastError: this.lastError,
        health: this.health
      };
    }
    return {
      kind: "snapshot",
      snapshot,
      stale: this.consecutiveFailures > 0,
      unavailableSince: this.unavailableSince,
      health: this.health
    };
  }

  lastUpdated(): Date | undefined {
    return this.snapshot?.updatedAt;
  }

  diagnostics(): CoordinatorDiagnostics {
    return {
      location: this.location,
      state: this.state,
      health: this.health,
      rawPayload: this.lastRawPayload,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
      lastUpdated: this.lastUpdated(),
      lastAttemptAt: this.lastAttemptAt,
      unavailableSince: this.unavailableSince,
      nextRefreshAt: this.nextRefreshAt
    };
  }

  private async runRefresh(): Promise<RefreshOutcome> {
    const controller = new AbortController();
    this.abortController = controller;
    this.state = "refreshing";
    const startedAt = this.scheduler.now();
    this.lastAttemptAt = startedAt;

    let outcome: RefreshOutcome;
    try {
      const result = await this.client.fetch(this.location, { signal: controller.signal });
      if (this.isStopped()) {
        return { status: "skipped", reason: "stopped" };
      }
      outcome = this.applySuccess(result, startedAt);
    } catch (error) {
      if (this.isStopped()) {
        return { status: "skipped", reason: "stopped" };
      }
      outcome = this.applyFailure(error, startedAt);
    } finally {
      if (this.abortController === controller) {
        this.abortController = undefined;
      }
    }

    this.notify(outcome);
    return outcome;
  }

  private isStopped(): boolean {
    return this.state === "stopped";
  }

  private applySuccess(result: PollenFetchResult, startedAt: Date): RefreshOutcome {
    const updatedAt = this.scheduler.now();
    const snapshot: Snapshot = deepFreeze({
      location: this.location,
      family: result.family,
      forecast: result.forecast,
      updatedAt,
      raw: result.raw
    });

    const recovered = this.consecutiveFailures > 0;
    // single assignment: readers see either the old or the new snapshot
    this.snapshot = snapshot;
    this.lastRawPayload = result.raw;
    this.consecutiveFailures = 0;
    this.fatal = false;
    this.unavailableSince = undefined;
    this.lastError = undefined;
    this.state = "idle";

    if (recovered) {
      this.logger.info("pollen refresh recovered", { location: this.location.name });
    }
    this.scheduleNext(this.refreshIntervalMs);

    return {
      status: "success",
      snapshot,
      durationMs: updatedAt.getTime() - startedAt.getTime()
    };
  }

  private applyFailure(error: unknown, startedAt: Date): RefreshOutcome {
    const at = this.scheduler.now();
    const info = toRefreshErrorInfo(error, at);
    const previousHealth = this.health;

    this.consecutiveFailures += 1;
    this.lastError = info;
    this.unavailableSince ??= at;
    if (error instanceof UpstreamFormatError && error.raw !== undefined) {
      this.lastRawPayload = error.raw;
    }
    if (error instanceof UnsupportedLocationError) {
      this.fatal = true;
    }
    this.state = "idle";

    const context = {
      location: this.location.name,
      kind: info.kind,
      error: info.message,
      consecutive_failures: this.consecutiveFailures,
      has_snapshot: this.snapshot !== undefined
    };
    if (this.health === "failing" && previousHealth !== "failing") {
      this.logger.error("pollen refresh failing, escalating", context);
    } else {
      this.logger.warn("pollen refresh failed, serving last known snapshot", context);
    }

    if (this.fatal) {
      this.nextRefreshAt = undefined;
    } else {
      this.scheduleNext(this.failureDelayMs(error));
    }

    return {
      status: "failure",
      error: info,
      snapshot: this.snapshot,
      durationMs: at.getTime() - startedAt.getTime()
    };
  }

  private failureDelayMs(error: unknown): number {
    const exponent = Math.max(0, this.consecutiveFailures - 1);

    if (error instanceof RateLimitOrBlockedError) {
      // jitter applies to the backoff only; Retry-After is a floor
      const backoff = this.withJitter(this.refreshIntervalMs * 2 ** exponent);
      return Math.min(Math.max(error.retryAfterMs ?? 0, backoff), this.maxBackoffMs);
    }
    if (
      error instanceof NetworkError ||
      (error instanceof HttpStatusError && error.retryable)
    ) {
      const backoff = Math.min(this.retryBaseDelayMs * 2 ** exponent, this.refreshIntervalMs);
      return this.withJitter(backoff);
    }
    // format changes and client errors need a code or upstream fix; keep the normal cadence
    return this.refreshIntervalMs;
  }

  private withJitter(delayMs: number): number {
    const offset = (this.random() * 2 - 1) * this.jitterRatio * delayMs;
    return Math.max(0, Math.round(delayMs + offset));
  }

  private scheduleNext(delayMs: number): void {
    this.cancelTimer();
    this.nextRefreshAt = new Date(this.scheduler.now().getTime() + delayMs);
    this.timer = this.scheduler.schedule(() => {
      this.timer = undefined;
      this.requestRefresh();
    }, delayMs);
  }

  private cancelTimer(): void {
    this.timer?.cancel();
    this.timer = undefined;
    this.nextRefreshAt = undefined;
  }

  private notify(outcome: RefreshOutcome): void {
    if (!this.onRefresh) {
      return;
    }
    const handleListenerError = (error: unknown): void => {
      this.logger.error("refresh listener failed", {
        location: this.location.name,
        error: errorMessage(error)
      });
    };
    try {
      const result = this.onRefresh(outcome, this.diagnostics());
      if (result instanceof Promise) {
        result.catch(handleListenerError);
      }
    } catch (error) {
      handleListenerError(error);
    }
  }
}
