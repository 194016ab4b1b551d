import type { AppRedisClient } from "../redis/client.js";
import type { RefreshOutcome } from "../../coordinator/types.js";

/**
 * Refresh counters for a single location.
 */
export interface RefreshMetrics {
  location: string;
  lastRefreshTime: string; // ISO timestamp
  lastSuccessTime: string | undefined; // ISO timestamp
  totalRefreshes: number;
  successfulRefreshes: number;
  failedRefreshes: number;
  averageLatencyMs: number;
}

/**
 * Collect and persist refresh metrics per location.
 * Uses Redis hash for storage.
 *
 * Key pattern: metrics:pollen-refresh:{location}
 */
export class RefreshMetricsCollector {
  constructor(
    private readonly redis: AppRedisClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Record a finished refresh. Skipped refreshes are not counted.
   */
  async recordRefresh(location: string, outcome: RefreshOutcome): Promise<void> {
    if (outcome.status === "skipped") {
      return;
    }

    const key = this.getMetricsKey(location);
    const now = this.now().toISOString();
    const current = await this.getMetrics(location);

    const isSuccess = outcome.status === "success";
    const totalRefreshes = (current?.totalRefreshes ?? 0) + 1;
    const successfulRefreshes = (current?.successfulRefreshes ?? 0) + (isSuccess ? 1 : 0);
    const failedRefreshes = (current?.failedRefreshes ?? 0) + (isSuccess ? 0 : 1);

    // running average
    const prevLatencySum = (current?.averageLatencyMs ?? 0) * (totalRefreshes - 1);
    const averageLatencyMs = Math.round((prevLatencySum + outcome.durationMs) / totalRefreshes);

    await this.redis.hSet(key, {
      location,
      lastRefreshTime: now,
      ...(isSuccess && { lastSuccessTime: now }),
      totalRefreshes: String(totalRefreshes),
      successfulRefreshes: String(successfulRefreshes),
      failedRefreshes: String(failedRefreshes),
      averageLatencyMs: String(averageLatencyMs)
    });

    // keep metrics for 30 days
    await this.redis.expire(key, 30 * 24 * 60 * 60);
  }

  async getMetrics(location: string): Promise<RefreshMetrics | undefined> {
    const data = await this.redis.hGetAll(this.getMetricsKey(location));

    if (!data || Object.keys(data).length === 0) {
      return undefined;
    }

    return {
      location: data.location || location,
      lastRefreshTime: data.lastRefreshTime || "",
      lastSuccessTime: data.lastSuccessTime || undefined,
      totalRefreshes: parseInt(data.totalRefreshes || "0", 10),
      successfulRefreshes: parseInt(data.successfulRefreshes || "0", 10),
      failedRefreshes: parseInt(data.failedRefreshes || "0", 10),
      averageLatencyMs: parseInt(data.averageLatencyMs || "0", 10)
    };
  }

  private getMetricsKey(location: string): string {
    if (!location || location.trim() === "") {
      throw new Error("Location name must be non-empty");
    }
    return `metrics:pollen-refresh:${location}`;
  }
}
