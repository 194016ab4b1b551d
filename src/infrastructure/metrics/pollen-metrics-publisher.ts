import type { AppRedisClient } from "../redis/client.js";
import { flattenSensorMetrics, type SensorMetrics } from "../../sensors/metrics.js";

export interface PollenMetricsPublisher {
  publish(metrics: SensorMetrics): Promise<void>;
}

/**
 * Writes each location's sensor metrics into a Redis hash that the host
 * monitoring platform reads.
 *
 * Key pattern: pollen:metrics:{location}
 */
export class RedisPollenMetricsPublisher implements PollenMetricsPublisher {
  constructor(
    private readonly redis: AppRedisClient,
    private readonly ttlSeconds?: number
  ) {}

  async publish(metrics: SensorMetrics): Promise<void> {
    const key = this.getMetricsKey(metrics.location);
    await this.redis.hSet(key, flattenSensorMetrics(metrics));
    if (this.ttlSeconds) {
      await this.redis.expire(key, this.ttlSeconds);
    }
  }

  async read(location: string): Promise<Record<string, string> | undefined> {
    const data = await this.redis.hGetAll(this.getMetricsKey(location));
    if (!data || Object.keys(data).length === 0) {
      return undefined;
    }
    return data;
  }

  private getMetricsKey(location: string): string {
    if (!location || location.trim() === "") {
      throw new Error("Location name must be non-empty");
    }
    return `pollen:metrics:${location}`;
  }
}
