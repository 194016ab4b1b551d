import { loadConfig, loadSeverityThresholds } from "../config/env.js";
import { checkLocations } from "../config/location-check.js";
import { loadLocations } from "../config/location-loader.js";
import { PollenApiClient } from "../connectors/pollen/index.js";
import { CoordinatorRegistry } from "../coordinator/registry.js";
import type { RefreshListener } from "../coordinator/types.js";
import { createConsoleLogger, errorMessage } from "../infrastructure/logging/logger.js";
import { RedisPollenMetricsPublisher } from "../infrastructure/metrics/pollen-metrics-publisher.js";
import { RefreshMetricsCollector } from "../infrastructure/metrics/refresh-metrics.js";
import {
  createConnectedRedisClient,
  registerRedisGracefulShutdown
} from "../infrastructure/redis/client.js";
import { toSensorMetrics } from "../sensors/metrics.js";

async function main(): Promise<void> {
  const logger = createConsoleLogger("pollen-worker");
  const config = loadConfig();
  const locations = loadLocations(config.pollenLocationsConfigPath, process.env);
  if (locations.length === 0) {
    throw new Error("No pollen locations configured");
  }

  const client = new PollenApiClient({
    requestTimeoutMs: config.pollenRequestTimeoutMs,
    thresholds: loadSeverityThresholds(config.pollenThresholdsPath),
    ...(config.pollenUserAgent ? { userAgent: config.pollenUserAgent } : {})
  });

  if (process.argv.includes("--check-locations")) {
    const results = await checkLocations(client, locations, logger);
    const failed = results.filter((result) => !result.ok).length;
    logger.info("location check finished", { checked: results.length, failed });
    if (failed > 0) {
      process.exitCode = 1;
    }
    return;
  }

  const redis = config.redisUrl
    ? await createConnectedRedisClient({
        url: config.redisUrl,
        clientName: "pollen-coordinator-worker",
        reconnectMaxDelayMs: config.redisReconnectMaxDelayMs,
        logger: createConsoleLogger("redis")
      })
    : undefined;
  const publisher = redis ? new RedisPollenMetricsPublisher(redis) : undefined;
  const refreshMetrics = redis ? new RefreshMetricsCollector(redis) : undefined;
  if (!redis) {
    logger.warn("REDIS_URL not set, metrics publishing disabled");
  }

  let registry: CoordinatorRegistry | undefined;
  const onRefresh: RefreshListener = async (outcome, diagnostics) => {
    const name = diagnostics.location.name;
    if (outcome.status === "skipped" || !registry) {
      return;
    }
    const metrics = toSensorMetrics(name, registry.getSnapshot(name));
    logger.info("pollen metrics updated", {
      location: name,
      status: outcome.status,
      health: metrics.health,
      trees: metrics.pollen.trees?.value ?? null,
      grass: metrics.pollen.grass?.value ?? null,
      weeds: metrics.pollen.weeds?.value ?? null
    });
    await publisher?.publish(metrics);
    await refreshMetrics?.recordRefresh(name, outcome);
  };

  registry = new CoordinatorRegistry({
    client,
    defaults: {
      refreshIntervalMs: config.pollenRefreshIntervalMs,
      failureEscalationThreshold: config.pollenFailureEscalationThreshold,
      retryBaseDelayMs: config.pollenRetryBaseDelayMs,
      maxBackoffMs: config.pollenMaxBackoffMs,
      onRefresh
    },
    loggerFor: (location) => createConsoleLogger(`pollen:${location.name}`)
  });

  const stopRegistry = (): void => {
    registry?.stopAll();
  };

  if (redis) {
    registerRedisGracefulShutdown(redis, logger, stopRegistry);
  } else {
    process.once("SIGINT", stopRegistry);
    process.once("SIGTERM", stopRegistry);
  }

  for (const location of locations) {
    const outcome = await registry.add(location);
    if (outcome.status === "failure") {
      logger.warn("first refresh failed, coordinator keeps retrying", {
        location: location.name,
        error: outcome.error.message
      });
    }
  }
  logger.info("pollen coordinators running", { locations: locations.map((l) => l.name) });
}

main().catch((error: unknown) => {
  console.error("[pollen-worker] fatal", errorMessage(error));
  process.exitCode = 1;
});
