import { createClient } from "redis";

import { createNoopLogger, errorMessage, type Logger } from "../logging/logger.js";

export interface RedisClientOptions {
  url: string;
  clientName?: string;
  /** Upper bound of the linear reconnect delay. Defaults to 2 s. */
  reconnectMaxDelayMs?: number;
  logger?: Logger;
}

export type AppRedisClient = ReturnType<typeof createClient>;
export type AppRedisClientOptions = NonNullable<Parameters<typeof createClient>[0]>;

export const DEFAULT_RECONNECT_MAX_DELAY_MS = 2_000;
const RECONNECT_STEP_MS = 100;

export function reconnectDelayMs(
  retries: number,
  maxDelayMs: number = DEFAULT_RECONNECT_MAX_DELAY_MS
): number {
  return Math.min(Math.max(0, retries) * RECONNECT_STEP_MS, maxDelayMs);
}

export function buildRedisClientOptions(options: RedisClientOptions): AppRedisClientOptions {
  const maxDelayMs = options.reconnectMaxDelayMs ?? DEFAULT_RECONNECT_MAX_DELAY_MS;
  if (!Number.isInteger(maxDelayMs) || maxDelayMs <= 0) {
    throw new Error("reconnectMaxDelayMs must be a positive integer");
  }

  const logger = options.logger ?? createNoopLogger();
  const clientOptions: AppRedisClientOptions = {
    url: options.url,
    socket: {
      reconnectStrategy(retries: number) {
        const delayMs = reconnectDelayMs(retries, maxDelayMs);
        logger.warn("redis connection lost, reconnecting", { retries, delay_ms: delayMs });
        return delayMs;
      }
    }
  };
  if (options.clientName) {
    clientOptions.name = options.clientName;
  }
  return clientOptions;
}

/** Connects and pings; connection errors after startup are logged, not thrown. */
export async function createConnectedRedisClient(
  options: RedisClientOptions
): Promise<AppRedisClient> {
  const logger = options.logger ?? createNoopLogger();
  const client = createClient(buildRedisClientOptions(options));
  client.on("error", (error: unknown) => {
    logger.error("redis client error", { error: errorMessage(error) });
  });

  await client.connect();
  const pong = await client.ping();
  if (pong !== "PONG") {
    await client.quit();
    throw new Error("Redis ping failed during startup");
  }

  return client;
}

/**
 * Quits the client once on SIGINT/SIGTERM, after `beforeQuit` has run.
 * Returns a function that removes the signal handlers.
 */
export function registerRedisGracefulShutdown(
  client: AppRedisClient,
  logger: Logger = createNoopLogger(),
  beforeQuit: () => void = () => {}
): () => void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("received shutdown signal, closing redis client", { signal });
    beforeQuit();
    try {
      await client.quit();
    } catch (error) {
      logger.warn("redis quit failed, forcing disconnect", {
        signal,
        error: errorMessage(error)
      });
      await client.disconnect();
    }
  };

  const handle = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("redis shutdown failed", { signal, error: errorMessage(error) });
    });
  };
  const sigintHandler = () => {
    handle("SIGINT");
  };
  const sigtermHandler = () => {
    handle("SIGTERM");
  };

  process.once("SIGINT", sigintHandler);
  process.once("SIGTERM", sigtermHandler);

  return () => {
    process.off("SIGINT", sigintHandler);
    process.off("SIGTERM", sigtermHandler);
  };
}
