import {
  validateLocation,
  type PollenForecastProvider,
  type PollenLocation
} from "../connectors/pollen/index.js";
import { createNoopLogger, type Logger } from "../infrastructure/logging/logger.js";
import type {
  CoordinatorDiagnostics,
  RefreshOutcome,
  SnapshotReadResult,
  UpdateCoordinatorOptions
} from "./types.js";
import { PollenUpdateCoordinator } from "./update-coordinator.js";

export type CoordinatorDefaults = Omit<UpdateCoordinatorOptions, "location" | "client" | "logger">;

export interface CoordinatorRegistryOptions {
  client: PollenForecastProvider;
  defaults?: CoordinatorDefaults;
  logger?: Logger;
  /** Builds the logger handed to each location's coordinator. */
  loggerFor?: (location: PollenLocation) => Logger;
}

/**
 * Explicit owner of one coordinator per configured location. Adding a
 * location validates it and runs its first refresh; removing it stops the
 * coordinator and aborts any in-flight request.
 */
export class CoordinatorRegistry {
  private readonly client: PollenForecastProvider;
  private readonly defaults: CoordinatorDefaults;
  private readonly logger: Logger;
  private readonly loggerFor: (location: PollenLocation) => Logger;
  private readonly coordinators = new Map<string, PollenUpdateCoordinator>();

  constructor(options: CoordinatorRegistryOptions) {
    this.client = options.client;
    this.defaults = options.defaults ?? {};
    this.logger = options.logger ?? createNoopLogger();
    this.loggerFor = options.loggerFor ?? (() => this.logger);
  }

  /** Resolves with the outcome of the location's first refresh. */
  async add(location: PollenLocation): Promise<RefreshOutcome> {
    validateLocation(location);
    if (this.coordinators.has(location.name)) {
      throw new Error(`Location ${location.name} is already configured`);
    }

    const coordinator = new PollenUpdateCoordinator({
      ...this.defaults,
      location,
      client: this.client,
      logger: this.loggerFor(location)
    });
    this.coordinators.set(location.name, coordinator);
    return coordinator.start();
  }

  remove(name: string): boolean {
    const coordinator = this.coordinators.get(name);
    if (!coordinator) {
      return false;
    }
    coordinator.stop();
    this.coordinators.delete(name);
    return true;
  }

  get(name: string): PollenUpdateCoordinator | undefined {
    return this.coordinators.get(name);
  }

  list(): PollenUpdateCoordinator[] {
    return Array.from(this.coordinators.values());
  }

  stopAll(): void {
    for (const name of Array.from(this.coordinators.keys())) {
      this.remove(name);
    }
  }

  getSnapshot(name: string): SnapshotReadResult {
    return this.require(name).getSnapshot();
  }

  requestRefresh(name: string): void {
    this.require(name).requestRefresh();
  }

  lastUpdated(name: string): Date | undefined {
    return this.require(name).lastUpdated();
  }

  diagnostics(name: string): CoordinatorDiagnostics {
    return this.require(name).diagnostics();
  }

  private require(name: string): PollenUpdateCoordinator {
    const coordinator = this.coordinators.get(name);
    if (!coordinator) {
      throw new Error(`Unknown location: ${name}`);
    }
    return coordinator;
  }
}
