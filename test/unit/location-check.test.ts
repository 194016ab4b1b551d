import assert from "node:assert/strict";
import test from "node:test";

import { checkLocations } from "../../src/config/location-check.js";
import {
  DEFAULT_THRESHOLDS,
  NetworkError,
  decodeLegacyPayload,
  type PollenFetchResult,
  type PollenForecastProvider,
  type PollenLocation
} from "../../src/connectors/pollen/index.js";
import { createNoopLogger } from "../../src/infrastructure/logging/logger.js";
import { loadFixture } from "../helpers.js";

const NOW = new Date("2026-04-14T10:00:00.000Z");

const boston: PollenLocation = { name: "boston", region: "us", query: { by: "postal", postalCode: "02108" } };
const denver: PollenLocation = { name: "denver", region: "us", query: { by: "postal", postalCode: "80202" } };
const leeds: PollenLocation = { name: "leeds", region: "uk", query: { by: "postal", postalCode: "12345" } };

function createProvider(): PollenForecastProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async fetch(location): Promise<PollenFetchResult> {
      calls.push(location.name);
      if (location.name === "denver") {
        throw new NetworkError("offline");
      }
      const raw = loadFixture("legacy-us.json");
      return {
        family: "legacy",
        forecast: decodeLegacyPayload(raw, {
          today: "2026-04-14",
          thresholds: DEFAULT_THRESHOLDS,
          defaultUnit: "gr/m3"
        }),
        raw,
        fetchedAt: NOW
      };
    }
  };
}

test("reports each location without stopping at the first failure", async () => {
  const provider = createProvider();

  const results = await checkLocations(provider, [leeds, denver, boston], createNoopLogger());

  assert.deepEqual(results, [
    {
      name: "leeds",
      ok: false,
      kind: "unsupported_location",
      error: "Region uk does not support lookup by postal"
    },
    { name: "denver", ok: false, kind: "network", error: "offline" },
    { name: "boston", ok: true, family: "legacy", firstDate: "2026-04-14" }
  ]);
  assert.deepEqual(provider.calls, ["denver", "boston"]);
});
