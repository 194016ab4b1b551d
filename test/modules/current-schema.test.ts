import assert from "node:assert/strict";
import test from "node:test";

import {
  DEFAULT_THRESHOLDS,
  UpstreamFormatError,
  decodeCurrentPayload,
  decodePollenPayload,
  detectPayloadFormat
} from "../../src/connectors/pollen/index.js";
import type { DecodeContext } from "../../src/connectors/pollen/types.js";
import { loadFixture } from "../helpers.js";

const context: DecodeContext = {
  today: "2026-04-14",
  thresholds: DEFAULT_THRESHOLDS,
  defaultUnit: "ppm"
};

test("decodes five days for each pollen type", () => {
  const forecast = decodeCurrentPayload(loadFixture("current-nl.json"), context);

  for (const set of [forecast.tree, forecast.grass, forecast.weed]) {
    assert.deepEqual(
      set.map((reading) => reading.date),
      ["2026-04-14", "2026-04-15", "2026-04-16", "2026-04-17", "2026-04-18"]
    );
  }
});

test("keeps upstream counts, units and species details", () => {
  const forecast = decodeCurrentPayload(loadFixture("current-nl.json"), context);

  assert.deepEqual(forecast.tree[0], {
    type: "tree",
    date: "2026-04-14",
    count: 12,
    level: "low",
    unit: "ppm",
    details: [
      { name: "Birch", count: 9, level: "low" },
      { name: "Alder", count: 3, level: "low" }
    ]
  });
  assert.deepEqual(forecast.grass[0], {
    type: "grass",
    date: "2026-04-14",
    count: 0,
    level: "none",
    unit: "ppm",
    details: []
  });
});

test("prefers upstream levels and derives the missing ones", () => {
  const forecast = decodeCurrentPayload(loadFixture("current-nl.json"), context);

  assert.deepEqual(
    forecast.tree.map((reading) => reading.level),
    ["low", "moderate", "very-high", "moderate", "none"]
  );
  assert.deepEqual(
    forecast.grass.map((reading) => reading.level),
    ["none", "moderate", "high", "very-high", "low"]
  );
  assert.deepEqual(
    forecast.weed.map((reading) => reading.level),
    ["low", null, "low", "very-high", "very-high"]
  );
});

test("parses counts given as numeric strings and keeps missing counts as null", () => {
  const forecast = decodeCurrentPayload(loadFixture("current-nl.json"), context);

  assert.equal(forecast.grass[1]?.count, 31);
  assert.equal(forecast.weed[1]?.count, null);
});

function fiveDays(trees: Record<string, unknown>): { days: unknown[] } {
  const dates = ["2026-04-14", "2026-04-15", "2026-04-16", "2026-04-17", "2026-04-18"];
  return {
    days: dates.map((date, index) => ({
      date,
      pollen: {
        trees: index === 0 ? trees : { count: 1 },
        grass: { count: 1 },
        weeds: { count: 1 }
      }
    }))
  };
}

test("takes the unit from a count suffix when none is declared", () => {
  const forecast = decodeCurrentPayload(fiveDays({ count: "40 GR/M3" }), context);

  assert.equal(forecast.tree[0]?.count, 40);
  assert.equal(forecast.tree[0]?.unit, "gr/m3");
  assert.equal(forecast.tree[1]?.unit, "ppm");
});

test("accepts a count suffix that agrees with the declared unit", () => {
  const forecast = decodeCurrentPayload(fiveDays({ count: "40 ppm", unit: "PPM" }), context);

  assert.equal(forecast.tree[0]?.count, 40);
  assert.equal(forecast.tree[0]?.unit, "ppm");
});

test("rejects a count suffix that contradicts the declared unit", () => {
  assert.throws(
    () => decodeCurrentPayload(fiveDays({ count: "40 GR/M3", unit: "ppm" }), context),
    /days\[0\]\.pollen\.trees\.unit "ppm" does not match count unit "gr\/m3"/
  );
});

test("rejects a payload with fewer than five days", () => {
  const payload = {
    days: [
      { date: "2026-04-14", pollen: { trees: { count: 1 }, grass: { count: 1 }, weeds: { count: 1 } } }
    ]
  };
  assert.throws(() => decodeCurrentPayload(payload, context), UpstreamFormatError);
  assert.throws(
    () => decodeCurrentPayload(payload, context),
    /Forecast does not contain 5 contiguous days starting on or before 2026-04-14/
  );
});

test("rejects a window that starts after today", () => {
  assert.throws(
    () => decodeCurrentPayload(loadFixture("current-nl.json"), { ...context, today: "2026-04-13" }),
    /starting on or before 2026-04-13/
  );
});

test("reports the field that failed to decode", () => {
  const payload = {
    days: [{ date: "2026-04-14", pollen: { trees: { count: "lots" }, grass: {}, weeds: {} } }]
  };
  assert.throws(
    () => decodeCurrentPayload(payload, context),
    /days\[0\]\.pollen\.trees\.count must be a number, got "lots"/
  );
});

test("rejects a missing pollen type", () => {
  const payload = {
    days: [{ date: "2026-04-14", pollen: { trees: { count: 1 }, grass: { count: 1 } } }]
  };
  assert.throws(
    () => decodeCurrentPayload(payload, context),
    /days\[0\]\.pollen\.weeds must be an object/
  );
});

test("detects the payload family from its top-level fields", () => {
  assert.equal(detectPayloadFormat({ days: [] }), "current");
  assert.equal(detectPayloadFormat({ Forecast: [] }), "legacy");
  assert.throws(() => detectPayloadFormat({ days: [], Forecast: [] }), /both current and legacy/);
  assert.throws(() => detectPayloadFormat({ data: [] }), /matches no known format/);
  assert.throws(() => detectPayloadFormat([]), /must be a JSON object/);
});

test("rejects a legacy payload where a current one is expected", () => {
  assert.throws(
    () => decodePollenPayload("current", loadFixture("legacy-us.json"), context),
    /Expected a current pollen payload but received a legacy one/
  );
});
