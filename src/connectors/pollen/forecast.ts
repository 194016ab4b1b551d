import { UpstreamFormatError } from "./errors.js";
import type { DecodedDay, ForecastSet, PollenForecast, PollenType } from "./types.js";

export const FORECAST_DAYS = 5;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function toUtcMillis(date: string): number | undefined {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) {
    return undefined;
  }
  const [, year, month, day] = match;
  const millis = Date.UTC(Number(year), Number(month) - 1, Number(day));
  // reject rollovers such as 2026-02-30
  return new Date(millis).toISOString().slice(0, 10) === date ? millis : undefined;
}

export function isIsoDate(value: string): boolean {
  return toUtcMillis(value) !== undefined;
}

export function addDays(date: string, days: number): string {
  const millis = toUtcMillis(date);
  if (millis === undefined) {
    throw new RangeError(`Invalid calendar date ${date}`);
  }
  return new Date(millis + days * DAY_MS).toISOString().slice(0, 10);
}

/** Calendar date (`YYYY-MM-DD`) of `now` as seen in `timeZone`. */
export function calendarDateIn(now: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((item) => item.type === type)?.value ?? "";
  return `${part("year")}-${part("month")}-${part("day")}`;
}

/**
 * Picks the latest run of `FORECAST_DAYS` contiguous days that starts on or
 * before `today`. Upstream payloads may lag a day behind around midnight, so
 * an earlier start is accepted when today's window is incomplete.
 */
export function selectForecastWindow(days: readonly DecodedDay[], today: string): DecodedDay[] {
  const sorted = [...days].sort((left, right) => left.date.localeCompare(right.date));
  for (let index = 1; index < sorted.length; index += 1) {
    if (sorted[index]?.date === sorted[index - 1]?.date) {
      throw new UpstreamFormatError(`Forecast contains duplicate date ${sorted[index]?.date ?? ""}`);
    }
  }

  for (let start = sorted.length - FORECAST_DAYS; start >= 0; start -= 1) {
    const window = sorted.slice(start, start + FORECAST_DAYS);
    const first = window[0];
    if (!first || first.date > today) {
      continue;
    }
    const contiguous = window.every((day, offset) => day.date === addDays(first.date, offset));
    if (contiguous) {
      return window;
    }
  }

  throw new UpstreamFormatError(
    `Forecast does not contain ${FORECAST_DAYS} contiguous days starting on or before ${today} (got ${sorted
      .map((day) => day.date)
      .join(", ")})`
  );
}

function forecastSetFor(window: readonly DecodedDay[], type: PollenType): ForecastSet {
  return window.map((day) => day.readings[type]);
}

export function buildPollenForecast(days: readonly DecodedDay[], today: string): PollenForecast {
  const window = selectForecastWindow(days, today);
  return {
    tree: forecastSetFor(window, "tree"),
    grass: forecastSetFor(window, "grass"),
    weed: forecastSetFor(window, "weed")
  };
}
