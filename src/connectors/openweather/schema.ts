import type { StationReading, WeatherStation } from "../../modules/readings/types.js";

const MS_TO_KMH = 3.6;

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object";
}

function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function asNonEmptyString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Maps an OpenWeatherMap current-weather payload (metric units) to a
 * station reading. Returns undefined when a required field is missing.
 */
export function parseCurrentWeatherPayload(
  payload: unknown,
  station: WeatherStation,
  observedAt: Date
): StationReading | undefined {
  if (!isObjectRecord(payload)) {
    return undefined;
  }

  const main = isObjectRecord(payload.main) ? payload.main : {};
  const wind = isObjectRecord(payload.wind) ? payload.wind : {};
  const firstCondition = Array.isArray(payload.weather) ? payload.weather[0] : undefined;
  const condition = isObjectRecord(firstCondition)
    ? asNonEmptyString(firstCondition.main)
    : undefined;

  const temperature = asFiniteNumber(main.temp);
  const pressure = asFiniteNumber(main.pressure);
  const humidity = asFiniteNumber(main.humidity);
  const windSpeedMs = asFiniteNumber(wind.speed);
  if (
    temperature === undefined ||
    pressure === undefined ||
    humidity === undefined ||
    windSpeedMs === undefined ||
    condition === undefined
  ) {
    return undefined;
  }

  const visibility = asFiniteNumber(payload.visibility);
  return {
    stationId: station.id,
    timestamp: observedAt,
    temperature,
    pressure,
    humidity,
    windSpeed: windSpeedMs * MS_TO_KMH,
    windDirection: asFiniteNumber(wind.deg) ?? 0,
    ...(visibility !== undefined ? { visibility } : {}),
    condition,
    terrain: station.terrain
  };
}
