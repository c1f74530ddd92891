import type { MarinePoint, MarineReading } from "../../modules/readings/types.js";

export const HOURLY_MARINE_VARIABLES = [
  "wave_height",
  "wave_period",
  "wave_direction",
  "sea_surface_temperature"
] as const;

const DEFAULT_SEA_TEMPERATURE = 20.0;

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object";
}

function valueAt(series: unknown, index: number): number | undefined {
  if (!Array.isArray(series)) {
    return undefined;
  }
  const value: unknown = series[index];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/** `2026-10-19T14:00`, the hourly key format Open-Meteo returns in GMT. */
export function hourKey(date: Date): string {
  return `${date.toISOString().slice(0, 13)}:00`;
}

function resolveHourIndex(hourly: Record<string, unknown>, observedAt: Date): number {
  if (Array.isArray(hourly.time)) {
    const index = hourly.time.indexOf(hourKey(observedAt));
    if (index >= 0) {
      return index;
    }
  }
  return observedAt.getUTCHours();
}

/**
 * Picks the current hour out of an Open-Meteo hourly marine forecast. Wave
 * height and period are required; direction falls back to 0 and sea
 * temperature to 20 °C.
 */
export function parseMarinePayload(
  payload: unknown,
  point: MarinePoint,
  observedAt: Date
): MarineReading | undefined {
  if (!isObjectRecord(payload) || !isObjectRecord(payload.hourly)) {
    return undefined;
  }

  const hourly = payload.hourly;
  const index = resolveHourIndex(hourly, observedAt);
  const waveHeight = valueAt(hourly.wave_height, index);
  const wavePeriod = valueAt(hourly.wave_period, index);
  if (waveHeight === undefined || wavePeriod === undefined) {
    return undefined;
  }

  return {
    pointId: point.id,
    timestamp: observedAt,
    waveHeight,
    wavePeriod,
    waveDirection: valueAt(hourly.wave_direction, index) ?? 0,
    seaTemperature: valueAt(hourly.sea_surface_temperature, index) ?? DEFAULT_SEA_TEMPERATURE
  };
}
