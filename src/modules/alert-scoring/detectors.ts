import type { LightningEvent, MarineReading, StationReading } from "../readings/types.js";
import { TerrainClasses } from "../readings/types.js";
import {
  DIRECTIONAL_GATE_MIN_WIND,
  HUMIDITY_THRESHOLD,
  LIGHTNING_RECENCY_MINUTES,
  STORM_CONDITIONS,
  ScoreWeights
} from "./constants.js";
import type {
  AlertThresholds,
  LightningVerdict,
  MarineVerdict,
  RegionalWindVerdict,
  StationGroups,
  ThermalVerdict
} from "./types.js";

function mean(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total / values.length;
}

/**
 * One decimal place, with exact ties going to the even digit (2.25 -> "2.2").
 * `toFixed` already rounds the exact binary value; it only differs on ties,
 * which for tenths are the odd multiples of 0.25.
 */
export function formatOneDecimal(value: number): string {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return (even / 10).toFixed(1);
  }
  return value.toFixed(1);
}

function isNortheastQuadrant(direction: number): boolean {
  return direction >= 0 && direction <= 90;
}

/**
 * Bora detection: a high pressure differential between the northeast
 * reference stations and the target, together with strong wind blowing
 * out of the NE quadrant at one of the reference stations.
 */
export function detectRegionalWind(
  readings: readonly StationReading[],
  groups: Pick<StationGroups, "neReference" | "localTarget">,
  thresholds: Pick<AlertThresholds, "boraPressureDiff" | "boraWind">
): RegionalWindVerdict {
  const reference = readings.filter((reading) => groups.neReference.includes(reading.stationId));
  const local = readings.filter((reading) => groups.localTarget.includes(reading.stationId));

  if (reference.length === 0 || local.length === 0) {
    return { detected: false, explanation: "", referenceStations: [] };
  }

  const pressureDiff =
    mean(reference.map((reading) => reading.pressure)) -
    mean(local.map((reading) => reading.pressure));
  const maxReferenceWind = Math.max(...reference.map((reading) => reading.windSpeed));
  const directionalGate = reference.some(
    (reading) =>
      reading.windSpeed > DIRECTIONAL_GATE_MIN_WIND && isNortheastQuadrant(reading.windDirection)
  );

  const detected =
    pressureDiff > thresholds.boraPressureDiff &&
    maxReferenceWind > thresholds.boraWind &&
    directionalGate;

  return {
    detected,
    explanation: detected
      ? `BORA PATTERN DETECTED: Pressure diff ${formatOneDecimal(pressureDiff)}hPa, NE winds ${formatOneDecimal(maxReferenceWind)}km/h`
      : "",
    pressureDiff,
    maxReferenceWind,
    referenceStations: [...new Set(reference.map((reading) => reading.stationId))]
  };
}

export function detectMarineConditions(
  readings: readonly MarineReading[],
  thresholds: Pick<AlertThresholds, "wavePeriod" | "waveHeight">
): MarineVerdict {
  const fragments: string[] = [];
  const flaggedPoints: string[] = [];

  for (const reading of readings) {
    let flagged = false;
    // Short-period sea is wind-driven, i.e. a storm nearby.
    if (reading.wavePeriod < thresholds.wavePeriod) {
      fragments.push(`${reading.pointId}: Short wave period ${formatOneDecimal(reading.wavePeriod)}s`);
      flagged = true;
    }
    if (reading.waveHeight > thresholds.waveHeight) {
      fragments.push(`${reading.pointId}: High waves ${formatOneDecimal(reading.waveHeight)}m`);
      flagged = true;
    }
    if (flagged && !flaggedPoints.includes(reading.pointId)) {
      flaggedPoints.push(reading.pointId);
    }
  }

  return {
    detected: fragments.length > 0,
    explanation: fragments.join("; "),
    flaggedPoints
  };
}

export function detectLightningApproach(
  events: readonly LightningEvent[],
  thresholds: Pick<AlertThresholds, "lightningApproachDistance" | "lightningDensity">,
  now: Date
): LightningVerdict {
  const recentCutoff = now.getTime() - LIGHTNING_RECENCY_MINUTES * 60 * 1000;
  const nearby = events.filter(
    (event) =>
      event.timestamp.getTime() > recentCutoff &&
      event.distanceKm < thresholds.lightningApproachDistance
  );

  if (nearby.length <= thresholds.lightningDensity) {
    return { detected: false, explanation: "", strikeCount: nearby.length };
  }

  const averageDistanceKm = mean(nearby.map((event) => event.distanceKm));
  return {
    detected: true,
    explanation: `Lightning approaching: ${nearby.length} strikes, avg distance ${formatOneDecimal(averageDistanceKm)}km`,
    strikeCount: nearby.length,
    averageDistanceKm
  };
}

export function detectThermalGradient(
  readings: readonly StationReading[],
  thresholds: Pick<AlertThresholds, "thermalGradient">
): ThermalVerdict {
  const coastal = readings.filter((reading) => reading.terrain === TerrainClasses.COASTAL);
  const inland = readings.filter((reading) => reading.terrain === TerrainClasses.INLAND);

  if (coastal.length === 0 || inland.length === 0) {
    return { detected: false, explanation: "", inlandStations: [] };
  }

  const coastalMean = mean(coastal.map((reading) => reading.temperature));
  const inlandMean = mean(inland.map((reading) => reading.temperature));
  const gradient = Math.abs(inlandMean - coastalMean);

  const detected = gradient > thresholds.thermalGradient;
  return {
    detected,
    explanation: detected
      ? `High thermal gradient: ${formatOneDecimal(gradient)}°C difference (Inland: ${formatOneDecimal(inlandMean)}°C, Coastal: ${formatOneDecimal(coastalMean)}°C)`
      : "",
    gradient,
    inlandMean,
    coastalMean,
    inlandStations: [...new Set(inland.map((reading) => reading.stationId))]
  };
}

/**
 * Per-station contribution: strong wind, rain or thunderstorm, saturated air.
 * Summed across stations without a cap; the engine clamps the final score.
 */
export function scoreStationConditions(
  readings: readonly StationReading[],
  thresholds: Pick<AlertThresholds, "highWind">
): number {
  let score = 0;
  for (const reading of readings) {
    if (reading.windSpeed > thresholds.highWind) {
      score += ScoreWeights.highWind;
    }
    if (STORM_CONDITIONS.has(reading.condition)) {
      score += ScoreWeights.stormCondition;
    }
    if (reading.humidity > HUMIDITY_THRESHOLD) {
      score += ScoreWeights.humidity;
    }
  }
  return score;
}
