import type { Logger } from "../../shared/logger.js";
import type { AlertLevel, EtaBucket, ReasonCategory } from "./constants.js";

export interface AlertThresholds {
  boraPressureDiff: number;
  boraWind: number;
  highWind: number;
  waveHeight: number;
  wavePeriod: number;
  lightningDensity: number;
  lightningApproachDistance: number;
  thermalGradient: number;
}

export interface StationGroups {
  /** Stations upwind of a northeasterly outbreak. */
  neReference: readonly string[];
  /** Stations at the target location. */
  localTarget: readonly string[];
  /** Inland stations whose mention moves the ETA to the 1-2 hour bucket. */
  etaInland: readonly string[];
}

export interface AlertReason {
  category: ReasonCategory;
  text: string;
  stations: readonly string[];
}

export interface AlertOutcome {
  score: number;
  reasons: AlertReason[];
  level: AlertLevel;
  eta: EtaBucket;
  regionalWindDetected: boolean;
}

export interface PatternVerdict {
  detected: boolean;
  explanation: string;
}

export interface RegionalWindVerdict extends PatternVerdict {
  pressureDiff?: number;
  maxReferenceWind?: number;
  referenceStations: string[];
}

export interface MarineVerdict extends PatternVerdict {
  flaggedPoints: string[];
}

export interface LightningVerdict extends PatternVerdict {
  strikeCount: number;
  averageDistanceKm?: number;
}

export interface ThermalVerdict extends PatternVerdict {
  gradient?: number;
  inlandMean?: number;
  coastalMean?: number;
  inlandStations: string[];
}

export interface AlertScoringEngineOptions {
  thresholds: AlertThresholds;
  stationGroups: StationGroups;
  clock?: () => Date;
  logger?: Logger;
}
