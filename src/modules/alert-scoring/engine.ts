import { createNoopLogger, type Logger } from "../../shared/logger.js";
import type { LightningEvent, MarineReading, StationReading } from "../readings/types.js";
import {
  AlertLevels,
  EtaBuckets,
  LevelCutoffs,
  MAX_SCORE,
  REASON_TAGS,
  ReasonCategories,
  ScoreWeights,
  type AlertLevel,
  type EtaBucket
} from "./constants.js";
import {
  detectLightningApproach,
  detectMarineConditions,
  detectRegionalWind,
  detectThermalGradient,
  scoreStationConditions
} from "./detectors.js";
import type {
  AlertOutcome,
  AlertReason,
  AlertScoringEngineOptions,
  AlertThresholds,
  StationGroups
} from "./types.js";

export function renderReason(reason: AlertReason): string {
  const { glyph, tag } = REASON_TAGS[reason.category];
  return `${glyph} ${tag}: ${reason.text}`;
}

function resolveAlertLevel(score: number): AlertLevel {
  if (score > LevelCutoffs.high) {
    return AlertLevels.HIGH;
  }
  if (score > LevelCutoffs.medium) {
    return AlertLevels.MEDIUM;
  }
  return AlertLevels.LOW;
}

export function estimateEta(
  reasons: readonly AlertReason[],
  regionalWindDetected: boolean,
  etaInlandStations: readonly string[]
): EtaBucket {
  if (regionalWindDetected) {
    return EtaBuckets.IMMEDIATE;
  }
  if (reasons.some((reason) => reason.category === ReasonCategories.LIGHTNING)) {
    return EtaBuckets.LIGHTNING;
  }
  if (reasons.some((reason) => reason.category === ReasonCategories.MARINE)) {
    return EtaBuckets.MARINE;
  }
  if (
    reasons.some((reason) =>
      reason.stations.some((stationId) => etaInlandStations.includes(stationId))
    )
  ) {
    return EtaBuckets.INLAND;
  }
  return EtaBuckets.DEFAULT;
}

export class AlertScoringEngine {
  private readonly thresholds: AlertThresholds;
  private readonly stationGroups: StationGroups;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor({
    thresholds,
    stationGroups,
    clock = () => new Date(),
    logger = createNoopLogger()
  }: AlertScoringEngineOptions) {
    this.thresholds = thresholds;
    this.stationGroups = stationGroups;
    this.clock = clock;
    this.logger = logger;
  }

  calculate(
    weatherReadings: readonly StationReading[],
    marineReadings: readonly MarineReading[],
    lightningEvents: readonly LightningEvent[]
  ): AlertOutcome {
    const now = this.clock();
    const reasons: AlertReason[] = [];
    let score = 0;
    let level: AlertLevel = AlertLevels.LOW;

    const regionalWind = detectRegionalWind(weatherReadings, this.stationGroups, this.thresholds);
    if (regionalWind.detected) {
      score += ScoreWeights.regionalWind;
      reasons.push({
        category: ReasonCategories.REGIONAL_WIND,
        text: regionalWind.explanation,
        stations: regionalWind.referenceStations
      });
      level = AlertLevels.CRITICAL;
    }

    const marine = detectMarineConditions(marineReadings, this.thresholds);
    if (marine.detected) {
      score += ScoreWeights.marine;
      reasons.push({
        category: ReasonCategories.MARINE,
        text: marine.explanation,
        stations: marine.flaggedPoints
      });
    }

    const lightning = detectLightningApproach(lightningEvents, this.thresholds, now);
    if (lightning.detected) {
      score += ScoreWeights.lightning;
      reasons.push({
        category: ReasonCategories.LIGHTNING,
        text: lightning.explanation,
        stations: []
      });
    }

    const thermal = detectThermalGradient(weatherReadings, this.thresholds);
    if (thermal.detected) {
      score += ScoreWeights.thermal;
      reasons.push({
        category: ReasonCategories.THERMAL,
        text: thermal.explanation,
        stations: thermal.inlandStations
      });
    }

    score += scoreStationConditions(weatherReadings, this.thresholds);

    // A detected Bora keeps CRITICAL whatever the total.
    if (level !== AlertLevels.CRITICAL) {
      level = resolveAlertLevel(score);
    }

    const outcome: AlertOutcome = {
      score: Math.min(score, MAX_SCORE),
      reasons,
      level,
      eta: estimateEta(reasons, regionalWind.detected, this.stationGroups.etaInland),
      regionalWindDetected: regionalWind.detected
    };

    this.logger.info("alert score calculated", {
      score: outcome.score,
      level: outcome.level,
      eta: outcome.eta,
      reasons: outcome.reasons.map(renderReason)
    });

    return outcome;
  }
}
