export const AlertLevels = Object.freeze({
  LOW: "LOW",
  MEDIUM: "MEDIUM",
  HIGH: "HIGH",
  CRITICAL: "CRITICAL"
});

export type AlertLevel = (typeof AlertLevels)[keyof typeof AlertLevels];

export const ALERT_LEVEL_RANK: Readonly<Record<AlertLevel, number>> = Object.freeze({
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  CRITICAL: 4
});

export function isAlertLevel(value: string): value is AlertLevel {
  return Object.hasOwn(ALERT_LEVEL_RANK, value);
}

export const ReasonCategories = Object.freeze({
  REGIONAL_WIND: "REGIONAL_WIND",
  MARINE: "MARINE",
  LIGHTNING: "LIGHTNING",
  THERMAL: "THERMAL"
});

export type ReasonCategory = (typeof ReasonCategories)[keyof typeof ReasonCategories];

export const REASON_TAGS: Readonly<Record<ReasonCategory, { glyph: string; tag: string }>> =
  Object.freeze({
    REGIONAL_WIND: { glyph: "🌪️", tag: "BORA" },
    MARINE: { glyph: "🌊", tag: "MARINE" },
    LIGHTNING: { glyph: "⚡", tag: "LIGHTNING" },
    THERMAL: { glyph: "🌡️", tag: "THERMAL" }
  });

export const EtaBuckets = Object.freeze({
  IMMEDIATE: "15-45 minutes (BORA - IMMEDIATE DANGER)",
  LIGHTNING: "30-60 minutes",
  MARINE: "45-90 minutes",
  INLAND: "1-2 hours",
  DEFAULT: "2-3 hours"
});

export type EtaBucket = (typeof EtaBuckets)[keyof typeof EtaBuckets];

export const ScoreWeights = Object.freeze({
  regionalWind: 60,
  marine: 25,
  lightning: 30,
  thermal: 15,
  highWind: 10,
  stormCondition: 15,
  humidity: 5
});

export const LevelCutoffs = Object.freeze({
  high: 70,
  medium: 40
});

export const MAX_SCORE = 100;

export const LIGHTNING_RECENCY_MINUTES = 10;
export const DIRECTIONAL_GATE_MIN_WIND = 30;
export const HUMIDITY_THRESHOLD = 85;
export const STORM_CONDITIONS: ReadonlySet<string> = new Set(["Thunderstorm", "Rain"]);
