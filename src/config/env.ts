import { AlertLevels, isAlertLevel, type AlertLevel } from "../modules/alert-scoring/constants.js";
import type { AlertThresholds, StationGroups } from "../modules/alert-scoring/types.js";
import type { MarinePoint, WeatherStation } from "../modules/readings/types.js";
import { LogLevels, isLogLevel, type LogLevel } from "../shared/logger.js";
import {
  LIGHTNING_SEARCH_RADIUS_KM,
  MARINE_POINTS,
  STATION_GROUPS,
  TARGET_LOCATION,
  WEATHER_STATIONS
} from "./stations.js";

export const CREDENTIAL_PLACEHOLDERS = Object.freeze({
  openWeatherApiKey: "YOUR_OPENWEATHER_API_KEY_HERE",
  telegramBotToken: "YOUR_BOT_TOKEN_HERE",
  telegramChatId: "YOUR_CHAT_ID_HERE"
});

export interface AppConfig {
  openWeatherApiKey: string;
  openWeatherBaseUrl: string;
  marineBaseUrl: string;
  telegramBotToken: string;
  telegramChatId: string;
  telegramBaseUrl: string;
  targetLocation: { name: string; latitude: number; longitude: number };
  stations: readonly WeatherStation[];
  marinePoints: readonly MarinePoint[];
  stationGroups: StationGroups;
  lightningSearchRadiusKm: number;
  thresholds: AlertThresholds;
  minAlertLevel: AlertLevel;
  checkIntervalMs: number;
  dataRetentionHours: number;
  requestTimeoutMs: number;
  providerCallDelayMs: number;
  errorCooldownMs: number;
  redisUrl: string | undefined;
  cycleLeaseTtlSeconds: number;
  logLevel: LogLevel;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

function parseNonNegativeInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${variableName} must be a non-negative integer`);
  }
  return parsed;
}

function parsePositiveNumber(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive number`);
  }
  return parsed;
}

function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseAlertLevel(value: string | undefined): AlertLevel {
  const normalized = parseOptionalString(value)?.toUpperCase() ?? AlertLevels.MEDIUM;
  if (isAlertLevel(normalized)) {
    return normalized;
  }
  throw new Error('MIN_ALERT_LEVEL must be one of "LOW", "MEDIUM", "HIGH" or "CRITICAL"');
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = parseOptionalString(value)?.toUpperCase() ?? LogLevels.INFO;
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new Error('LOG_LEVEL must be one of "DEBUG", "INFO", "WARNING" or "ERROR"');
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const thresholds: AlertThresholds = Object.freeze({
    boraPressureDiff: parsePositiveNumber(
      env.BORA_PRESSURE_DIFF_THRESHOLD,
      10.0,
      "BORA_PRESSURE_DIFF_THRESHOLD"
    ),
    boraWind: parsePositiveNumber(env.BORA_WIND_THRESHOLD, 40.0, "BORA_WIND_THRESHOLD"),
    highWind: parsePositiveNumber(env.HIGH_WIND_THRESHOLD, 35.0, "HIGH_WIND_THRESHOLD"),
    waveHeight: parsePositiveNumber(env.WAVE_HEIGHT_THRESHOLD, 2.0, "WAVE_HEIGHT_THRESHOLD"),
    wavePeriod: parsePositiveNumber(env.WAVE_PERIOD_THRESHOLD, 4.0, "WAVE_PERIOD_THRESHOLD"),
    lightningDensity: parsePositiveInt(
      env.LIGHTNING_DENSITY_THRESHOLD,
      10,
      "LIGHTNING_DENSITY_THRESHOLD"
    ),
    lightningApproachDistance: parsePositiveNumber(
      env.LIGHTNING_APPROACH_DISTANCE,
      100,
      "LIGHTNING_APPROACH_DISTANCE"
    ),
    thermalGradient: parsePositiveNumber(
      env.THERMAL_GRADIENT_THRESHOLD,
      8.0,
      "THERMAL_GRADIENT_THRESHOLD"
    )
  });

  return Object.freeze({
    openWeatherApiKey:
      parseOptionalString(env.OPENWEATHER_API_KEY) ?? CREDENTIAL_PLACEHOLDERS.openWeatherApiKey,
    openWeatherBaseUrl:
      parseOptionalString(env.OPENWEATHER_BASE_URL) ?? "https://api.openweathermap.org/data/2.5",
    marineBaseUrl:
      parseOptionalString(env.MARINE_BASE_URL) ?? "https://marine-api.open-meteo.com/v1",
    telegramBotToken:
      parseOptionalString(env.TELEGRAM_BOT_TOKEN) ?? CREDENTIAL_PLACEHOLDERS.telegramBotToken,
    telegramChatId:
      parseOptionalString(env.TELEGRAM_CHAT_ID) ?? CREDENTIAL_PLACEHOLDERS.telegramChatId,
    telegramBaseUrl:
      parseOptionalString(env.TELEGRAM_BASE_URL) ?? "https://api.telegram.org",
    targetLocation: TARGET_LOCATION,
    stations: WEATHER_STATIONS,
    marinePoints: MARINE_POINTS,
    stationGroups: STATION_GROUPS,
    lightningSearchRadiusKm: LIGHTNING_SEARCH_RADIUS_KM,
    thresholds,
    minAlertLevel: parseAlertLevel(env.MIN_ALERT_LEVEL),
    checkIntervalMs: parsePositiveInt(env.CHECK_INTERVAL, 1_800, "CHECK_INTERVAL") * 1_000,
    dataRetentionHours: parsePositiveInt(env.DATA_RETENTION_HOURS, 12, "DATA_RETENTION_HOURS"),
    requestTimeoutMs: parsePositiveInt(env.REQUEST_TIMEOUT_MS, 10_000, "REQUEST_TIMEOUT_MS"),
    providerCallDelayMs: parseNonNegativeInt(
      env.PROVIDER_CALL_DELAY_MS,
      500,
      "PROVIDER_CALL_DELAY_MS"
    ),
    errorCooldownMs: parseNonNegativeInt(env.ERROR_COOLDOWN_MS, 300_000, "ERROR_COOLDOWN_MS"),
    redisUrl: parseOptionalString(env.REDIS_URL),
    cycleLeaseTtlSeconds: parsePositiveInt(
      env.CYCLE_LEASE_TTL_SECONDS,
      600,
      "CYCLE_LEASE_TTL_SECONDS"
    ),
    logLevel: parseLogLevel(env.LOG_LEVEL)
  });
}

/**
 * Credentials still unset or holding their placeholder. The worker refuses
 * to start a cycle while this list is non-empty.
 */
export function findConfigurationProblems(config: AppConfig): string[] {
  const problems: string[] = [];
  if (config.telegramBotToken === CREDENTIAL_PLACEHOLDERS.telegramBotToken) {
    problems.push("Please configure TELEGRAM_BOT_TOKEN");
  }
  if (config.telegramChatId === CREDENTIAL_PLACEHOLDERS.telegramChatId) {
    problems.push("Please configure TELEGRAM_CHAT_ID");
  }
  if (config.openWeatherApiKey === CREDENTIAL_PLACEHOLDERS.openWeatherApiKey) {
    problems.push("Please configure OPENWEATHER_API_KEY");
  }
  return problems;
}
