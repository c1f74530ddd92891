import type { Logger } from "../../shared/logger.js";
import type { StationReading, WeatherStation } from "../../modules/readings/types.js";

export interface WeatherProvider {
  fetchStationReading(station: WeatherStation): Promise<StationReading | undefined>;
}

export interface OpenWeatherClientOptions {
  baseUrl: string;
  apiKey: string;
  requestTimeoutMs: number;
  userAgent?: string;
  clock?: () => Date;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}
