import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";
import type { StationReading, WeatherStation } from "../../modules/readings/types.js";
import { assertPositiveInt, requestJson, stripTrailingSlash } from "../shared/http.js";
import { parseCurrentWeatherPayload } from "./schema.js";
import type { OpenWeatherClientOptions, WeatherProvider } from "./types.js";

export class OpenWeatherClient implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly clock: () => Date;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: OpenWeatherClientOptions) {
    if (!options.baseUrl || options.baseUrl.trim() === "") {
      throw new Error("OpenWeatherClient requires a non-empty baseUrl");
    }
    assertPositiveInt(options.requestTimeoutMs, "requestTimeoutMs");

    this.baseUrl = stripTrailingSlash(options.baseUrl.trim());
    this.apiKey = options.apiKey.trim();
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.userAgent = options.userAgent?.trim() || "coastal-storm-watch/1.0";
    this.clock = options.clock ?? (() => new Date());
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createNoopLogger();
  }

  async fetchStationReading(station: WeatherStation): Promise<StationReading | undefined> {
    const url = new URL(`${this.baseUrl}/weather`);
    url.searchParams.set("lat", String(station.latitude));
    url.searchParams.set("lon", String(station.longitude));
    url.searchParams.set("appid", this.apiKey);
    url.searchParams.set("units", "metric");

    try {
      const payload = await requestJson(url, {
        serviceName: "OpenWeatherMap",
        fetchImpl: this.fetchImpl,
        requestTimeoutMs: this.requestTimeoutMs,
        init: {
          method: "GET",
          headers: {
            accept: "application/json",
            "user-agent": this.userAgent
          }
        }
      });

      const reading = parseCurrentWeatherPayload(payload, station, this.clock());
      if (!reading) {
        this.logger.warn("weather payload missing required fields", { station: station.id });
        return undefined;
      }
      this.logger.debug("weather reading", {
        station: station.id,
        pressure: reading.pressure,
        wind_speed: reading.windSpeed,
        wind_direction: reading.windDirection
      });
      return reading;
    } catch (error) {
      this.logger.warn("weather fetch failed", {
        station: station.id,
        error: errorMessage(error)
      });
      return undefined;
    }
  }
}
