import type { LightningProvider } from "../../connectors/lightning/client.js";
import type { MarineProvider } from "../../connectors/open-meteo-marine/types.js";
import type { WeatherProvider } from "../../connectors/openweather/types.js";
import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";
import type {
  LightningEvent,
  MarinePoint,
  MarineReading,
  ReadingBatch,
  StationReading,
  WeatherStation
} from "../readings/types.js";

export interface ReadingAcquisitionServiceOptions {
  weatherProvider: WeatherProvider;
  marineProvider: MarineProvider;
  lightningProvider: LightningProvider;
  stations: readonly WeatherStation[];
  marinePoints: readonly MarinePoint[];
  lightningSearchRadiusKm: number;
  callDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Pulls one batch from every provider, one call at a time with a short pause
 * between calls. A source that yields nothing leaves a gap in the batch.
 */
export class ReadingAcquisitionService {
  private readonly weatherProvider: WeatherProvider;
  private readonly marineProvider: MarineProvider;
  private readonly lightningProvider: LightningProvider;
  private readonly stations: readonly WeatherStation[];
  private readonly marinePoints: readonly MarinePoint[];
  private readonly lightningSearchRadiusKm: number;
  private readonly callDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: ReadingAcquisitionServiceOptions) {
    this.weatherProvider = options.weatherProvider;
    this.marineProvider = options.marineProvider;
    this.lightningProvider = options.lightningProvider;
    this.stations = options.stations;
    this.marinePoints = options.marinePoints;
    this.lightningSearchRadiusKm = options.lightningSearchRadiusKm;
    this.callDelayMs = options.callDelayMs ?? 500;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createNoopLogger();
  }

  async fetchAll(): Promise<ReadingBatch> {
    const weather: StationReading[] = [];
    for (const station of this.stations) {
      const reading = await this.weatherProvider.fetchStationReading(station);
      if (reading) {
        weather.push(reading);
      }
      await this.pause();
    }

    const marine: MarineReading[] = [];
    for (const point of this.marinePoints) {
      const reading = await this.marineProvider.fetchMarineReading(point);
      if (reading) {
        marine.push(reading);
      }
      await this.pause();
    }

    let lightning: LightningEvent[] = [];
    try {
      lightning = await this.lightningProvider.fetchLightningEvents(this.lightningSearchRadiusKm);
    } catch (error) {
      this.logger.warn("lightning fetch failed", { error: errorMessage(error) });
    }

    this.logger.info("fetched readings", {
      weather: `${weather.length}/${this.stations.length}`,
      marine: `${marine.length}/${this.marinePoints.length}`,
      lightning: lightning.length
    });

    return { weather, marine, lightning };
  }

  private async pause(): Promise<void> {
    if (this.callDelayMs > 0) {
      await this.sleep(this.callDelayMs);
    }
  }
}
