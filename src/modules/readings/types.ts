export const TerrainClasses = Object.freeze({
  COASTAL: "coastal",
  INLAND: "inland",
  MOUNTAIN: "mountain"
});

export type TerrainClass = (typeof TerrainClasses)[keyof typeof TerrainClasses];

export interface WeatherStation {
  id: string;
  latitude: number;
  longitude: number;
  distanceKm: number;
  bearing: string;
  priority: number;
  terrain: TerrainClass;
}

export interface MarinePoint {
  id: string;
  latitude: number;
  longitude: number;
}

export interface StationReading {
  readonly stationId: string;
  readonly timestamp: Date;
  readonly temperature: number;
  readonly pressure: number;
  readonly humidity: number;
  readonly windSpeed: number;
  readonly windDirection: number;
  readonly visibility?: number;
  readonly condition: string;
  readonly terrain: TerrainClass;
}

export interface MarineReading {
  readonly pointId: string;
  readonly timestamp: Date;
  readonly waveHeight: number;
  readonly wavePeriod: number;
  readonly waveDirection: number;
  readonly seaTemperature: number;
}

export interface LightningEvent {
  readonly timestamp: Date;
  readonly latitude: number;
  readonly longitude: number;
  readonly distanceKm: number;
  readonly intensity: number;
}

export interface ReadingBatch {
  weather: StationReading[];
  marine: MarineReading[];
  lightning: LightningEvent[];
}
