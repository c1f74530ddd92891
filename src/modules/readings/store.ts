import type { LightningEvent, MarineReading, StationReading } from "./types.js";

export interface ReadingStoreOptions {
  retentionHours: number;
  clock?: () => Date;
}

export interface ReadingStoreSize {
  weather: number;
  marine: number;
  lightning: number;
}

const HOUR_MS = 60 * 60 * 1000;

function appendByKey<T>(target: Map<string, T[]>, key: string, item: T): void {
  const existing = target.get(key);
  if (existing) {
    existing.push(item);
    return;
  }
  target.set(key, [item]);
}

function countAll<T>(source: Map<string, T[]>): number {
  let total = 0;
  for (const items of source.values()) {
    total += items.length;
  }
  return total;
}

/**
 * Rolling in-memory window of readings, keyed by station or marine point.
 *
 * Pruning runs on every `store` call against the supplied (or clock) time;
 * nothing is removed between calls. Duplicates are kept and every sequence
 * stays in insertion order.
 */
export class ReadingStore {
  private readonly retentionMs: number;
  private readonly clock: () => Date;

  private readonly weather = new Map<string, StationReading[]>();
  private readonly marine = new Map<string, MarineReading[]>();
  private lightning: LightningEvent[] = [];

  constructor({ retentionHours, clock = () => new Date() }: ReadingStoreOptions) {
    if (!Number.isFinite(retentionHours) || retentionHours <= 0) {
      throw new Error("retentionHours must be a positive number");
    }
    this.retentionMs = retentionHours * HOUR_MS;
    this.clock = clock;
  }

  store(
    weatherReadings: readonly StationReading[],
    marineReadings: readonly MarineReading[],
    lightningEvents: readonly LightningEvent[],
    now: Date = this.clock()
  ): void {
    for (const reading of weatherReadings) {
      appendByKey(this.weather, reading.stationId, reading);
    }
    for (const reading of marineReadings) {
      appendByKey(this.marine, reading.pointId, reading);
    }
    this.lightning.push(...lightningEvents);

    this.prune(now);
  }

  weatherHistory(stationId: string): readonly StationReading[] {
    return this.weather.get(stationId) ?? [];
  }

  marineHistory(pointId: string): readonly MarineReading[] {
    return this.marine.get(pointId) ?? [];
  }

  lightningHistory(): readonly LightningEvent[] {
    return this.lightning;
  }

  stationIds(): string[] {
    return [...this.weather.keys()];
  }

  pointIds(): string[] {
    return [...this.marine.keys()];
  }

  size(): ReadingStoreSize {
    return {
      weather: countAll(this.weather),
      marine: countAll(this.marine),
      lightning: this.lightning.length
    };
  }

  private prune(now: Date): void {
    const cutoff = now.getTime() - this.retentionMs;
    const isFresh = (item: { timestamp: Date }): boolean => item.timestamp.getTime() > cutoff;

    for (const [stationId, readings] of this.weather) {
      this.weather.set(stationId, readings.filter(isFresh));
    }
    for (const [pointId, readings] of this.marine) {
      this.marine.set(pointId, readings.filter(isFresh));
    }
    this.lightning = this.lightning.filter(isFresh);
  }
}
