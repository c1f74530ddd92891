import { createNoopLogger, type Logger } from "../../shared/logger.js";
import type { AlertScoringEngine } from "../alert-scoring/engine.js";
import type { AlertOutcome } from "../alert-scoring/types.js";
import type { AlertNotificationService } from "../notification/service.js";
import type { ReadingStore } from "../readings/store.js";
import type { ReadingBatch } from "../readings/types.js";

export interface ReadingSource {
  fetchAll(): Promise<ReadingBatch>;
}

export interface CycleSummary {
  weatherReadings: number;
  marineReadings: number;
  lightningEvents: number;
  outcome?: AlertOutcome;
  notified: boolean;
  delivered: boolean;
}

export interface StormWatchServiceOptions {
  source: ReadingSource;
  store: ReadingStore;
  engine: AlertScoringEngine;
  notifier: AlertNotificationService;
  logger?: Logger;
}

/**
 * One poll cycle: fetch, retain, score, gate, deliver. Owns no state of its
 * own; the reading store and the notifier hold what survives between cycles.
 */
export class StormWatchService {
  private readonly source: ReadingSource;
  private readonly store: ReadingStore;
  private readonly engine: AlertScoringEngine;
  private readonly notifier: AlertNotificationService;
  private readonly logger: Logger;

  constructor({ source, store, engine, notifier, logger = createNoopLogger() }: StormWatchServiceOptions) {
    this.source = source;
    this.store = store;
    this.engine = engine;
    this.notifier = notifier;
    this.logger = logger;
  }

  async runCycle(): Promise<CycleSummary> {
    const batch = await this.source.fetchAll();
    const summary: CycleSummary = {
      weatherReadings: batch.weather.length,
      marineReadings: batch.marine.length,
      lightningEvents: batch.lightning.length,
      notified: false,
      delivered: false
    };

    if (batch.weather.length === 0) {
      this.logger.error("no weather data retrieved, skipping cycle");
      return summary;
    }

    this.store.store(batch.weather, batch.marine, batch.lightning);
    this.logger.info("readings retained", { ...this.store.size() });

    const outcome = this.engine.calculate(batch.weather, batch.marine, batch.lightning);
    const decision = await this.notifier.notify(outcome);

    return {
      ...summary,
      outcome,
      notified: decision.shouldNotify,
      delivered: decision.delivered
    };
  }
}
