import { createNoopLogger, type Logger } from "../../shared/logger.js";
import type { LightningEvent } from "../../modules/readings/types.js";

export interface LightningProvider {
  fetchLightningEvents(radiusKm: number): Promise<LightningEvent[]>;
}

/**
 * Stand-in backend for deployments without a lightning feed. An empty list
 * is a normal reading: the lightning detector simply never fires.
 */
export class UnavailableLightningProvider implements LightningProvider {
  private readonly logger: Logger;

  constructor(logger: Logger = createNoopLogger()) {
    this.logger = logger;
  }

  async fetchLightningEvents(radiusKm: number): Promise<LightningEvent[]> {
    this.logger.info("no lightning backend configured", { radius_km: radiusKm });
    return [];
  }
}
