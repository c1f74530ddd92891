import type { Logger } from "../../shared/logger.js";
import type { MarinePoint, MarineReading } from "../../modules/readings/types.js";

export interface MarineProvider {
  fetchMarineReading(point: MarinePoint): Promise<MarineReading | undefined>;
}

export interface OpenMeteoMarineClientOptions {
  baseUrl: string;
  requestTimeoutMs: number;
  userAgent?: string;
  clock?: () => Date;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}
