import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";
import type { MarinePoint, MarineReading } from "../../modules/readings/types.js";
import { assertPositiveInt, requestJson, stripTrailingSlash } from "../shared/http.js";
import { HOURLY_MARINE_VARIABLES, parseMarinePayload } from "./schema.js";
import type { MarineProvider, OpenMeteoMarineClientOptions } from "./types.js";

export class OpenMeteoMarineClient implements MarineProvider {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly clock: () => Date;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: OpenMeteoMarineClientOptions) {
    if (!options.baseUrl || options.baseUrl.trim() === "") {
      throw new Error("OpenMeteoMarineClient requires a non-empty baseUrl");
    }
    assertPositiveInt(options.requestTimeoutMs, "requestTimeoutMs");

    this.baseUrl = stripTrailingSlash(options.baseUrl.trim());
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.userAgent = options.userAgent?.trim() || "coastal-storm-watch/1.0";
    this.clock = options.clock ?? (() => new Date());
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createNoopLogger();
  }

  async fetchMarineReading(point: MarinePoint): Promise<MarineReading | undefined> {
    const url = new URL(`${this.baseUrl}/marine`);
    url.searchParams.set("latitude", String(point.latitude));
    url.searchParams.set("longitude", String(point.longitude));
    url.searchParams.set("hourly", HOURLY_MARINE_VARIABLES.join(","));
    url.searchParams.set("forecast_days", "1");
    url.searchParams.set("timezone", "GMT");

    try {
      const payload = await requestJson(url, {
        serviceName: "Open-Meteo Marine",
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

      const reading = parseMarinePayload(payload, point, this.clock());
      if (!reading) {
        this.logger.warn("marine payload missing wave data", { point: point.id });
      }
      return reading;
    } catch (error) {
      this.logger.warn("marine fetch failed", {
        point: point.id,
        error: errorMessage(error)
      });
      return undefined;
    }
  }
}
