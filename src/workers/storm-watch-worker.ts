#!/usr/bin/env node
import { findConfigurationProblems, loadConfig } from "../config/env.js";
import { UnavailableLightningProvider } from "../connectors/lightning/client.js";
import { OpenMeteoMarineClient } from "../connectors/open-meteo-marine/client.js";
import { OpenWeatherClient } from "../connectors/openweather/client.js";
import { TelegramClient } from "../connectors/telegram/client.js";
import { connectRedis, disconnectRedis, type AppRedisClient } from "../infrastructure/redis/client.js";
import { RedisCycleLeaseManager } from "../infrastructure/redis/cycle-lease-manager.js";
import { RedisNotifierStateStore } from "../infrastructure/redis/notifier-state-store.js";
import { AlertScoringEngine } from "../modules/alert-scoring/engine.js";
import { ReadingAcquisitionService } from "../modules/monitoring/acquisition.js";
import { runGuardedCycle, runMonitoringLoop } from "../modules/monitoring/loop.js";
import { StormWatchService, type CycleSummary } from "../modules/monitoring/service.js";
import { AlertNotificationService } from "../modules/notification/service.js";
import { InMemoryNotifierStateStore } from "../modules/notification/state-store.js";
import type { NotifierStateStore } from "../modules/notification/types.js";
import { ReadingStore } from "../modules/readings/store.js";
import { createConsoleLogger, type Logger } from "../shared/logger.js";

/**
 * Entry point.
 *
 * Usage:
 *   npm start            poll forever, CHECK_INTERVAL seconds apart
 *   npm start -- --once  run a single cycle and exit
 *
 * Environment: OPENWEATHER_API_KEY, TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID are
 * required; REDIS_URL shares notifier state between instances under a cycle
 * lease. LOG_LEVEL filters console output.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const componentLogger = (component: string): Logger =>
    createConsoleLogger(component, config.logLevel);
  const logger = componentLogger("storm-watch");

  const problems = findConfigurationProblems(config);
  if (problems.length > 0) {
    for (const problem of problems) {
      logger.error(problem, { context: "configuration" });
    }
    process.exitCode = 1;
    return;
  }

  const runOnce = process.argv.slice(2).includes("--once");

  const acquisition = new ReadingAcquisitionService({
    weatherProvider: new OpenWeatherClient({
      baseUrl: config.openWeatherBaseUrl,
      apiKey: config.openWeatherApiKey,
      requestTimeoutMs: config.requestTimeoutMs,
      logger: componentLogger("openweather")
    }),
    marineProvider: new OpenMeteoMarineClient({
      baseUrl: config.marineBaseUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      logger: componentLogger("open-meteo-marine")
    }),
    lightningProvider: new UnavailableLightningProvider(componentLogger("lightning")),
    stations: config.stations,
    marinePoints: config.marinePoints,
    lightningSearchRadiusKm: config.lightningSearchRadiusKm,
    callDelayMs: config.providerCallDelayMs,
    logger
  });

  let redis: AppRedisClient | undefined;
  let stateStore: NotifierStateStore;
  if (config.redisUrl) {
    redis = await connectRedis({
      url: config.redisUrl,
      clientName: "storm-watch-worker",
      logger: componentLogger("redis")
    });
    stateStore = new RedisNotifierStateStore(redis);
  } else {
    stateStore = new InMemoryNotifierStateStore();
  }

  const service = new StormWatchService({
    source: acquisition,
    store: new ReadingStore({ retentionHours: config.dataRetentionHours }),
    engine: new AlertScoringEngine({
      thresholds: config.thresholds,
      stationGroups: config.stationGroups,
      logger: componentLogger("alert-scoring")
    }),
    notifier: new AlertNotificationService({
      sink: new TelegramClient({
        botToken: config.telegramBotToken,
        chatId: config.telegramChatId,
        baseUrl: config.telegramBaseUrl,
        requestTimeoutMs: config.requestTimeoutMs,
        logger: componentLogger("telegram")
      }),
      policy: { minAlertLevel: config.minAlertLevel },
      locationName: config.targetLocation.name,
      stateStore,
      logger: componentLogger("notification")
    }),
    logger
  });

  const leaseManager = redis ? new RedisCycleLeaseManager(redis) : undefined;
  const guardedCycle = (): Promise<CycleSummary | undefined> =>
    leaseManager
      ? runGuardedCycle({
          runCycle: () => service.runCycle(),
          leaseManager,
          leaseTtlSeconds: config.cycleLeaseTtlSeconds,
          logger
        })
      : service.runCycle();

  let running = true;
  const handleSignal = (signal: NodeJS.Signals): void => {
    logger.info(`received ${signal}, stopping after the current step`);
    running = false;
  };
  process.on("SIGINT", () => {
    handleSignal("SIGINT");
  });
  process.on("SIGTERM", () => {
    handleSignal("SIGTERM");
  });

  try {
    if (runOnce) {
      logger.info("running a single check");
      await guardedCycle();
      return;
    }

    logger.info("monitoring started", {
      location: config.targetLocation.name,
      stations: config.stations.length,
      marine_points: config.marinePoints.length,
      interval_ms: config.checkIntervalMs,
      min_alert_level: config.minAlertLevel
    });
    await runMonitoringLoop({
      runCycle: guardedCycle,
      intervalMs: config.checkIntervalMs,
      errorCooldownMs: config.errorCooldownMs,
      isRunning: () => running,
      logger
    });
    logger.info("monitoring stopped");
  } finally {
    if (redis) {
      await disconnectRedis(redis, logger);
    }
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
