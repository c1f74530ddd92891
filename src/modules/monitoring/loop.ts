import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";
import type { CycleLeaseManager } from "../../infrastructure/lease/types.js";
import type { CycleSummary } from "./service.js";

export const CYCLE_LEASE_NAME = "storm-watch-cycle";

export interface GuardedCycleOptions {
  runCycle: () => Promise<CycleSummary>;
  leaseManager: CycleLeaseManager;
  leaseTtlSeconds: number;
  logger?: Logger;
}

export interface MonitoringLoopOptions {
  runCycle: () => Promise<CycleSummary | undefined>;
  intervalMs: number;
  errorCooldownMs: number;
  isRunning: () => boolean;
  wait?: (delayMs: number, isRunning: () => boolean) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Sleeps in short slices so a shutdown signal is noticed within half a
 * second.
 */
export async function waitUntilNextPoll(
  delayMs: number,
  isRunning: () => boolean
): Promise<void> {
  let remaining = delayMs;
  while (remaining > 0 && isRunning()) {
    const slice = Math.min(remaining, 500);
    await sleep(slice);
    remaining -= slice;
  }
}

/**
 * Runs a cycle while holding the cycle lease. Resolves to undefined when
 * another instance holds it.
 */
export async function runGuardedCycle({
  runCycle,
  leaseManager,
  leaseTtlSeconds,
  logger = createNoopLogger()
}: GuardedCycleOptions): Promise<CycleSummary | undefined> {
  const lease = await leaseManager.tryAcquire(CYCLE_LEASE_NAME, leaseTtlSeconds);
  if (!lease) {
    logger.warn("failed to acquire cycle lease, another instance may be running");
    return undefined;
  }

  try {
    return await runCycle();
  } finally {
    await lease.release();
  }
}

export async function runMonitoringLoop({
  runCycle,
  intervalMs,
  errorCooldownMs,
  isRunning,
  wait = waitUntilNextPoll,
  logger = createNoopLogger()
}: MonitoringLoopOptions): Promise<number> {
  let cycles = 0;

  while (isRunning()) {
    try {
      const summary = await runCycle();
      cycles += 1;
      if (summary) {
        logger.info("cycle complete", {
          weather: summary.weatherReadings,
          marine: summary.marineReadings,
          lightning: summary.lightningEvents,
          score: summary.outcome?.score,
          level: summary.outcome?.level,
          notified: summary.notified,
          delivered: summary.delivered
        });
      }
      logger.info("sleeping until next check", { delay_ms: intervalMs });
      await wait(intervalMs, isRunning);
    } catch (error) {
      logger.error("cycle failed, cooling down", {
        error: errorMessage(error),
        cooldown_ms: errorCooldownMs
      });
      await wait(errorCooldownMs, isRunning);
    }
  }

  return cycles;
}
