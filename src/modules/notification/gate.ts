import { ALERT_LEVEL_RANK, AlertLevels, type AlertLevel } from "../alert-scoring/constants.js";
import type { NotificationCooldowns, NotificationPolicy, NotifierState } from "./types.js";

const MINUTE_MS = 60 * 1000;

export const DEFAULT_NOTIFICATION_COOLDOWNS: Readonly<NotificationCooldowns> = Object.freeze({
  highMs: 20 * MINUTE_MS,
  mediumMs: 45 * MINUTE_MS,
  lowMs: 120 * MINUTE_MS
});

export const INITIAL_NOTIFIER_STATE: NotifierState = Object.freeze({
  lastNotificationScore: 0
});

const SCORE_JUMP_THRESHOLD = 25;

const LEVEL_SCORE_MINIMUMS = Object.freeze({
  HIGH: 60,
  MEDIUM: 40,
  LOW: 20
});

/**
 * Hysteresis policy deciding whether a computed alert goes out. The gate
 * only reads the state it is handed; callers apply `recordDelivery` once a
 * message has actually been delivered.
 */
export class NotificationGate {
  private readonly minAlertLevel: AlertLevel;
  private readonly cooldowns: NotificationCooldowns;

  constructor({ minAlertLevel, cooldowns }: NotificationPolicy) {
    this.minAlertLevel = minAlertLevel;
    this.cooldowns = { ...DEFAULT_NOTIFICATION_COOLDOWNS, ...cooldowns };
  }

  shouldNotify(score: number, level: AlertLevel, state: NotifierState, now: Date): boolean {
    if (ALERT_LEVEL_RANK[level] < ALERT_LEVEL_RANK[this.minAlertLevel]) {
      return false;
    }

    if (level === AlertLevels.CRITICAL) {
      return true;
    }

    const cooledDown = (cooldownMs: number): boolean =>
      state.lastNotificationTime === undefined ||
      now.getTime() - state.lastNotificationTime.getTime() >= cooldownMs;

    if (
      level === AlertLevels.HIGH &&
      score > LEVEL_SCORE_MINIMUMS.HIGH &&
      cooledDown(this.cooldowns.highMs)
    ) {
      return true;
    }
    if (
      level === AlertLevels.MEDIUM &&
      score > LEVEL_SCORE_MINIMUMS.MEDIUM &&
      cooledDown(this.cooldowns.mediumMs)
    ) {
      return true;
    }
    if (
      level === AlertLevels.LOW &&
      score > LEVEL_SCORE_MINIMUMS.LOW &&
      cooledDown(this.cooldowns.lowMs)
    ) {
      return true;
    }

    return score > state.lastNotificationScore + SCORE_JUMP_THRESHOLD;
  }
}

export function recordDelivery(score: number, now: Date): NotifierState {
  return Object.freeze({
    lastNotificationTime: now,
    lastNotificationScore: score
  });
}
