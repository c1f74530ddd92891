import type { NotifierState, NotifierStateStore } from "../../modules/notification/types.js";
import type { AppRedisClient } from "./client.js";

export const NOTIFIER_STATE_KEY = "storm-watch:notifier-state";

/**
 * Keeps the last delivered alert in a Redis hash so every worker instance
 * gates against the same history, and a restart does not re-send an alert
 * that is still cooling down.
 *
 * Hash fields:
 *   - last_notification_time: ISO timestamp, absent until the first delivery
 *   - last_notification_score: integer score of that delivery
 */
export class RedisNotifierStateStore implements NotifierStateStore {
  constructor(
    private readonly redis: Pick<AppRedisClient, "hGetAll" | "hSet">,
    private readonly key: string = NOTIFIER_STATE_KEY
  ) {}

  async load(): Promise<NotifierState> {
    const fields = await this.redis.hGetAll(this.key);

    const score = Number(fields.last_notification_score ?? "0");
    const time = fields.last_notification_time
      ? new Date(fields.last_notification_time)
      : undefined;

    const lastNotificationScore = Number.isFinite(score) ? score : 0;
    if (!time || Number.isNaN(time.getTime())) {
      return { lastNotificationScore };
    }
    return { lastNotificationTime: time, lastNotificationScore };
  }

  async save(state: NotifierState): Promise<void> {
    const fields: Record<string, string> = {
      last_notification_score: String(state.lastNotificationScore)
    };
    if (state.lastNotificationTime) {
      fields.last_notification_time = state.lastNotificationTime.toISOString();
    }
    await this.redis.hSet(this.key, fields);
  }
}
