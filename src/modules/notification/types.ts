import type { Logger } from "../../shared/logger.js";
import type { AlertLevel } from "../alert-scoring/constants.js";

export interface NotifierState {
  readonly lastNotificationTime?: Date;
  readonly lastNotificationScore: number;
}

/**
 * Where the notifier's hysteresis state lives between cycles. Shared
 * implementations let several worker instances agree on the last delivery.
 */
export interface NotifierStateStore {
  load(): Promise<NotifierState>;
  save(state: NotifierState): Promise<void>;
}

export interface NotificationCooldowns {
  highMs: number;
  mediumMs: number;
  lowMs: number;
}

export interface NotificationPolicy {
  minAlertLevel: AlertLevel;
  cooldowns?: Partial<NotificationCooldowns>;
}

export interface DeliverySink {
  deliver(message: string): Promise<boolean>;
}

export interface AlertMessageInput {
  score: number;
  reasons: readonly string[];
  level: AlertLevel;
  eta: string;
  locationName: string;
  now: Date;
}

export interface NotificationDecision {
  shouldNotify: boolean;
  delivered: boolean;
  message?: string;
}

export interface AlertNotificationServiceOptions {
  sink: DeliverySink;
  policy: NotificationPolicy;
  locationName: string;
  maxMessageLength?: number;
  stateStore?: NotifierStateStore;
  clock?: () => Date;
  logger?: Logger;
}
