import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";
import { renderReason } from "../alert-scoring/engine.js";
import type { AlertOutcome } from "../alert-scoring/types.js";
import { TELEGRAM_MAX_MESSAGE_LENGTH, formatAlertMessage } from "./formatter.js";
import { NotificationGate, recordDelivery } from "./gate.js";
import { InMemoryNotifierStateStore } from "./state-store.js";
import type {
  AlertNotificationServiceOptions,
  DeliverySink,
  NotificationDecision,
  NotifierStateStore
} from "./types.js";

export class AlertNotificationService {
  private readonly sink: DeliverySink;
  private readonly gate: NotificationGate;
  private readonly locationName: string;
  private readonly maxMessageLength: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly stateStore: NotifierStateStore;

  constructor({
    sink,
    policy,
    locationName,
    maxMessageLength = TELEGRAM_MAX_MESSAGE_LENGTH,
    stateStore = new InMemoryNotifierStateStore(),
    clock = () => new Date(),
    logger = createNoopLogger()
  }: AlertNotificationServiceOptions) {
    this.sink = sink;
    this.gate = new NotificationGate(policy);
    this.locationName = locationName;
    this.maxMessageLength = maxMessageLength;
    this.clock = clock;
    this.logger = logger;
    this.stateStore = stateStore;
  }

  async notify(outcome: AlertOutcome): Promise<NotificationDecision> {
    const now = this.clock();
    const state = await this.stateStore.load();
    if (!this.gate.shouldNotify(outcome.score, outcome.level, state, now)) {
      return { shouldNotify: false, delivered: false };
    }

    const message = formatAlertMessage(
      {
        score: outcome.score,
        reasons: outcome.reasons.map(renderReason),
        level: outcome.level,
        eta: outcome.eta,
        locationName: this.locationName,
        now
      },
      this.maxMessageLength
    );

    let delivered: boolean;
    try {
      delivered = await this.sink.deliver(message);
    } catch (error) {
      this.logger.error("alert delivery threw", {
        level: outcome.level,
        error: errorMessage(error)
      });
      delivered = false;
    }

    if (!delivered) {
      this.logger.warn("alert delivery failed, notifier state unchanged", {
        level: outcome.level,
        score: outcome.score
      });
      return { shouldNotify: true, delivered: false, message };
    }

    // Cooldowns run from when the message went out, not from when the cycle began.
    await this.stateStore.save(recordDelivery(outcome.score, this.clock()));
    this.logger.info("alert delivered", {
      level: outcome.level,
      score: outcome.score,
      preview: message.length > 50 ? `${message.slice(0, 50)}...` : message
    });
    return { shouldNotify: true, delivered: true, message };
  }
}
