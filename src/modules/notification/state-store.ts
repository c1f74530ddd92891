import { INITIAL_NOTIFIER_STATE } from "./gate.js";
import type { NotifierState, NotifierStateStore } from "./types.js";

export class InMemoryNotifierStateStore implements NotifierStateStore {
  private state: NotifierState;

  constructor(initialState: NotifierState = INITIAL_NOTIFIER_STATE) {
    this.state = initialState;
  }

  async load(): Promise<NotifierState> {
    return this.state;
  }

  async save(state: NotifierState): Promise<void> {
    this.state = state;
  }
}
