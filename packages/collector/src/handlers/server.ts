import { sample, stateValue, type MetricsWriter } from '@validator-watch/shared';
import type { ServerStatusEvent } from '../events.js';

/** Server-status events: current state and how long it has held. */
export class ServerHandler {
  private currentState: string | null = null;
  private enteredAt = 0;
  private stateChanges = 0;

  constructor(
    private readonly sink: MetricsWriter,
    private readonly now: () => number = Date.now
  ) {}

  get state(): string | null {
    return this.currentState;
  }

  handle(event: ServerStatusEvent): void {
    const nowMs = this.now();
    if (event.serverStatus !== this.currentState) {
      if (this.currentState !== null) this.stateChanges++;
      this.currentState = event.serverStatus;
      this.enteredAt = nowMs;
    }

    this.sink.write([
      sample('xrpl_validator_state_value', stateValue(event.serverStatus), undefined, nowMs),
      sample('xrpl_time_in_current_state_seconds', (nowMs - this.enteredAt) / 1000, undefined, nowMs),
      sample('xrpl_state_changes_total', this.stateChanges, undefined, nowMs),
    ]);
  }
}
