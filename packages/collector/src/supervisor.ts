/**
 * Top-level stream control loop: connect, listen, and on any exit other
 * than shutdown, reconnect with exponential backoff. Exhausting the attempt
 * budget is terminal and shows on the health endpoint; recovery from there
 * is a process restart.
 */

import {
  backoffDelay,
  createLogger,
  sleep as defaultSleep,
  type Logger,
  type Sleep,
} from '@validator-watch/shared';
import type { ConnectionHealth } from './connection-health.js';
import { listen } from './dispatcher.js';
import { STREAMS, type StreamHandlers } from './events.js';

export type SupervisorState =
  | { kind: 'connecting' }
  | { kind: 'connected' }
  | { kind: 'reconnecting'; attempt: number }
  | { kind: 'failed' }
  | { kind: 'stopped' };

export interface StreamConnection {
  connect(): Promise<boolean>;
  subscribe(streams: readonly string[]): Promise<boolean>;
  messages(): AsyncIterable<unknown>;
  close(): void;
}

export interface SessionHooks {
  start(): void;
  stop(): void;
}

export interface SupervisorOptions {
  streams?: readonly string[];
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Started for each connected session and stopped when it ends, e.g. the heartbeat */
  session?: SessionHooks;
  sleep?: Sleep;
  logger?: Logger;
}

export class Supervisor {
  private readonly streams: readonly string[];
  private readonly maxAttempts: number;
  private readonly backoff: { baseDelayMs: number; maxDelayMs: number };
  private readonly session?: SessionHooks;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private _state: SupervisorState = { kind: 'connecting' };

  constructor(
    private readonly connection: StreamConnection,
    private readonly health: ConnectionHealth,
    private readonly handlers: StreamHandlers,
    options: SupervisorOptions = {}
  ) {
    this.streams = options.streams ?? STREAMS;
    this.maxAttempts = options.maxAttempts ?? 10;
    this.backoff = { baseDelayMs: options.baseDelayMs ?? 1000, maxDelayMs: options.maxDelayMs ?? 60_000 };
    this.session = options.session;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('supervisor');
  }

  get state(): SupervisorState {
    return this._state;
  }

  /**
   * Runs until `signal` aborts (state `stopped`) or reconnection gives up
   * (state `failed`).
   */
  async run(signal: AbortSignal): Promise<SupervisorState> {
    const onAbort = (): void => this.connection.close();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      this.setState({ kind: 'connecting' });
      let connected = signal.aborted ? false : await this.establish();
      if (!connected && !signal.aborted) {
        this.logger.warn('⚠️ Initial connection failed');
      }

      while (!signal.aborted) {
        if (connected) {
          this.setState({ kind: 'connected' });
          this.session?.start();
          const exit = await listen(this.connection.messages(), this.health, this.handlers);
          this.session?.stop();
          if (signal.aborted) break;
          this.logger.warn(`⚠️ Listen loop exited (${exit}), reconnecting`);
        }

        connected = await this.reconnect(signal);
        if (!connected && !signal.aborted) {
          this.setState({ kind: 'failed' });
          this.health.markFailed();
          this.connection.close();
          this.logger.error(`❌ Giving up after ${this.maxAttempts} reconnect attempts`);
          return this._state;
        }
      }

      this.session?.stop();
      this.connection.close();
      this.setState({ kind: 'stopped' });
      return this._state;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async establish(): Promise<boolean> {
    if (!(await this.connection.connect())) return false;
    if (!(await this.connection.subscribe(this.streams))) {
      this.connection.close();
      return false;
    }
    this.health.markConnected();
    return true;
  }

  private async reconnect(signal: AbortSignal): Promise<boolean> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.setState({ kind: 'reconnecting', attempt });
      this.health.recordReconnectAttempt(attempt);

      const delayMs = backoffDelay(this.backoff, attempt);
      this.logger.info(`🔄 Reconnecting in ${delayMs / 1000}s (attempt ${attempt}/${this.maxAttempts})`);
      await this.sleep(delayMs, signal);
      if (signal.aborted) return false;

      if (await this.establish()) {
        this.logger.info(`✅ Reconnected on attempt ${attempt}`);
        return true;
      }
    }
    return false;
  }

  private setState(state: SupervisorState): void {
    this._state = state;
  }
}
