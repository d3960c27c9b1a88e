/**
 * Stream liveness monitor.
 *
 * A hung socket that delivers nothing and raises nothing leaves the listen
 * loop waiting forever. After `threshold` consecutive failed pings the
 * monitor marks the connection down and tears the transport down, which
 * ends the message stream.
 */

import { createLogger, errorMessage, type Logger } from '@validator-watch/shared';
import type { ConnectionHealth } from './connection-health.js';

export interface HeartbeatTarget {
  ping(timeoutMs: number): Promise<boolean>;
  close(): void;
}

export interface HeartbeatOptions {
  intervalMs?: number;
  timeoutMs?: number;
  threshold?: number;
  logger?: Logger;
}

export type HeartbeatState = 'healthy' | 'unhealthy';

export class HeartbeatMonitor {
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly threshold: number;
  private readonly logger: Logger;

  private intervalId: NodeJS.Timeout | null = null;
  private state: HeartbeatState = 'healthy';
  private failures = 0;
  private probing = false;

  constructor(
    private readonly target: HeartbeatTarget,
    private readonly health: ConnectionHealth,
    options: HeartbeatOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 30_000;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.threshold = options.threshold ?? 3;
    this.logger = options.logger ?? createLogger('heartbeat');
  }

  start(): void {
    if (this.intervalId) return;
    this.state = 'healthy';
    this.failures = 0;
    this.intervalId = setInterval(() => {
      this.tick().catch((err) => this.logger.error(`Heartbeat tick failed: ${errorMessage(err)}`));
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.intervalId) return;
    clearInterval(this.intervalId);
    this.intervalId = null;
  }

  /**
   * Run one ping. Exposed so callers can drive the monitor without timers.
   */
  async tick(): Promise<HeartbeatState> {
    if (this.state === 'unhealthy' || this.probing) return this.state;

    this.probing = true;
    let ok: boolean;
    try {
      ok = await this.target.ping(this.timeoutMs);
    } catch (err) {
      this.logger.debug(`Ping threw: ${errorMessage(err)}`);
      ok = false;
    } finally {
      this.probing = false;
    }

    this.health.recordHeartbeat(ok);
    if (ok) {
      if (this.failures > 0) this.logger.info(`✅ Heartbeat recovered after ${this.failures} failure(s)`);
      this.failures = 0;
      return this.state;
    }

    this.failures++;
    this.logger.warn(`⚠️ Heartbeat failed (${this.failures}/${this.threshold})`);
    if (this.failures >= this.threshold) {
      this.state = 'unhealthy';
      this.stop();
      this.health.markDisconnected('heartbeat timeout');
      this.logger.error(`Stream unresponsive after ${this.failures} pings, forcing reconnect`);
      this.target.close();
    }
    return this.state;
  }

  getStatus() {
    return {
      running: this.intervalId !== null,
      state: this.state,
      failures: this.failures,
      intervalMs: this.intervalMs,
    };
  }
}
