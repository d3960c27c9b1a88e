import { sample, type Sample } from '@validator-watch/shared';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'failed';

export interface ConnectionHealthSnapshot {
  status: HealthStatus;
  connected: boolean;
  heartbeatFailures: number;
  reconnectAttempts: number;
  failed: boolean;
  messageCount: number;
  lastMessageAt: number | null;
  lastHeartbeatAt: number | null;
  disconnectReason: string | null;
}

/**
 * Connectivity state of the stream connection. The heartbeat and the
 * supervisor write it; the listen loop and the health endpoint read it.
 * Every mutation is a single synchronous call.
 */
export class ConnectionHealth {
  private _connected = false;
  private heartbeatFailures = 0;
  private reconnectAttempts = 0;
  private failed = false;
  private messageCount = 0;
  private lastMessageAt: number | null = null;
  private lastHeartbeatAt: number | null = null;
  private disconnectReason: string | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  get connected(): boolean {
    return this._connected;
  }

  markConnected(): void {
    this._connected = true;
    this.heartbeatFailures = 0;
    this.reconnectAttempts = 0;
    this.failed = false;
    this.disconnectReason = null;
  }

  markDisconnected(reason: string): void {
    this._connected = false;
    this.disconnectReason = reason;
  }

  /** Terminal: reconnect attempts exhausted */
  markFailed(): void {
    this._connected = false;
    this.failed = true;
    this.disconnectReason = 'reconnect attempts exhausted';
  }

  recordHeartbeat(ok: boolean): void {
    if (ok) {
      this.heartbeatFailures = 0;
      this.lastHeartbeatAt = this.now();
    } else {
      this.heartbeatFailures++;
    }
  }

  recordReconnectAttempt(attempt: number): void {
    this.reconnectAttempts = attempt;
  }

  recordMessage(): void {
    this.messageCount++;
    this.lastMessageAt = this.now();
  }

  status(): HealthStatus {
    if (this.failed) return 'failed';
    if (!this._connected) return 'unhealthy';
    return this.heartbeatFailures > 0 ? 'degraded' : 'healthy';
  }

  snapshot(): ConnectionHealthSnapshot {
    return {
      status: this.status(),
      connected: this._connected,
      heartbeatFailures: this.heartbeatFailures,
      reconnectAttempts: this.reconnectAttempts,
      failed: this.failed,
      messageCount: this.messageCount,
      lastMessageAt: this.lastMessageAt,
      lastHeartbeatAt: this.lastHeartbeatAt,
      disconnectReason: this.disconnectReason,
    };
  }

  toSamples(now: number = this.now()): Sample[] {
    const samples = [
      sample('xrpl_websocket_connected', this._connected ? 1 : 0, undefined, now),
      sample('xrpl_websocket_healthy', this.status() === 'healthy' ? 1 : 0, undefined, now),
      sample('xrpl_websocket_heartbeat_failures', this.heartbeatFailures, undefined, now),
      sample('xrpl_websocket_reconnect_attempts', this.reconnectAttempts, undefined, now),
      sample('xrpl_websocket_message_count', this.messageCount, undefined, now),
    ];
    if (this.lastMessageAt !== null) {
      samples.push(
        sample('xrpl_websocket_last_message_age_seconds', Math.max(0, (now - this.lastMessageAt) / 1000), undefined, now)
      );
    }
    return samples;
  }
}
