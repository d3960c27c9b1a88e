/**
 * Collector context: owns every component of the main process and wires
 * them together. Lifecycle is `new Collector(config)`, `run(signal)`, then
 * `shutdown()`.
 */

import type { Server } from 'node:http';
import {
  MetricsSink,
  NO_RETRY,
  PollScheduler,
  createLogger,
  errorMessage,
  sample,
  type CollectorConfig,
  type FetchFn,
  type Logger,
  type Sleep,
} from '@validator-watch/shared';
import { ConnectionHealth } from './connection-health.js';
import type { StreamHandlers } from './events.js';
import { LedgerHandler } from './handlers/ledger.js';
import { ServerHandler } from './handlers/server.js';
import { ValidationsHandler } from './handlers/validations.js';
import { createHealthApp } from './health-server.js';
import { HeartbeatMonitor } from './heartbeat.js';
import { peerSamples, serverInfoLabels, serverInfoSamples, serverStateSamples } from './pollers.js';
import { ValidationReconciler } from './reconciliation.js';
import { recoverState } from './recovery.js';
import { UpstreamClient, type SocketFactory } from './rpc-client.js';
import { Supervisor, type SupervisorState } from './supervisor.js';

export { ConnectionHealth } from './connection-health.js';
export { ValidationReconciler } from './reconciliation.js';
export { Supervisor, type SupervisorState } from './supervisor.js';
export { UpstreamClient } from './rpc-client.js';

const HEALTH_METRICS_INTERVAL_MS = 30_000;
const RECONCILE_INTERVAL_MS = 1000;
const CLEANUP_INTERVAL_MS = 60_000;
const ENGINE_PUBLISH_INTERVAL_MS = 10_000;

export interface CollectorDeps {
  fetch?: FetchFn;
  socketFactory?: SocketFactory;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

function usableKey(key: string | undefined): key is string {
  return key !== undefined && key !== '' && key !== 'none';
}

export class Collector {
  readonly health: ConnectionHealth;
  readonly sink: MetricsSink;
  readonly client: UpstreamClient;
  readonly engine: ValidationReconciler;
  readonly scheduler: PollScheduler;
  readonly heartbeat: HeartbeatMonitor;
  readonly supervisor: Supervisor;

  private readonly validations: ValidationsHandler;
  private readonly now: () => number;
  private readonly logger: Logger;
  private httpServer: Server | null = null;
  private startedAt: number | null = null;
  private lastEnginePublish = 0;

  constructor(
    private readonly config: CollectorConfig,
    deps: CollectorDeps = {}
  ) {
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger('collector');

    this.health = new ConnectionHealth(this.now);
    this.sink = new MetricsSink({ url: config.VICTORIA_METRICS_URL, fetch: deps.fetch, sleep: deps.sleep });
    this.client = new UpstreamClient({
      wsUrl: config.RIPPLED_WS_URL,
      httpUrl: config.RIPPLED_HTTP_URL,
      socketFactory: deps.socketFactory,
      fetch: deps.fetch,
      sleep: deps.sleep,
      // the poll loops own the retries
      httpRetry: NO_RETRY,
    });
    this.engine = new ValidationReconciler({
      gracePeriodMs: config.GRACE_PERIOD_MS,
      repairWindowMs: config.REPAIR_WINDOW_MS,
      retentionMs: config.RETENTION_WINDOW_MS,
      now: this.now,
    });

    const ledger = new LedgerHandler(this.sink, this.engine, this.now);
    const server = new ServerHandler(this.sink, this.now);
    this.validations = new ValidationsHandler(this.engine, config.VALIDATOR_PUBLIC_KEY ?? null);
    const handlers: StreamHandlers = {
      ledgerClosed: (event) => ledger.handle(event),
      serverStatus: (event) => server.handle(event),
      validationReceived: (event) => this.validations.handle(event),
    };

    this.heartbeat = new HeartbeatMonitor(this.client, this.health, {
      intervalMs: config.HEARTBEAT_INTERVAL_MS,
      timeoutMs: config.HEARTBEAT_TIMEOUT_MS,
    });
    this.supervisor = new Supervisor(this.client, this.health, handlers, {
      maxAttempts: config.MAX_RECONNECT_ATTEMPTS,
      session: this.heartbeat,
      sleep: deps.sleep,
    });
    this.scheduler = new PollScheduler({ sleep: deps.sleep, now: this.now });
    this.registerLoops();
  }

  get validatorKey(): string | null {
    return this.validations.key;
  }

  /**
   * Recover counters, start every loop and block on the stream supervisor.
   * Resolves with the supervisor's final state: `stopped` after `signal`
   * aborts, `failed` when reconnection gave up (loops keep running).
   */
  async run(signal: AbortSignal): Promise<SupervisorState> {
    this.startedAt = this.now();
    this.logger.info('🚀 Starting validator collector');
    await this.startHealthServer();

    if (!(await this.sink.healthCheck())) {
      this.logger.warn(`⚠️ Metrics store at ${this.config.VICTORIA_METRICS_URL} is not answering; writes are best effort`);
    }
    this.engine.restore(await recoverState(this.sink, Math.floor(this.now() / 1000)));

    await this.detectValidatorKey();
    await this.publishServerLabels();

    this.sink.start();
    this.scheduler.start(signal);
    return this.supervisor.run(signal);
  }

  async shutdown(): Promise<void> {
    this.logger.info('🛑 Shutting down collector');
    this.heartbeat.stop();
    await this.scheduler.stop();
    this.client.close();

    this.sink.write(this.engine.toSamples());
    await this.sink.close();

    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  }

  /** Publish reconciliation samples; called after finalizations and periodically. */
  publishEngine(): void {
    this.sink.write(this.engine.toSamples());
    this.lastEnginePublish = this.now();
  }

  private registerLoops(): void {
    const { config } = this;

    this.scheduler
      .add({
        name: 'server_info',
        intervalMs: config.POLL_SERVER_INFO_MS,
        task: async () => {
          const serverInfo = await this.client.serverInfo();
          this.sink.write(serverInfoSamples(serverInfo, this.now()));
          if (!this.validations.key && usableKey(serverInfo.pubkey_validator)) {
            this.adoptValidatorKey(serverInfo.pubkey_validator);
          }
        },
      })
      .add({
        name: 'peers',
        intervalMs: config.POLL_PEERS_MS,
        task: async () => {
          this.sink.write(peerSamples(await this.client.peers(), this.now()));
        },
      })
      .add({
        name: 'server_state',
        intervalMs: config.POLL_SERVER_STATE_MS,
        task: async () => {
          this.sink.write(serverStateSamples(await this.client.serverState(), this.now()));
        },
      })
      .add({
        name: 'connection_health',
        intervalMs: HEALTH_METRICS_INTERVAL_MS,
        retry: NO_RETRY,
        task: async () => {
          const now = this.now();
          this.sink.write([
            ...this.health.toSamples(now),
            sample('xrpl_monitor_uptime_seconds', Math.floor((now - (this.startedAt ?? now)) / 1000), undefined, now),
          ]);
        },
      })
      .add({
        name: 'reconcile',
        intervalMs: RECONCILE_INTERVAL_MS,
        retry: NO_RETRY,
        task: async () => {
          const finalized = this.engine.tick();
          if (finalized.length > 0 || this.now() - this.lastEnginePublish >= ENGINE_PUBLISH_INTERVAL_MS) {
            this.publishEngine();
          }
        },
      })
      .add({
        name: 'cleanup',
        intervalMs: CLEANUP_INTERVAL_MS,
        retry: NO_RETRY,
        task: async () => {
          this.engine.cleanup();
        },
      });
  }

  private async detectValidatorKey(): Promise<void> {
    if (this.validations.key) {
      this.logger.info(`Tracking validations for ${this.validations.key}`);
      return;
    }
    try {
      const serverInfo = await this.client.serverInfo();
      if (usableKey(serverInfo.pubkey_validator)) {
        this.adoptValidatorKey(serverInfo.pubkey_validator);
      } else {
        this.logger.warn('⚠️ Node reports no validator key; counting network validations only');
      }
    } catch (err) {
      this.logger.warn(`⚠️ Could not read validator key yet (${errorMessage(err)}); will retry from server_info polls`);
    }
  }

  private adoptValidatorKey(key: string): void {
    this.validations.setValidatorKey(key);
    this.logger.info(`✅ Detected validator key ${key}`);
  }

  private async publishServerLabels(): Promise<void> {
    try {
      this.sink.write([serverInfoLabels(await this.client.serverState(), this.now())]);
    } catch (err) {
      this.logger.warn(`⚠️ Could not publish server labels: ${errorMessage(err)}`);
    }
  }

  private startHealthServer(): Promise<void> {
    const app = createHealthApp({
      health: this.health,
      reconciliation: () => this.engine.snapshot(),
      supervisor: () => this.supervisor.state,
      loops: () => this.scheduler.stats(),
      now: this.now,
    });

    return new Promise((resolve, reject) => {
      const server = app.listen(this.config.HEALTH_PORT, () => {
        this.logger.info(`🩺 Health endpoint on http://localhost:${this.config.HEALTH_PORT}/health`);
        resolve();
      });
      server.once('error', reject);
      this.httpServer = server;
    });
  }
}
