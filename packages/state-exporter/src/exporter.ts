/**
 * State exporter: polls the node over JSON-RPC and serves the latest
 * readings. It never writes to the time-series store.
 */

import type { Server } from 'node:http';
import {
  JsonRpcClient,
  NO_RETRY,
  PollScheduler,
  createLogger,
  type ExporterConfig,
  type FetchFn,
  type Logger,
  type Sleep,
} from '@validator-watch/shared';
import { fetchPeers, fetchState, type NodeRpc } from './poller.js';
import { createExporterApp } from './server.js';
import { SnapshotStore } from './snapshot.js';

export { SnapshotStore, type RealtimeStateSnapshot } from './snapshot.js';
export { collectSeries, instantQuery, renderExposition } from './series.js';

const STALE_AFTER_CYCLES = 10;

export interface StateExporterDeps {
  rpc?: NodeRpc;
  fetch?: FetchFn;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

export class StateExporter {
  readonly store: SnapshotStore;
  readonly scheduler: PollScheduler;

  private readonly rpc: NodeRpc;
  private readonly now: () => number;
  private readonly logger: Logger;
  private httpServer: Server | null = null;
  private lastState: string | null = null;
  private lastPeerCount: number | null = null;

  constructor(
    private readonly config: ExporterConfig,
    deps: StateExporterDeps = {}
  ) {
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger('state-exporter');
    // One attempt per cycle; the next poll is at most a few seconds away
    this.rpc = deps.rpc ?? new JsonRpcClient({ url: config.RIPPLED_HTTP_URL, retry: NO_RETRY, fetch: deps.fetch });
    this.store = new SnapshotStore(this.now());
    this.scheduler = new PollScheduler({ sleep: deps.sleep, now: this.now })
      .add({ name: 'state', intervalMs: config.STATE_POLL_MS, retry: NO_RETRY, task: () => this.pollState() })
      .add({ name: 'peers', intervalMs: config.PEERS_POLL_MS, retry: NO_RETRY, task: () => this.pollPeers() });
  }

  app(): ReturnType<typeof createExporterApp> {
    return createExporterApp({
      snapshot: () => this.store.get(),
      instance: this.config.INSTANCE_LABEL,
      lastStateCycleAt: () => this.scheduler.stats().state?.lastSuccessAt ?? null,
      staleAfterMs: STALE_AFTER_CYCLES * this.config.STATE_POLL_MS,
      now: this.now,
    });
  }

  async start(signal?: AbortSignal): Promise<void> {
    this.logger.info(`🚀 Starting state exporter for ${this.config.RIPPLED_HTTP_URL}`);
    await new Promise<void>((resolve, reject) => {
      const server = this.app().listen(this.config.EXPORTER_PORT, () => {
        this.logger.info(`✅ Serving /metrics and /api/v1/query on port ${this.config.EXPORTER_PORT}`);
        resolve();
      });
      server.once('error', reject);
      this.httpServer = server;
    });
    this.scheduler.start(signal);
  }

  async stop(): Promise<void> {
    this.logger.info('🛑 Stopping state exporter');
    await this.scheduler.stop();
    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  }

  async pollState(): Promise<void> {
    const state = await fetchState(this.rpc, this.now, this.logger);
    this.store.updateState(state);

    if (state.name !== this.lastState) {
      if (this.lastState === null) {
        this.logger.info(`Initial state: ${state.name} (value=${state.value})`);
      } else {
        this.logger.info(`🔄 State changed: ${this.lastState} -> ${state.name} (value=${state.value})`);
      }
      this.lastState = state.name;
    }
  }

  async pollPeers(): Promise<void> {
    const peers = await fetchPeers(this.rpc, this.now, this.logger);
    if (!peers) return;
    this.store.updatePeers(peers);

    if (peers.count !== this.lastPeerCount) {
      const detail = `(in=${peers.inbound}, out=${peers.outbound})`;
      if (this.lastPeerCount === null) {
        this.logger.info(`Initial peer count: ${peers.count} ${detail}`);
      } else {
        this.logger.info(`Peer count changed: ${this.lastPeerCount} -> ${peers.count} ${detail}`);
      }
      this.lastPeerCount = peers.count;
    }
  }
}
