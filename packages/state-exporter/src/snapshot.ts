import type { PeerSummary } from '@validator-watch/shared';

export type NodeMode = 'validator' | 'stock_node' | 'unknown';

export const NODE_MODES: readonly NodeMode[] = ['validator', 'stock_node', 'unknown'];

export interface StateReading {
  name: string;
  value: number;
  buildVersion: string;
  pubkey: string;
  nodeMode: NodeMode;
  ledgerSequence: number;
  /** Seconds since the last validated ledger closed */
  ledgerAge: number;
  baseFeeXrp: number;
  reserveBaseXrp: number;
  reserveIncXrp: number;
  loadFactor: number;
  validationQuorum: number;
  proposers: number;
  unlExpiryDays: number;
  amendmentBlocked: boolean;
  /** Epoch ms of the poll that produced this reading */
  polledAt: number;
}

export interface PeerReading extends PeerSummary {
  polledAt: number;
}

export interface RealtimeStateSnapshot {
  readonly state: Readonly<StateReading>;
  readonly peers: Readonly<PeerReading>;
}

export function downState(polledAt: number, nodeMode: NodeMode = 'unknown'): StateReading {
  return {
    name: 'down',
    value: 0,
    buildVersion: '',
    pubkey: '',
    nodeMode,
    ledgerSequence: 0,
    ledgerAge: 0,
    baseFeeXrp: 0,
    reserveBaseXrp: 0,
    reserveIncXrp: 0,
    loadFactor: 0,
    validationQuorum: 0,
    proposers: 0,
    unlExpiryDays: 0,
    amendmentBlocked: false,
    polledAt,
  };
}

function freeze(state: StateReading, peers: PeerReading): RealtimeStateSnapshot {
  return Object.freeze({ state: Object.freeze({ ...state }), peers: Object.freeze({ ...peers }) });
}

/**
 * Holds the latest readings. Each update builds a new frozen snapshot and
 * swaps the reference, so readers always see a whole one.
 */
export class SnapshotStore {
  private current: RealtimeStateSnapshot;

  constructor(now: number = Date.now()) {
    this.current = freeze(downState(now), {
      count: 0,
      inbound: 0,
      outbound: 0,
      insane: 0,
      latencyP90: 0,
      polledAt: now,
    });
  }

  get(): RealtimeStateSnapshot {
    return this.current;
  }

  updateState(state: StateReading): void {
    this.current = freeze(state, this.current.peers);
  }

  updatePeers(peers: PeerReading): void {
    this.current = freeze(this.current.state, peers);
  }
}
