/**
 * Shapes of the validator node's request/response results, limited to the
 * fields this project reads. Unknown fields pass through untouched.
 */

import { z } from 'zod';

/** Seconds between the Unix epoch and the ledger's own epoch (2000-01-01T00:00:00Z). */
export const RIPPLE_EPOCH_OFFSET = 946_684_800;
export const DROPS_PER_XRP = 1_000_000;

export const STATE_VALUES = {
  down: 0,
  disconnected: 1,
  connected: 2,
  syncing: 3,
  tracking: 4,
  full: 5,
  validating: 6,
  proposing: 7,
} as const;

export type ServerStateName = keyof typeof STATE_VALUES;

export const STATE_NAMES = Object.keys(STATE_VALUES).filter(isServerStateName);

export function isServerStateName(name: string): name is ServerStateName {
  return Object.prototype.hasOwnProperty.call(STATE_VALUES, name);
}

/** Numeric state, 0 (down) for anything unrecognized */
export function stateValue(name: string | undefined): number {
  return name !== undefined && isServerStateName(name) ? STATE_VALUES[name] : 0;
}

const StateAccountingSchema = z.record(
  z.object({
    duration_us: z.coerce.number(),
    transitions: z.coerce.number(),
  })
);

export const ServerInfoSchema = z
  .object({
    build_version: z.string().optional(),
    server_state: z.string().optional(),
    server_state_duration_us: z.coerce.number().optional(),
    peers: z.number().optional(),
    load_factor: z.number().optional(),
    io_latency_ms: z.number().optional(),
    uptime: z.number().optional(),
    validation_quorum: z.number().optional(),
    pubkey_validator: z.string().optional(),
    pubkey_node: z.string().optional(),
    complete_ledgers: z.string().optional(),
    node_size: z.string().optional(),
    amendment_blocked: z.boolean().optional(),
    jq_trans_overflow: z.coerce.number().optional(),
    peer_disconnects: z.coerce.number().optional(),
    peer_disconnects_resources: z.coerce.number().optional(),
    last_close: z
      .object({
        converge_time_s: z.number().optional(),
        proposers: z.number().optional(),
      })
      .optional(),
    validated_ledger: z
      .object({
        seq: z.number().optional(),
        hash: z.string().optional(),
        age: z.number().optional(),
        base_fee_xrp: z.number().optional(),
        reserve_base_xrp: z.number().optional(),
        reserve_inc_xrp: z.number().optional(),
      })
      .optional(),
    validator_list: z
      .object({
        expiration: z.string().optional(),
        status: z.string().optional(),
      })
      .optional(),
  })
  .passthrough();

export const ServerInfoResultSchema = z.object({ info: ServerInfoSchema });

export const PeerSchema = z
  .object({
    address: z.string().optional(),
    inbound: z.boolean().optional(),
    latency: z.number().optional(),
    sanity: z.string().optional(),
    version: z.string().optional(),
  })
  .passthrough();

export const PeersResultSchema = z.object({
  peers: z.array(PeerSchema).nullish(),
});

export const ServerStateSchema = z
  .object({
    server_state: z.string().optional(),
    build_version: z.string().optional(),
    complete_ledgers: z.string().optional(),
    node_size: z.string().optional(),
    uptime: z.number().optional(),
    initial_sync_duration_us: z.coerce.number().optional(),
    state_accounting: StateAccountingSchema.optional(),
  })
  .passthrough();

export const ServerStateResultSchema = z.object({ state: ServerStateSchema });

export type ServerInfo = z.infer<typeof ServerInfoSchema>;
export type Peer = z.infer<typeof PeerSchema>;
export type ServerState = z.infer<typeof ServerStateSchema>;

export interface PeerSummary {
  count: number;
  inbound: number;
  outbound: number;
  /** Peers reporting a sanity value other than "sane" */
  insane: number;
  /** 90th percentile latency in ms, 0 with no latency data */
  latencyP90: number;
}

export function summarizePeers(peers: Peer[]): PeerSummary {
  const inbound = peers.filter((p) => p.inbound === true).length;
  const insane = peers.filter((p) => p.sanity !== undefined && p.sanity !== 'sane').length;
  const latencies = peers
    .map((p) => p.latency)
    .filter((l): l is number => l !== undefined)
    .sort((a, b) => a - b);
  const latencyP90 =
    latencies.length > 0 ? latencies[Math.min(Math.floor(latencies.length * 0.9), latencies.length - 1)] : 0;

  return {
    count: peers.length,
    inbound,
    outbound: peers.length - inbound,
    insane,
    latencyP90,
  };
}
